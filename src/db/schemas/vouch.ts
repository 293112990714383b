/**
 * Zod schemas for vouches.
 *
 * `PendingVouchPair` holds the two per-role slots of a completed trade in a
 * single document; `Vouch` is the permanent row written when the pair is
 * published.
 */
import { z } from "zod";

export const VouchRoleSchema = z.enum(["buyer", "seller"]);

export const VouchSlotSchema = z.object({
  raterId: z.string(),
  ratedId: z.string(),
  stars: z.number().int().min(1).max(5),
  comment: z.string(),
  submittedAt: z.date(),
});

export const PendingVouchPairSchema = z.object({
  _id: z.string(),
  slots: z.object({
    buyer: VouchSlotSchema.nullable().default(null),
    seller: VouchSlotSchema.nullable().default(null),
  }),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export const VouchSchema = z.object({
  // `${tradeId}:${raterId}`
  _id: z.string(),
  tradeId: z.string(),
  role: VouchRoleSchema,
  raterId: z.string(),
  ratedId: z.string(),
  stars: z.number().int().min(1).max(5),
  comment: z.string(),
  createdAt: z.date(),
});

export type VouchRole = z.infer<typeof VouchRoleSchema>;
export type VouchSlot = z.infer<typeof VouchSlotSchema>;
export type PendingVouchPair = z.infer<typeof PendingVouchPairSchema>;
export type Vouch = z.infer<typeof VouchSchema>;

export const vouchKey = (tradeId: string, raterId: string): string =>
  `${tradeId}:${raterId}`;
