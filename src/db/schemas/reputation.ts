/**
 * Zod schema for per-user trading reputation.
 * Purpose: validate counters and the rating aggregate read from `user_reputation`.
 */
import { z } from "zod";

const Counter = z.number().int().nonnegative().default(0);

export const UserReputationSchema = z.object({
  _id: z.string(),
  displayName: z.string().nullable().default(null),
  sales: Counter,
  purchases: Counter,
  ratingTotal: Counter,
  ratingCount: Counter,
  createdAt: z.date(),
  updatedAt: z.date(),
});

export type UserReputation = z.infer<typeof UserReputationSchema>;

/** Campos numéricos que admiten `$inc`. */
export type ReputationCounter = "sales" | "purchases" | "ratingTotal" | "ratingCount";
export type ReputationDelta = Partial<Record<ReputationCounter, number>>;
