/**
 * Zod schemas for trade sessions and the append-only trade history.
 */
import { z } from "zod";
import { ListingFieldsSchema } from "./listing";

export const TradeStatusSchema = z.enum([
  "NEGOTIATING",
  "FINALIZING",
  "COMPLETED",
  "CANCELED",
]);

export const TradeSessionSchema = z.object({
  _id: z.string(),
  listingId: z.string(),
  buyerId: z.string(),
  buyerName: z.string(),
  sellerId: z.string(),
  sellerName: z.string(),
  snapshot: ListingFieldsSchema,
  confirmedBy: z.array(z.string()).default([]),
  status: TradeStatusSchema,
  channelId: z.string(),
  controlsMessageId: z.string().nullable().default(null),
  createdAt: z.date(),
  updatedAt: z.date(),
  closedAt: z.date().nullable().default(null),
  closedBy: z.string().nullable().default(null),
});

export const TradeHistorySchema = ListingFieldsSchema.extend({
  // Same key as the trade session it records.
  _id: z.string(),
  listingId: z.string(),
  buyerId: z.string(),
  sellerId: z.string(),
  channelId: z.string(),
  completedAt: z.date(),
});

export type TradeStatus = z.infer<typeof TradeStatusSchema>;
export type TradeSession = z.infer<typeof TradeSessionSchema>;
export type TradeHistoryEntry = z.infer<typeof TradeHistorySchema>;
