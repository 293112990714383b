/**
 * Zod schemas for pending and published listings.
 * Purpose: define listing shapes and validate repo reads/writes.
 */
import { z } from "zod";

export const ListingFieldsSchema = z.object({
  accountType: z.string().min(1),
  price: z.string().min(1),
  description: z.string().min(1),
});

export const PendingListingSchema = ListingFieldsSchema.extend({
  // One pending listing per owner: the owner id is the key.
  _id: z.string(),
  ownerName: z.string(),
  createdAt: z.date(),
  expiresAt: z.date(),
});

export const ActiveListingSchema = ListingFieldsSchema.extend({
  _id: z.string(),
  ownerId: z.string(),
  ownerName: z.string(),
  images: z.array(z.string()).min(1),
  channelId: z.string(),
  messageId: z.string(),
  extraMessageIds: z.array(z.string()).default([]),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export type ListingFields = z.infer<typeof ListingFieldsSchema>;
export type PendingListing = z.infer<typeof PendingListingSchema>;
export type ActiveListing = z.infer<typeof ActiveListingSchema>;
