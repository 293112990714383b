/**
 * Marketplace domain types.
 *
 * Purpose: error model, actors and listing categories shared by the listing, trade, vouch,
 * reputation and ticket services.
 */
import type { UserId } from "@/db/types";

export type MarketErrorCode =
  | "VALIDATION"
  | "QUOTA_EXCEEDED"
  | "TOO_MANY_IMAGES"
  | "NO_PENDING_LISTING"
  | "EXPIRED"
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "UNAUTHORIZED"
  | "SELF_TRADE"
  | "TRADE_ALREADY_OPEN"
  | "TRADE_CLOSED"
  | "TICKET_CLOSED"
  | "INVALID_RATING"
  | "ALREADY_RATED"
  | "DIRECT_MESSAGES_CLOSED"
  | "EXTERNAL_FAILURE";

export class MarketError extends Error {
  constructor(
    public readonly code: MarketErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MarketError";
  }
}

export const isMarketError = (error: unknown): error is MarketError =>
  error instanceof MarketError;

/** Store failures surface to callers as `EXTERNAL_FAILURE` with the driver error as cause. */
export const storeFailure = (operation: string, cause: Error): MarketError =>
  new MarketError("EXTERNAL_FAILURE", `Store operation failed: ${operation}`, { cause });

/**
 * Who performs an action. `overseer` is resolved by the interaction handler (staff role) and is
 * the only authority beyond the trade parties.
 */
export interface Actor {
  readonly id: UserId;
  readonly name: string;
  readonly overseer: boolean;
}

export const LISTING_CATEGORIES = ["main", "iron"] as const;
export type ListingCategory = (typeof LISTING_CATEGORIES)[number];

/** Prefix written in front of the seller's account type, per panel button. */
export const CATEGORY_PREFIX: Record<ListingCategory, string> = {
  main: "Main",
  iron: "Ironman",
};

export function isListingCategory(value: string): value is ListingCategory {
  return LISTING_CATEGORIES.some((category) => category === value);
}

/** Account types starting with "Main" go to the main channel; everything else is ironman. */
export function resolveListingCategory(accountType: string): ListingCategory {
  return accountType.trim().toLowerCase().startsWith("main") ? "main" : "iron";
}

export function formatAccountType(category: ListingCategory, label: string): string {
  return `${CATEGORY_PREFIX[category]} - ${label.trim()}`;
}

/** Only the first 8 characters of a trade id are shown to users. */
export const shortId = (id: string): string => id.slice(0, 8);
