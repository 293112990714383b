/**
 * Component custom ids.
 *
 * Every button and modal of the marketplace encodes its target in the custom id
 * (`scope:action:arg...`) so handlers stay stateless across restarts.
 */
import type { VouchRole } from "@/db/schemas/vouch";
import { isListingCategory, type ListingCategory } from "@/modules/market/types";

export const SALE_INPUT = {
  accountType: "account_type",
  price: "price",
  description: "description",
} as const;

export const COMMENT_INPUT = "comment";

export const CustomIds = {
  postListing: (category: ListingCategory) => `market:post:${category}`,
  saleModal: (category: ListingCategory) => `market:sale:${category}`,
  listingTrade: (listingId: string) => `listing:trade:${listingId}`,
  listingEdit: (listingId: string) => `listing:edit:${listingId}`,
  listingCancel: (listingId: string) => `listing:cancel:${listingId}`,
  listingEditModal: (listingId: string) => `listing:edit-modal:${listingId}`,
  tradeComplete: (tradeId: string) => `trade:complete:${tradeId}`,
  tradeCancel: (tradeId: string) => `trade:cancel:${tradeId}`,
  rateStars: (tradeId: string, role: VouchRole, stars: number) =>
    `vouch:stars:${tradeId}:${role}:${stars}`,
  rateComment: (tradeId: string, role: VouchRole, stars: number) =>
    `vouch:comment:${tradeId}:${role}:${stars}`,
  ticketOpen: () => "ticket:open",
  ticketClose: (channelId: string) => `ticket:close:${channelId}`,
} as const;

export type ParsedCustomId =
  | { kind: "postListing"; category: ListingCategory }
  | { kind: "saleModal"; category: ListingCategory }
  | { kind: "listingTrade" | "listingEdit" | "listingCancel" | "listingEditModal"; listingId: string }
  | { kind: "tradeComplete" | "tradeCancel"; tradeId: string }
  | { kind: "rateStars" | "rateComment"; tradeId: string; role: VouchRole; stars: number }
  | { kind: "ticketOpen" }
  | { kind: "ticketClose"; channelId: string };

const isRole = (value: string): value is VouchRole => value === "buyer" || value === "seller";

const LISTING_ACTIONS = {
  trade: "listingTrade",
  edit: "listingEdit",
  cancel: "listingCancel",
  "edit-modal": "listingEditModal",
} as const;

const TRADE_ACTIONS = {
  complete: "tradeComplete",
  cancel: "tradeCancel",
} as const;

function hasKey<T extends object>(map: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(map, key);
}

export function parseCustomId(customId: string): ParsedCustomId | null {
  const [scope, action = "", ...args] = customId.split(":");
  const first = args[0] ?? "";
  if (!first && !(scope === "ticket" && action === "open")) return null;

  switch (scope) {
    case "market":
      if (!isListingCategory(first) || args.length !== 1) return null;
      if (action === "post") return { kind: "postListing", category: first };
      if (action === "sale") return { kind: "saleModal", category: first };
      return null;

    case "listing":
      if (!hasKey(LISTING_ACTIONS, action) || args.length !== 1) return null;
      return { kind: LISTING_ACTIONS[action], listingId: first };

    case "trade":
      if (!hasKey(TRADE_ACTIONS, action) || args.length !== 1) return null;
      return { kind: TRADE_ACTIONS[action], tradeId: first };

    case "vouch": {
      const [tradeId, role = "", starsText = ""] = args;
      const stars = Number(starsText);
      if (args.length !== 3 || !tradeId || !isRole(role) || !Number.isInteger(stars)) return null;
      if (action === "stars") return { kind: "rateStars", tradeId, role, stars };
      if (action === "comment") return { kind: "rateComment", tradeId, role, stars };
      return null;
    }

    case "ticket":
      if (action === "open" && args.length === 0) return { kind: "ticketOpen" };
      if (action === "close" && args.length === 1) return { kind: "ticketClose", channelId: first };
      return null;

    default:
      return null;
  }
}
