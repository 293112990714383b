/**
 * Motivación: todo el texto que el bot muestra a usuarios sale de un solo lugar.
 *
 * Idea/concepto: funciones puras que convierten avisos del dominio (`UserNotice`, `ChannelNotice`,
 * `MarketError`) en texto de Discord. Los presenters y los handlers solo las llaman.
 *
 * Alcance: formato; no hace I/O.
 */
import type { ChannelNotice, TicketNotice, UserNotice } from "@/modules/market/presenter";
import { type MarketErrorCode, isMarketError, shortId } from "@/modules/market/types";

const unix = (date: Date): number => Math.floor(date.getTime() / 1000);
const seconds = (ms: number): number => Math.round(ms / 1000);
const mentions = (ids: string[]): string => ids.map((id) => `<@${id}>`).join(", ");

export function formatUserNotice(notice: UserNotice): string {
  switch (notice.kind) {
    case "IMAGE_REQUEST":
      return `✅ Please send 1–${notice.maxImages} screenshots of the account here (before <t:${unix(notice.expiresAt)}:t>).`;
    case "LISTING_PUBLISHED":
      return `✅ Your listing has been posted! <#${notice.channelId}>`;
    case "PENDING_LISTING_EXPIRED":
      return `⌛ Your listing for **${notice.accountType}** expired before any screenshots arrived. Start again from the market panel.`;
    case "TRADE_CANCELED":
      return `❌ The trade \`${shortId(notice.tradeId)}\` for **${notice.accountType}** was canceled. No vouch will be requested.`;
  }
}

export function formatChannelNotice(notice: ChannelNotice): string {
  switch (notice.kind) {
    case "CONFIRMATION_RECORDED":
      return `✅ ${mentions(notice.confirmedBy)} confirmed the trade. Waiting on ${mentions(notice.waitingOn)}.`;
    case "TRADE_COMPLETED":
      return `🎉 Trade \`${shortId(notice.tradeId)}\` completed! Check your DMs to leave a vouch. This channel closes in ${seconds(notice.closesInMs)}s.`;
    case "TRADE_CANCELED": {
      const by = notice.canceledBy ? ` by <@${notice.canceledBy}>` : "";
      return `❌ Trade \`${shortId(notice.tradeId)}\` was canceled${by}. This channel closes in ${seconds(notice.closesInMs)}s.`;
    }
  }
}

export function formatTicketNotice(notice: TicketNotice): string {
  return `🔒 Ticket closed by <@${notice.closedBy}>. This channel will be deleted in ${seconds(notice.closesInMs)}s.`;
}

const FALLBACK: Record<MarketErrorCode, string> = {
  VALIDATION: "Some of the values you entered are not valid.",
  QUOTA_EXCEEDED: "You have reached the limit for this action.",
  TOO_MANY_IMAGES: "Too many screenshots.",
  NO_PENDING_LISTING: "You don't have an active listing. Please start one using the market button in the server.",
  EXPIRED: "This action has expired.",
  NOT_FOUND: "That no longer exists.",
  FORBIDDEN: "You are not allowed to do that.",
  UNAUTHORIZED: "Only the buyer, the seller or staff can do that.",
  SELF_TRADE: "You can't trade on your own listing.",
  TRADE_ALREADY_OPEN: "You already have a trade open for this listing.",
  TRADE_CLOSED: "This trade is already closed.",
  TICKET_CLOSED: "This ticket is already closed.",
  INVALID_RATING: "Ratings go from 1 to 5 stars.",
  ALREADY_RATED: "You already left a vouch for this trade.",
  DIRECT_MESSAGES_CLOSED: "I can't DM you. Please enable DMs from server members.",
  EXTERNAL_FAILURE: "Something went wrong on our side. Please try again in a moment.",
};

/** Short user-facing message; store and platform details never leak. */
export function describeMarketError(error: unknown): string {
  if (!isMarketError(error)) return FALLBACK.EXTERNAL_FAILURE;
  if (error.code === "EXTERNAL_FAILURE") return FALLBACK.EXTERNAL_FAILURE;
  return `❌ ${error.message || FALLBACK[error.code]}`;
}
