/**
 * Motivación: los servicios del mercado necesitan publicar mensajes, abrir canales y mandar DMs sin
 * depender de Discord.
 *
 * Idea/concepto: un puerto (`MarketPresenter`) que el runtime implementa con Seyfert y los tests con
 * un fake que registra llamadas. Los métodos lanzan si la plataforma rechaza la operación; cada
 * servicio decide si ese fallo es crítico o solo se loguea.
 *
 * Alcance: contratos y payloads; no contiene texto de UI.
 */
import type { ActiveListing, ListingFields } from "@/db/schemas/listing";
import type { TradeHistoryEntry, TradeSession } from "@/db/schemas/trade";
import type { VouchRole, VouchSlot } from "@/db/schemas/vouch";
import type { ChannelId, ListingId, MessageId, TradeId, UserId } from "@/db/types";
import type { ListingCategory } from "./types";

export interface ListingDraft extends ListingFields {
  id: ListingId;
  ownerId: UserId;
  ownerName: string;
  category: ListingCategory;
  images: string[];
}

export interface PublishedListingRef {
  channelId: ChannelId;
  messageId: MessageId;
  extraMessageIds: MessageId[];
}

export interface NegotiationSpaceRequest {
  tradeId: TradeId;
  listingId: ListingId;
  buyerId: UserId;
  buyerName: string;
  sellerId: UserId;
  sellerName: string;
  snapshot: ListingFields;
}

export type UserNotice =
  | { kind: "IMAGE_REQUEST"; maxImages: number; expiresAt: Date }
  | { kind: "LISTING_PUBLISHED"; listingId: ListingId; channelId: ChannelId; messageId: MessageId }
  | { kind: "PENDING_LISTING_EXPIRED"; accountType: string }
  | { kind: "TRADE_CANCELED"; tradeId: TradeId; accountType: string };

export type ChannelNotice =
  | { kind: "CONFIRMATION_RECORDED"; tradeId: TradeId; confirmedBy: UserId[]; waitingOn: UserId[] }
  | { kind: "TRADE_COMPLETED"; tradeId: TradeId; closesInMs: number }
  | { kind: "TRADE_CANCELED"; tradeId: TradeId; canceledBy: UserId | null; closesInMs: number };

export interface RatingPrompt {
  tradeId: TradeId;
  role: VouchRole;
  raterId: UserId;
  ratedId: UserId;
  ratedName: string;
  accountType: string;
  expiresAt: Date;
}

export interface PublishedVouch {
  tradeId: TradeId;
  accountType: string | null;
  price: string | null;
  buyer: VouchSlot;
  seller: VouchSlot;
}

export interface MarketPresenter {
  publishListing(draft: ListingDraft): Promise<PublishedListingRef>;
  updateListing(listing: ActiveListing): Promise<void>;
  retractListing(ref: PublishedListingRef): Promise<void>;

  openNegotiationSpace(request: NegotiationSpaceRequest): Promise<{ channelId: ChannelId }>;
  postControls(channelId: ChannelId, trade: NegotiationSpaceRequest): Promise<{ messageId: MessageId }>;
  disableControls(channelId: ChannelId, messageId: MessageId, tradeId: TradeId): Promise<void>;
  announce(channelId: ChannelId, notice: ChannelNotice): Promise<void>;
  closeSpace(channelId: ChannelId): Promise<void>;

  notifyUser(userId: UserId, notice: UserNotice): Promise<void>;
  promptRating(prompt: RatingPrompt): Promise<void>;
  publishVouch(vouch: PublishedVouch): Promise<void>;
  logCompletedTrade(entry: TradeHistoryEntry, trade: TradeSession): Promise<void>;
}

export type TicketNotice = { kind: "TICKET_CLOSING"; closedBy: UserId; closesInMs: number };

export interface TicketPresenter {
  openTicketChannel(user: { id: UserId; name: string }): Promise<{ channelId: ChannelId }>;
  postTicketWelcome(channelId: ChannelId, userId: UserId): Promise<void>;
  announce(channelId: ChannelId, notice: TicketNotice): Promise<void>;
  closeTicketChannel(channelId: ChannelId): Promise<void>;
}
