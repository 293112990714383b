/**
 * Motivación: describir la persistencia del mercado como un conjunto de repositorios tipados.
 *
 * Idea/concepto: cada agregado (reputación, listados, trades, historial, vouches, tickets) tiene su
 * repositorio; las operaciones que deciden carreras son atómicas sobre un único documento.
 *
 * Alcance: solo contratos. La implementación Mongo vive en `@/db/repositories`; los tests usan una
 * implementación en memoria con la misma semántica.
 */
import type { ActiveListing, ListingFields, PendingListing } from "./schemas/listing";
import type { ReputationDelta, UserReputation } from "./schemas/reputation";
import type { SupportTicket } from "./schemas/ticket";
import type { TradeHistoryEntry, TradeSession, TradeStatus } from "./schemas/trade";
import type { PendingVouchPair, Vouch, VouchRole, VouchSlot } from "./schemas/vouch";
import type { ChannelId, ListingId, TradeId, UserId } from "./types";
import type { Result } from "@/utils/result";

export interface ReputationRepository {
  find(userId: UserId): Promise<Result<UserReputation | null>>;
  /** Creates the row if missing; refreshes the cached name when one is given. */
  ensure(userId: UserId, displayName: string | null, now: Date): Promise<Result<UserReputation>>;
  /** Atomic `$inc` with upsert. */
  increment(
    userId: UserId,
    delta: ReputationDelta,
    displayName: string | null,
    now: Date,
  ): Promise<Result<UserReputation>>;
  /** Subtracts removed ratings, never going below zero. `null` when the user has no row. */
  subtractRatings(
    userId: UserId,
    stars: number,
    count: number,
    now: Date,
  ): Promise<Result<UserReputation | null>>;
  clearRatings(userId: UserId, now: Date): Promise<Result<boolean>>;
  remove(userId: UserId): Promise<Result<boolean>>;
}

export interface PendingListingRepository {
  /** Upsert: replaces any previous pending listing of the owner. */
  save(pending: PendingListing): Promise<Result<void>>;
  /** Find-and-delete; only one concurrent caller gets the row. */
  take(ownerId: UserId): Promise<Result<PendingListing | null>>;
  remove(ownerId: UserId): Promise<Result<boolean>>;
  listExpired(now: Date): Promise<Result<PendingListing[]>>;
  /** Deletes only if still expired at `now`. */
  removeExpired(ownerId: UserId, now: Date): Promise<Result<boolean>>;
}

export type ListingPatch = Partial<ListingFields>;

export interface ListingRepository {
  insert(listing: ActiveListing): Promise<Result<void>>;
  find(id: ListingId): Promise<Result<ActiveListing | null>>;
  listByOwner(ownerId: UserId): Promise<Result<ActiveListing[]>>;
  countByOwner(ownerId: UserId): Promise<Result<number>>;
  update(id: ListingId, patch: ListingPatch, now: Date): Promise<Result<ActiveListing | null>>;
  remove(id: ListingId): Promise<Result<boolean>>;
  listCreatedBefore(cutoff: Date): Promise<Result<ActiveListing[]>>;
  /** Deletes only if `createdAt <= cutoff`. */
  removeIfCreatedBefore(id: ListingId, cutoff: Date): Promise<Result<boolean>>;
}

export interface TradeTransitionPatch {
  closedAt?: Date | null;
  closedBy?: UserId | null;
}

export interface TradeRepository {
  /** Fails with `TRADE_ALREADY_OPEN` when the buyer already negotiates the listing. */
  insert(trade: TradeSession): Promise<Result<void>>;
  find(id: TradeId): Promise<Result<TradeSession | null>>;
  findOpen(listingId: ListingId, buyerId: UserId): Promise<Result<TradeSession | null>>;
  /**
   * `$addToSet` of party ids, only while `NEGOTIATING`. Returns the document after the update, or
   * `null` when the trade is no longer negotiating.
   */
  addConfirmations(id: TradeId, partyIds: UserId[], now: Date): Promise<Result<TradeSession | null>>;
  /** Conditional status change; `null` when the current status is not `from`. */
  transition(
    id: TradeId,
    from: TradeStatus,
    to: TradeStatus,
    patch: TradeTransitionPatch,
    now: Date,
  ): Promise<Result<TradeSession | null>>;
}

export interface TradeHistoryRepository {
  /** Idempotent per trade id. */
  append(entry: TradeHistoryEntry): Promise<Result<void>>;
}

export interface VouchRepository {
  /** Writes the role slot and returns the slot it replaced (if any). */
  upsertSlot(
    tradeId: TradeId,
    role: VouchRole,
    slot: VouchSlot,
    now: Date,
  ): Promise<Result<VouchSlot | null>>;
  /** Find-and-delete of the pair, only when both slots are filled. */
  takeCompletePair(tradeId: TradeId): Promise<Result<PendingVouchPair | null>>;
  restorePair(pair: PendingVouchPair): Promise<Result<void>>;
  insertVouches(vouches: Vouch[]): Promise<Result<void>>;
  hasVouch(tradeId: TradeId, raterId: UserId): Promise<Result<boolean>>;
  listReceived(userId: UserId, limit: number): Promise<Result<Vouch[]>>;
  removeForTrade(tradeId: TradeId): Promise<Result<Vouch[]>>;
  removeBetween(raterId: UserId, ratedId: UserId): Promise<Result<Vouch[]>>;
  removeReceived(userId: UserId): Promise<Result<Vouch[]>>;
  removeInvolving(userId: UserId): Promise<Result<Vouch[]>>;
  /** Empties pending slots that rate the user; returns how many slots were cleared. */
  clearSlotsAbout(userId: UserId, now: Date): Promise<Result<number>>;
  /** Deletes pending pairs where the user rates or is rated. */
  removePairsInvolving(userId: UserId): Promise<Result<number>>;
}

export interface TicketCounts {
  open: number;
  total: number;
}

export interface TicketRepository {
  insert(ticket: SupportTicket): Promise<Result<void>>;
  find(channelId: ChannelId): Promise<Result<SupportTicket | null>>;
  /** Oldest first; ties broken by channel id. */
  listOpenByUser(userId: UserId): Promise<Result<SupportTicket[]>>;
  /** Conditional `open -> closed`; `null` when it was not open. */
  close(channelId: ChannelId, closedBy: UserId, now: Date): Promise<Result<SupportTicket | null>>;
  remove(channelId: ChannelId): Promise<Result<boolean>>;
  counts(): Promise<Result<TicketCounts>>;
}

export interface MarketStore {
  reputation: ReputationRepository;
  pendingListings: PendingListingRepository;
  listings: ListingRepository;
  trades: TradeRepository;
  history: TradeHistoryRepository;
  vouches: VouchRepository;
  tickets: TicketRepository;
}
