/**
 * Trade session service.
 *
 * Purpose: a buyer opens a private negotiation channel from a listing; both parties confirm
 * completion (an overseer's press stands in for one of them), or anyone authorised cancels. Completion writes history, bumps counters,
 * retracts the listing and asks both parties for a vouch.
 *
 * Invariants:
 * - `NEGOTIATING -> COMPLETED | CANCELED`; both terminal states are final.
 * - Finalization is claimed with a conditional `NEGOTIATING -> FINALIZING` update, so it runs once
 *   no matter how many confirmations race.
 * - Cancel wins over partial confirmation.
 * - Teardown failures (message or channel already gone) are logged, never escalated.
 */
import type { TradeHistoryEntry, TradeSession } from "@/db/schemas/trade";
import type { ListingId, TradeId, UserId } from "@/db/types";
import { publishedRef } from "@/modules/listings/service";
import { bestEffort, type MarketDeps } from "@/modules/market/deps";
import type { NegotiationSpaceRequest } from "@/modules/market/presenter";
import { type Actor, MarketError, storeFailure } from "@/modules/market/types";
import type { ReputationService } from "@/modules/reputation/service";
import type { VouchService } from "@/modules/vouches/service";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export type ConfirmOutcome =
  | { state: "WAITING"; trade: TradeSession; waitingOn: UserId[] }
  | { state: "COMPLETED"; trade: TradeSession }
  /** Another confirmation claimed finalization first. */
  | { state: "FINALIZING"; trade: TradeSession };

export interface TradeService {
  start(listingId: ListingId, buyer: Actor): Promise<Result<TradeSession, MarketError>>;
  confirmCompletion(tradeId: TradeId, actor: Actor): Promise<Result<ConfirmOutcome, MarketError>>;
  cancel(tradeId: TradeId, actor: Actor): Promise<Result<TradeSession, MarketError>>;
  get(tradeId: TradeId): Promise<Result<TradeSession | null, MarketError>>;
}

export const tradeParties = (trade: TradeSession): UserId[] => [trade.buyerId, trade.sellerId];

export const isParty = (trade: TradeSession, userId: UserId): boolean =>
  trade.buyerId === userId || trade.sellerId === userId;

export const waitingOn = (trade: TradeSession): UserId[] =>
  tradeParties(trade).filter((id) => !trade.confirmedBy.includes(id));

const spaceRequest = (trade: TradeSession): NegotiationSpaceRequest => ({
  tradeId: trade._id,
  listingId: trade.listingId,
  buyerId: trade.buyerId,
  buyerName: trade.buyerName,
  sellerId: trade.sellerId,
  sellerName: trade.sellerName,
  snapshot: trade.snapshot,
});

class TradeServiceImpl implements TradeService {
  constructor(
    private readonly deps: MarketDeps,
    private readonly reputation: ReputationService,
    private readonly vouches: VouchService,
  ) {}

  async get(tradeId: TradeId): Promise<Result<TradeSession | null, MarketError>> {
    const res = await this.deps.store.trades.find(tradeId);
    return res.isErr() ? ErrResult(storeFailure("trades.find", res.error)) : OkResult(res.unwrap());
  }

  async start(listingId: ListingId, buyer: Actor): Promise<Result<TradeSession, MarketError>> {
    const { store, presenter, logger } = this.deps;

    const found = await store.listings.find(listingId);
    if (found.isErr()) return ErrResult(storeFailure("listings.find", found.error));
    const listing = found.unwrap();
    if (!listing) return ErrResult(new MarketError("NOT_FOUND", "This listing is no longer available."));
    if (listing.ownerId === buyer.id) {
      return ErrResult(new MarketError("SELF_TRADE", "You can't trade on your own listing."));
    }

    const open = await store.trades.findOpen(listingId, buyer.id);
    if (open.isErr()) return ErrResult(storeFailure("trades.findOpen", open.error));
    const existing = open.unwrap();
    if (existing) {
      return ErrResult(
        new MarketError("TRADE_ALREADY_OPEN", `You already have a trade open for this listing: <#${existing.channelId}>.`),
      );
    }

    const request: NegotiationSpaceRequest = {
      tradeId: this.deps.generateId(),
      listingId,
      buyerId: buyer.id,
      buyerName: buyer.name,
      sellerId: listing.ownerId,
      sellerName: listing.ownerName,
      snapshot: {
        accountType: listing.accountType,
        price: listing.price,
        description: listing.description,
      },
    };

    let channelId: string;
    try {
      ({ channelId } = await presenter.openNegotiationSpace(request));
    } catch (error) {
      logger.error("[trades] could not open negotiation channel", { tradeId: request.tradeId, error });
      return ErrResult(
        new MarketError("EXTERNAL_FAILURE", "Could not open the trade channel.", { cause: error }),
      );
    }

    let controlsMessageId: string;
    try {
      ({ messageId: controlsMessageId } = await presenter.postControls(channelId, request));
    } catch (error) {
      logger.error("[trades] could not post trade controls", { tradeId: request.tradeId, error });
      await this.closeSpace(request.tradeId, channelId);
      return ErrResult(
        new MarketError("EXTERNAL_FAILURE", "Could not set up the trade channel.", { cause: error }),
      );
    }

    const now = this.deps.now();
    const trade: TradeSession = {
      _id: request.tradeId,
      listingId,
      buyerId: buyer.id,
      buyerName: buyer.name,
      sellerId: listing.ownerId,
      sellerName: listing.ownerName,
      snapshot: request.snapshot,
      confirmedBy: [],
      status: "NEGOTIATING",
      channelId,
      controlsMessageId,
      createdAt: now,
      updatedAt: now,
      closedAt: null,
      closedBy: null,
    };

    const inserted = await store.trades.insert(trade);
    if (inserted.isErr()) {
      await this.closeSpace(trade._id, channelId);
      if (inserted.error.message === "TRADE_ALREADY_OPEN") {
        return ErrResult(new MarketError("TRADE_ALREADY_OPEN", "You already have a trade open for this listing."));
      }
      return ErrResult(storeFailure("trades.insert", inserted.error));
    }

    for (const party of [buyer.id, listing.ownerId]) {
      const ensured = await store.reputation.ensure(party, party === buyer.id ? buyer.name : listing.ownerName, now);
      if (ensured.isErr()) {
        logger.warn("[trades] could not initialise reputation row", { userId: party, error: ensured.error });
      }
    }

    logger.info("[trades] trade opened", { tradeId: trade._id, listingId, buyerId: buyer.id });
    return OkResult(trade);
  }

  /** Loads the trade and checks that the actor may act on it. */
  private async authorized(
    tradeId: TradeId,
    actor: Actor,
  ): Promise<Result<TradeSession, MarketError>> {
    const found = await this.deps.store.trades.find(tradeId);
    if (found.isErr()) return ErrResult(storeFailure("trades.find", found.error));
    const trade = found.unwrap();
    if (!trade) return ErrResult(new MarketError("NOT_FOUND", "This trade no longer exists."));
    if (!isParty(trade, actor.id) && !actor.overseer) {
      return ErrResult(new MarketError("UNAUTHORIZED", "Only the buyer, the seller or staff can do that."));
    }
    if (trade.status !== "NEGOTIATING") {
      return ErrResult(new MarketError("TRADE_CLOSED", "This trade is already closed."));
    }
    return OkResult(trade);
  }

  async confirmCompletion(tradeId: TradeId, actor: Actor): Promise<Result<ConfirmOutcome, MarketError>> {
    const { store, presenter, logger } = this.deps;

    const checked = await this.authorized(tradeId, actor);
    if (checked.isErr()) return ErrResult(checked.error);
    const trade = checked.unwrap();

    // An overseer who is not a party counts as one confirmation: the first party still missing.
    const overseerOverride = !isParty(trade, actor.id);
    const partyIds = overseerOverride ? waitingOn(trade).slice(0, 1) : [actor.id];
    if (overseerOverride) {
      logger.info("[trades] overseer confirmed completion", {
        tradeId,
        overseerId: actor.id,
        onBehalfOf: partyIds[0] ?? null,
      });
    }

    const updated = await store.trades.addConfirmations(tradeId, partyIds, this.deps.now());
    if (updated.isErr()) return ErrResult(storeFailure("trades.addConfirmations", updated.error));
    const current = updated.unwrap();
    if (!current) return ErrResult(new MarketError("TRADE_CLOSED", "This trade is already closed."));

    const pending = waitingOn(current);
    if (pending.length) {
      await bestEffort(logger, "[trades] could not announce confirmation", { tradeId }, () =>
        presenter.announce(current.channelId, {
          kind: "CONFIRMATION_RECORDED",
          tradeId,
          confirmedBy: current.confirmedBy,
          waitingOn: pending,
        }),
      );
      return OkResult({ state: "WAITING", trade: current, waitingOn: pending });
    }

    return this.finalize(current, actor);
  }

  private async finalize(
    trade: TradeSession,
    actor: Actor,
  ): Promise<Result<ConfirmOutcome, MarketError>> {
    const { store, presenter, logger } = this.deps;

    const claimed = await store.trades.transition(trade._id, "NEGOTIATING", "FINALIZING", {}, this.deps.now());
    if (claimed.isErr()) return ErrResult(storeFailure("trades.transition", claimed.error));
    if (!claimed.unwrap()) return OkResult({ state: "FINALIZING", trade });

    const completedAt = this.deps.now();
    const entry: TradeHistoryEntry = {
      _id: trade._id,
      listingId: trade.listingId,
      buyerId: trade.buyerId,
      sellerId: trade.sellerId,
      accountType: trade.snapshot.accountType,
      price: trade.snapshot.price,
      description: trade.snapshot.description,
      channelId: trade.channelId,
      completedAt,
    };

    const appended = await store.history.append(entry);
    if (appended.isErr()) {
      logger.error("[trades] failed to record history; reopening trade", { tradeId: trade._id, error: appended.error });
      const reverted = await store.trades.transition(trade._id, "FINALIZING", "NEGOTIATING", {}, this.deps.now());
      if (reverted.isErr()) {
        logger.error("[trades] failed to reopen trade after history failure", {
          tradeId: trade._id,
          error: reverted.error,
        });
      }
      return ErrResult(storeFailure("history.append", appended.error));
    }

    const marked = await store.trades.transition(
      trade._id,
      "FINALIZING",
      "COMPLETED",
      { closedAt: completedAt, closedBy: actor.id },
      completedAt,
    );
    if (marked.isErr()) return ErrResult(storeFailure("trades.transition", marked.error));
    const completed = marked.unwrap();
    if (!completed) {
      logger.error("[trades] trade left FINALIZING unexpectedly", { tradeId: trade._id });
      return ErrResult(new MarketError("TRADE_CLOSED", "This trade is already closed."));
    }

    const sale = await this.reputation.recordSale(completed.sellerId, completed.sellerName);
    if (sale.isErr()) {
      logger.error("[trades] failed to count sale", { tradeId: completed._id, sellerId: completed.sellerId, error: sale.error });
    }
    const purchase = await this.reputation.recordPurchase(completed.buyerId, completed.buyerName);
    if (purchase.isErr()) {
      logger.error("[trades] failed to count purchase", { tradeId: completed._id, buyerId: completed.buyerId, error: purchase.error });
    }

    await bestEffort(logger, "[trades] could not log completed sale", { tradeId: completed._id }, () =>
      presenter.logCompletedTrade(entry, completed),
    );

    await this.retireListing(completed);
    await this.vouches.requestRatings(completed);
    await this.teardown(completed);

    logger.info("[trades] trade completed", { tradeId: completed._id });
    return OkResult({ state: "COMPLETED", trade: completed });
  }

  private async retireListing(trade: TradeSession): Promise<void> {
    const { store, presenter, logger } = this.deps;
    const found = await store.listings.find(trade.listingId);
    if (found.isErr()) {
      logger.warn("[trades] could not load sold listing", { tradeId: trade._id, error: found.error });
      return;
    }
    const listing = found.unwrap();
    if (!listing) return;

    const removed = await store.listings.remove(listing._id);
    if (removed.isErr()) {
      logger.warn("[trades] could not remove sold listing", { tradeId: trade._id, listingId: listing._id, error: removed.error });
      return;
    }
    await bestEffort(logger, "[trades] could not retract sold listing", { tradeId: trade._id, listingId: listing._id }, () =>
      presenter.retractListing(publishedRef(listing)),
    );
  }

  async cancel(tradeId: TradeId, actor: Actor): Promise<Result<TradeSession, MarketError>> {
    const { store, presenter, logger } = this.deps;

    const checked = await this.authorized(tradeId, actor);
    if (checked.isErr()) return ErrResult(checked.error);

    const now = this.deps.now();
    const res = await store.trades.transition(
      tradeId,
      "NEGOTIATING",
      "CANCELED",
      { closedAt: now, closedBy: actor.id },
      now,
    );
    if (res.isErr()) return ErrResult(storeFailure("trades.transition", res.error));
    const canceled = res.unwrap();
    if (!canceled) return ErrResult(new MarketError("TRADE_CLOSED", "This trade is already closed."));

    for (const userId of tradeParties(canceled)) {
      await bestEffort(logger, "[trades] could not notify cancellation", { tradeId, userId }, () =>
        presenter.notifyUser(userId, {
          kind: "TRADE_CANCELED",
          tradeId,
          accountType: canceled.snapshot.accountType,
        }),
      );
    }

    await this.teardown(canceled);
    logger.info("[trades] trade canceled", { tradeId, by: actor.id, overseer: actor.overseer });
    return OkResult(canceled);
  }

  private async teardown(trade: TradeSession): Promise<void> {
    const { presenter, logger, settings } = this.deps;
    const context = { tradeId: trade._id, channelId: trade.channelId };

    const controlsMessageId = trade.controlsMessageId;
    if (controlsMessageId) {
      await bestEffort(logger, "[trades] could not disable controls", context, () =>
        presenter.disableControls(trade.channelId, controlsMessageId, trade._id),
      );
    }

    await bestEffort(logger, "[trades] could not announce trade end", context, () =>
      presenter.announce(
        trade.channelId,
        trade.status === "COMPLETED"
          ? { kind: "TRADE_COMPLETED", tradeId: trade._id, closesInMs: settings.teardownDelayMs }
          : {
              kind: "TRADE_CANCELED",
              tradeId: trade._id,
              canceledBy: trade.closedBy,
              closesInMs: settings.teardownDelayMs,
            },
      ),
    );

    await this.deps.sleep(settings.teardownDelayMs);
    await this.closeSpace(trade._id, trade.channelId);
  }

  private async closeSpace(tradeId: TradeId, channelId: string): Promise<void> {
    await bestEffort(this.deps.logger, "[trades] could not close trade channel", { tradeId, channelId }, () =>
      this.deps.presenter.closeSpace(channelId),
    );
  }
}

export function createTradeService(
  deps: MarketDeps,
  reputation: ReputationService,
  vouches: VouchService,
): TradeService {
  return new TradeServiceImpl(deps, reputation, vouches);
}
