/**
 * Vouch collector.
 *
 * Purpose: after a completed trade each party rates the other (1-5 stars + comment). Ratings land in
 * a per-trade pending pair; once both slots are filled the pair is published as two permanent vouches
 * and one combined public post.
 *
 * Invariants:
 * - Re-rating before publication overwrites the slot; the rated user's total moves by the difference
 *   and the rating count is only incremented by the first submission.
 * - The complete pair is taken atomically, so it is published at most once.
 * - Exactly one permanent vouch per (trade, rater).
 */
import type { TradeSession } from "@/db/schemas/trade";
import { vouchKey, type PendingVouchPair, type Vouch, type VouchRole, type VouchSlot } from "@/db/schemas/vouch";
import type { TradeId, UserId } from "@/db/types";
import { bestEffort, type MarketDeps } from "@/modules/market/deps";
import { MarketError, storeFailure } from "@/modules/market/types";
import type { ReputationService } from "@/modules/reputation/service";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export const MIN_STARS = 1;
export const MAX_STARS = 5;
export const MAX_COMMENT_LENGTH = 500;

export interface RatingInput {
  tradeId: TradeId;
  role: VouchRole;
  raterId: UserId;
  ratedId: UserId;
  stars: number;
  comment: string;
}

export interface RatingOutcome {
  slot: VouchSlot;
  /** `true` when this submission replaced an earlier one for the same role. */
  replaced: boolean;
  /** Permanent vouches written when this submission completed the pair. */
  published: Vouch[] | null;
}

export interface VouchRemovalReport {
  removed: number;
  aggregatesAdjusted: number;
}

export interface VouchService {
  requestRatings(trade: TradeSession): Promise<void>;
  submitRating(input: RatingInput): Promise<Result<RatingOutcome, MarketError>>;
  publish(tradeId: TradeId): Promise<Result<Vouch[] | null, MarketError>>;
  listReceived(userId: UserId, limit?: number): Promise<Result<Vouch[], MarketError>>;
  clearUserVouches(userId: UserId): Promise<Result<VouchRemovalReport, MarketError>>;
  removeVouchesForTrade(tradeId: TradeId): Promise<Result<VouchRemovalReport, MarketError>>;
  removeVouchesBetween(raterId: UserId, ratedId: UserId): Promise<Result<VouchRemovalReport, MarketError>>;
}

export const partiesFor = (
  trade: TradeSession,
  role: VouchRole,
): { raterId: UserId; ratedId: UserId } =>
  role === "buyer"
    ? { raterId: trade.buyerId, ratedId: trade.sellerId }
    : { raterId: trade.sellerId, ratedId: trade.buyerId };

export const isValidStars = (stars: number): boolean =>
  Number.isInteger(stars) && stars >= MIN_STARS && stars <= MAX_STARS;

function toVouch(tradeId: TradeId, role: VouchRole, slot: VouchSlot, createdAt: Date): Vouch {
  return {
    _id: vouchKey(tradeId, slot.raterId),
    tradeId,
    role,
    raterId: slot.raterId,
    ratedId: slot.ratedId,
    stars: slot.stars,
    comment: slot.comment,
    createdAt,
  };
}

class VouchServiceImpl implements VouchService {
  constructor(
    private readonly deps: MarketDeps,
    private readonly reputation: ReputationService,
  ) {}

  /** Rating prompts stay valid for `ratingPromptTtlMs` after the trade closed. */
  private promptExpiry(trade: TradeSession): Date {
    const closedAt = trade.closedAt ?? trade.updatedAt;
    return new Date(closedAt.getTime() + this.deps.settings.ratingPromptTtlMs);
  }

  async requestRatings(trade: TradeSession): Promise<void> {
    const { presenter, logger } = this.deps;
    const expiresAt = this.promptExpiry(trade);
    const roles: VouchRole[] = ["buyer", "seller"];

    for (const role of roles) {
      const { raterId, ratedId } = partiesFor(trade, role);
      await bestEffort(logger, "[vouches] could not deliver rating prompt", { tradeId: trade._id, raterId }, () =>
        presenter.promptRating({
          tradeId: trade._id,
          role,
          raterId,
          ratedId,
          ratedName: role === "buyer" ? trade.sellerName : trade.buyerName,
          accountType: trade.snapshot.accountType,
          expiresAt,
        }),
      );
    }
  }

  async submitRating(input: RatingInput): Promise<Result<RatingOutcome, MarketError>> {
    const { store, logger } = this.deps;

    if (!isValidStars(input.stars)) {
      return ErrResult(new MarketError("INVALID_RATING", "Ratings go from 1 to 5 stars."));
    }
    const comment = input.comment.trim();
    if (comment.length > MAX_COMMENT_LENGTH) {
      return ErrResult(
        new MarketError("VALIDATION", `Comments must be at most ${MAX_COMMENT_LENGTH} characters.`),
      );
    }

    const found = await store.trades.find(input.tradeId);
    if (found.isErr()) return ErrResult(storeFailure("trades.find", found.error));
    const trade = found.unwrap();
    if (!trade) return ErrResult(new MarketError("NOT_FOUND", "This trade no longer exists."));
    if (trade.status !== "COMPLETED") {
      return ErrResult(new MarketError("TRADE_CLOSED", "Only completed trades can be rated."));
    }

    const expected = partiesFor(trade, input.role);
    if (expected.raterId !== input.raterId || expected.ratedId !== input.ratedId) {
      return ErrResult(new MarketError("FORBIDDEN", "You can't rate this trade."));
    }

    const now = this.deps.now();
    if (now.getTime() > this.promptExpiry(trade).getTime()) {
      return ErrResult(new MarketError("EXPIRED", "The rating window for this trade has closed."));
    }

    const already = await store.vouches.hasVouch(trade._id, input.raterId);
    if (already.isErr()) return ErrResult(storeFailure("vouches.hasVouch", already.error));
    if (already.unwrap()) {
      return ErrResult(new MarketError("ALREADY_RATED", "You already left a vouch for this trade."));
    }

    const slot: VouchSlot = {
      raterId: input.raterId,
      ratedId: input.ratedId,
      stars: input.stars,
      comment,
      submittedAt: now,
    };
    const upserted = await store.vouches.upsertSlot(trade._id, input.role, slot, now);
    if (upserted.isErr()) return ErrResult(storeFailure("vouches.upsertSlot", upserted.error));
    const previous = upserted.unwrap();

    const starsDelta = previous ? input.stars - previous.stars : input.stars;
    const countDelta = previous ? 0 : 1;
    if (starsDelta !== 0 || countDelta !== 0) {
      const applied = await this.reputation.applyRating(input.ratedId, starsDelta, countDelta);
      if (applied.isErr()) {
        logger.error("[vouches] failed to update rating aggregate", {
          tradeId: trade._id,
          ratedId: input.ratedId,
          starsDelta,
          countDelta,
          error: applied.error,
        });
      }
    }

    const published = await this.publish(trade._id);
    if (published.isErr()) return ErrResult(published.error);

    return OkResult({ slot, replaced: previous !== null, published: published.unwrap() });
  }

  async publish(tradeId: TradeId): Promise<Result<Vouch[] | null, MarketError>> {
    const { store, presenter, logger } = this.deps;

    const taken = await store.vouches.takeCompletePair(tradeId);
    if (taken.isErr()) return ErrResult(storeFailure("vouches.takeCompletePair", taken.error));
    const pair = taken.unwrap();
    if (!pair) return OkResult(null);

    const { buyer, seller } = pair.slots;
    if (!buyer || !seller) {
      // Half pair: put it back untouched.
      await this.restore(pair);
      return OkResult(null);
    }

    const now = this.deps.now();
    const vouches = [toVouch(tradeId, "buyer", buyer, now), toVouch(tradeId, "seller", seller, now)];
    const inserted = await store.vouches.insertVouches(vouches);
    if (inserted.isErr()) {
      await this.restore(pair);
      return ErrResult(storeFailure("vouches.insertVouches", inserted.error));
    }

    const trade = await store.trades.find(tradeId);
    const snapshot = trade.isOk() ? trade.unwrap()?.snapshot ?? null : null;
    await bestEffort(logger, "[vouches] could not post vouch", { tradeId }, () =>
      presenter.publishVouch({
        tradeId,
        accountType: snapshot?.accountType ?? null,
        price: snapshot?.price ?? null,
        buyer,
        seller,
      }),
    );

    logger.info("[vouches] vouch pair published", { tradeId });
    return OkResult(vouches);
  }

  private async restore(pair: PendingVouchPair): Promise<void> {
    const restored = await this.deps.store.vouches.restorePair(pair);
    if (restored.isErr()) {
      this.deps.logger.error("[vouches] failed to restore pending pair", {
        tradeId: pair._id,
        error: restored.error,
      });
    }
  }

  async listReceived(userId: UserId, limit = 5): Promise<Result<Vouch[], MarketError>> {
    const res = await this.deps.store.vouches.listReceived(userId, limit);
    return res.isErr() ? ErrResult(storeFailure("vouches.listReceived", res.error)) : OkResult(res.unwrap());
  }

  async clearUserVouches(userId: UserId): Promise<Result<VouchRemovalReport, MarketError>> {
    const { store, logger } = this.deps;

    const cleared = await this.reputation.clearRatings(userId);
    if (cleared.isErr()) return ErrResult(cleared.error);

    const removed = await store.vouches.removeReceived(userId);
    if (removed.isErr()) return ErrResult(storeFailure("vouches.removeReceived", removed.error));

    const slots = await store.vouches.clearSlotsAbout(userId, this.deps.now());
    if (slots.isErr()) return ErrResult(storeFailure("vouches.clearSlotsAbout", slots.error));

    logger.info("[vouches] cleared received vouches", {
      userId,
      removed: removed.unwrap().length,
      pendingSlots: slots.unwrap(),
    });
    return OkResult({ removed: removed.unwrap().length, aggregatesAdjusted: cleared.unwrap() ? 1 : 0 });
  }

  async removeVouchesForTrade(tradeId: TradeId): Promise<Result<VouchRemovalReport, MarketError>> {
    const removed = await this.deps.store.vouches.removeForTrade(tradeId);
    if (removed.isErr()) return ErrResult(storeFailure("vouches.removeForTrade", removed.error));
    return OkResult(await this.revert(removed.unwrap()));
  }

  async removeVouchesBetween(
    raterId: UserId,
    ratedId: UserId,
  ): Promise<Result<VouchRemovalReport, MarketError>> {
    const removed = await this.deps.store.vouches.removeBetween(raterId, ratedId);
    if (removed.isErr()) return ErrResult(storeFailure("vouches.removeBetween", removed.error));
    return OkResult(await this.revert(removed.unwrap()));
  }

  private async revert(vouches: Vouch[]): Promise<VouchRemovalReport> {
    const aggregatesAdjusted = await this.reputation.revertRatings(vouches);
    if (vouches.length) {
      this.deps.logger.info("[vouches] vouches removed", {
        ids: vouches.map((vouch) => vouch._id),
        aggregatesAdjusted,
      });
    }
    return { removed: vouches.length, aggregatesAdjusted };
  }
}

export function createVouchService(deps: MarketDeps, reputation: ReputationService): VouchService {
  return new VouchServiceImpl(deps, reputation);
}
