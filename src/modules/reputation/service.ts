/**
 * Reputation service.
 *
 * Purpose: per-user sales/purchase counters, the rating aggregate and the admin operations that
 * wipe or rewind them.
 *
 * Invariants:
 * - The average is only defined when at least one rating exists.
 * - Aggregates never go below zero when ratings are removed.
 * - Trade history is never touched, not even by a full reset.
 */
import type { UserReputation } from "@/db/schemas/reputation";
import type { Vouch } from "@/db/schemas/vouch";
import type { UserId } from "@/db/types";
import { publishedRef } from "@/modules/listings/service";
import { bestEffort, type MarketDeps } from "@/modules/market/deps";
import { MarketError, storeFailure } from "@/modules/market/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";

export interface ReputationStats {
  userId: UserId;
  displayName: string | null;
  sales: number;
  purchases: number;
  ratingTotal: number;
  ratingCount: number;
  /** One decimal; `undefined` means "no ratings". */
  average: number | undefined;
}

export interface ResetReport {
  reputationRemoved: boolean;
  listingsRemoved: number;
  pendingListingRemoved: boolean;
  vouchesRemoved: number;
  pendingPairsRemoved: number;
}

export interface ReputationService {
  getStats(userId: UserId, displayName?: string | null): Promise<Result<ReputationStats, MarketError>>;
  getAverageRating(userId: UserId): Promise<Result<number | undefined, MarketError>>;
  recordSale(sellerId: UserId, displayName: string | null): Promise<Result<UserReputation, MarketError>>;
  recordPurchase(buyerId: UserId, displayName: string | null): Promise<Result<UserReputation, MarketError>>;
  applyRating(ratedId: UserId, starsDelta: number, countDelta: number): Promise<Result<UserReputation, MarketError>>;
  /** Subtracts each vouch from its rated user's aggregate. Returns how many were applied. */
  revertRatings(vouches: Vouch[]): Promise<number>;
  clearRatings(userId: UserId): Promise<Result<boolean, MarketError>>;
  resetUser(userId: UserId): Promise<Result<ResetReport, MarketError>>;
}

export function averageRating(ratingTotal: number, ratingCount: number): number | undefined {
  if (ratingCount <= 0) return undefined;
  return Math.round((ratingTotal / ratingCount) * 10) / 10;
}

export function toStats(rep: UserReputation): ReputationStats {
  return {
    userId: rep._id,
    displayName: rep.displayName,
    sales: rep.sales,
    purchases: rep.purchases,
    ratingTotal: rep.ratingTotal,
    ratingCount: rep.ratingCount,
    average: averageRating(rep.ratingTotal, rep.ratingCount),
  };
}

class ReputationServiceImpl implements ReputationService {
  constructor(private readonly deps: MarketDeps) {}

  async getStats(
    userId: UserId,
    displayName: string | null = null,
  ): Promise<Result<ReputationStats, MarketError>> {
    const res = await this.deps.store.reputation.ensure(userId, displayName, this.deps.now());
    if (res.isErr()) return ErrResult(storeFailure("reputation.ensure", res.error));
    return OkResult(toStats(res.unwrap()));
  }

  async getAverageRating(userId: UserId): Promise<Result<number | undefined, MarketError>> {
    const res = await this.deps.store.reputation.find(userId);
    if (res.isErr()) return ErrResult(storeFailure("reputation.find", res.error));
    const rep = res.unwrap();
    return OkResult(rep ? averageRating(rep.ratingTotal, rep.ratingCount) : undefined);
  }

  async recordSale(sellerId: UserId, displayName: string | null): Promise<Result<UserReputation, MarketError>> {
    return this.increment(sellerId, { sales: 1 }, displayName);
  }

  async recordPurchase(buyerId: UserId, displayName: string | null): Promise<Result<UserReputation, MarketError>> {
    return this.increment(buyerId, { purchases: 1 }, displayName);
  }

  async applyRating(
    ratedId: UserId,
    starsDelta: number,
    countDelta: number,
  ): Promise<Result<UserReputation, MarketError>> {
    return this.increment(ratedId, { ratingTotal: starsDelta, ratingCount: countDelta }, null);
  }

  private async increment(
    userId: UserId,
    delta: { sales?: number; purchases?: number; ratingTotal?: number; ratingCount?: number },
    displayName: string | null,
  ): Promise<Result<UserReputation, MarketError>> {
    const res = await this.deps.store.reputation.increment(userId, delta, displayName, this.deps.now());
    return res.isErr() ? ErrResult(storeFailure("reputation.increment", res.error)) : OkResult(res.unwrap());
  }

  async revertRatings(vouches: Vouch[]): Promise<number> {
    const { store, logger } = this.deps;
    let applied = 0;
    for (const vouch of vouches) {
      const res = await store.reputation.subtractRatings(vouch.ratedId, vouch.stars, 1, this.deps.now());
      if (res.isErr()) {
        logger.error("[reputation] failed to revert rating", {
          vouchId: vouch._id,
          ratedId: vouch.ratedId,
          error: res.error,
        });
        continue;
      }
      applied += 1;
    }
    return applied;
  }

  async clearRatings(userId: UserId): Promise<Result<boolean, MarketError>> {
    const res = await this.deps.store.reputation.clearRatings(userId, this.deps.now());
    return res.isErr() ? ErrResult(storeFailure("reputation.clearRatings", res.error)) : OkResult(res.unwrap());
  }

  async resetUser(userId: UserId): Promise<Result<ResetReport, MarketError>> {
    const { store, presenter, logger } = this.deps;

    const listings = await store.listings.listByOwner(userId);
    if (listings.isErr()) return ErrResult(storeFailure("listings.listByOwner", listings.error));

    let listingsRemoved = 0;
    for (const listing of listings.unwrap()) {
      const removed = await store.listings.remove(listing._id);
      if (removed.isErr()) return ErrResult(storeFailure("listings.remove", removed.error));
      if (!removed.unwrap()) continue;
      listingsRemoved += 1;
      await bestEffort(logger, "[reputation] could not retract listing during reset", { listingId: listing._id }, () =>
        presenter.retractListing(publishedRef(listing)),
      );
    }

    const pending = await store.pendingListings.remove(userId);
    if (pending.isErr()) return ErrResult(storeFailure("pendingListings.remove", pending.error));

    const vouches = await store.vouches.removeInvolving(userId);
    if (vouches.isErr()) return ErrResult(storeFailure("vouches.removeInvolving", vouches.error));
    // Ratings the user gave are taken back from the other party's aggregate.
    await this.revertRatings(vouches.unwrap().filter((vouch) => vouch.ratedId !== userId));

    const pairs = await store.vouches.removePairsInvolving(userId);
    if (pairs.isErr()) return ErrResult(storeFailure("vouches.removePairsInvolving", pairs.error));

    const reputation = await store.reputation.remove(userId);
    if (reputation.isErr()) return ErrResult(storeFailure("reputation.remove", reputation.error));

    const report: ResetReport = {
      reputationRemoved: reputation.unwrap(),
      listingsRemoved,
      pendingListingRemoved: pending.unwrap(),
      vouchesRemoved: vouches.unwrap().length,
      pendingPairsRemoved: pairs.unwrap(),
    };
    logger.info("[reputation] user reset", { userId, ...report });
    return OkResult(report);
  }
}

export function createReputationService(deps: MarketDeps): ReputationService {
  return new ReputationServiceImpl(deps);
}
