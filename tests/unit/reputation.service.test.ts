/**
 * Unit Tests: Reputation
 */

import { describe, it, expect } from "vitest";
import { averageRating } from "@/modules/reputation/service";
import {
  BUYER,
  completeTrade,
  createTestMarket,
  expectOk,
  publishListing,
  SELLER,
} from "../_utils/fixtures";

describe("averageRating", () => {
  it("rounds to one decimal", () => {
    expect(averageRating(5 + 5 + 4, 3)).toBe(4.7);
    expect(averageRating(9, 2)).toBe(4.5);
  });

  it("is undefined without ratings", () => {
    expect(averageRating(0, 0)).toBeUndefined();
  });
});

describe("getStats", () => {
  it("creates an empty row for a new user", async () => {
    const market = createTestMarket();

    expect(expectOk(await market.reputation.getStats("newcomer-1", "Newcomer"))).toEqual({
      userId: "newcomer-1",
      displayName: "Newcomer",
      sales: 0,
      purchases: 0,
      ratingTotal: 0,
      ratingCount: 0,
      average: undefined,
    });
    expect(market.store.reputationRows.has("newcomer-1")).toBe(true);
  });

  it("reports the running average", async () => {
    const market = createTestMarket();
    for (const stars of [5, 5, 4]) {
      expectOk(await market.reputation.applyRating(SELLER.id, stars, 1));
    }

    const stats = expectOk(await market.reputation.getStats(SELLER.id));
    expect(stats.ratingCount).toBe(3);
    expect(stats.average).toBe(4.7);
    expect(expectOk(await market.reputation.getAverageRating(SELLER.id))).toBe(4.7);
    expect(expectOk(await market.reputation.getAverageRating("unknown-1"))).toBeUndefined();
  });

  it("never drops below zero when ratings are reverted", async () => {
    const market = createTestMarket();
    expectOk(await market.reputation.applyRating(SELLER.id, 2, 1));

    const applied = await market.reputation.revertRatings([
      {
        _id: "t1:buyer-1",
        tradeId: "t1",
        role: "buyer",
        raterId: BUYER.id,
        ratedId: SELLER.id,
        stars: 5,
        comment: "",
        createdAt: new Date(0),
      },
    ]);
    expect(applied).toBe(1);
    expect(market.store.reputationRows.get(SELLER.id)).toMatchObject({ ratingTotal: 0, ratingCount: 0 });
  });
});

describe("resetUser", () => {
  it("wipes the user's market data but keeps trade history", async () => {
    const market = createTestMarket();
    await completeTrade(market);
    const tradeId = "id000002";
    expectOk(
      await market.vouches.submitRating({
        tradeId,
        role: "buyer",
        raterId: BUYER.id,
        ratedId: SELLER.id,
        stars: 5,
        comment: "great trade",
      }),
    );
    expectOk(
      await market.vouches.submitRating({
        tradeId,
        role: "seller",
        raterId: SELLER.id,
        ratedId: BUYER.id,
        stars: 4,
        comment: "fast payment",
      }),
    );
    await publishListing(market);
    expectOk(
      await market.listings.beginListing({
        owner: { id: SELLER.id, name: SELLER.name },
        accountType: "Ironman - Zerker",
        price: "90m GP",
        description: "45 def, 99 str",
      }),
    );

    const report = expectOk(await market.reputation.resetUser(SELLER.id));
    expect(report).toEqual({
      reputationRemoved: true,
      listingsRemoved: 1,
      pendingListingRemoved: true,
      vouchesRemoved: 2,
      pendingPairsRemoved: 0,
    });
    expect(market.store.reputationRows.has(SELLER.id)).toBe(false);
    expect(market.store.listingRows.size).toBe(0);
    expect(market.store.pendingRows.size).toBe(0);
    expect(market.store.vouchRows.size).toBe(0);
    expect(market.store.historyRows.size).toBe(1);
    // The rating the seller gave is taken back from the buyer.
    expect(market.store.reputationRows.get(BUYER.id)).toMatchObject({ purchases: 1, ratingTotal: 0, ratingCount: 0 });
  });

  it("reports nothing removed for an unknown user", async () => {
    const market = createTestMarket();

    expect(expectOk(await market.reputation.resetUser("ghost-1"))).toEqual({
      reputationRemoved: false,
      listingsRemoved: 0,
      pendingListingRemoved: false,
      vouchesRemoved: 0,
      pendingPairsRemoved: 0,
    });
  });
});
