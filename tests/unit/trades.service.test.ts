/**
 * Unit Tests: Trade sessions
 *
 * Purpose: confirmation in either order, single finalization, cancel dominance, overseer authority
 * and the history rollback path.
 */

import { describe, it, expect } from "vitest";
import {
  BUYER,
  completeTrade,
  createTestMarket,
  expectErr,
  expectOk,
  openTrade,
  OTHER,
  publishListing,
  SELLER,
  STAFF,
  START,
} from "../_utils/fixtures";

describe("start", () => {
  it("opens a negotiation channel with controls", async () => {
    const market = createTestMarket();
    const { listing, trade } = await openTrade(market);

    expect(trade).toMatchObject({
      _id: "id000002",
      listingId: listing._id,
      buyerId: BUYER.id,
      sellerId: SELLER.id,
      status: "NEGOTIATING",
      confirmedBy: [],
      channelId: "trade-channel-1",
      controlsMessageId: "msg-2",
      snapshot: { accountType: "Main - Maxed Pure", price: "250m GP", description: "99 range, 99 str, 1 def" },
    });
    expect(market.store.tradeRows.get(trade._id)?.status).toBe("NEGOTIATING");
    expect(market.store.reputationRows.has(BUYER.id)).toBe(true);
    expect(market.store.reputationRows.has(SELLER.id)).toBe(true);
  });

  it("refuses the seller's own listing", async () => {
    const market = createTestMarket();
    const listing = await publishListing(market);

    expect(expectErr(await market.trades.start(listing._id, SELLER)).code).toBe("SELF_TRADE");
    expect(market.presenter.callsOf("openNegotiationSpace")).toHaveLength(0);
  });

  it("refuses a second open trade for the same buyer and listing", async () => {
    const market = createTestMarket();
    const { listing } = await openTrade(market);

    const error = expectErr(await market.trades.start(listing._id, BUYER));
    expect(error.code).toBe("TRADE_ALREADY_OPEN");
    expect(error.message).toBe("You already have a trade open for this listing: <#trade-channel-1>.");
  });

  it("lets another buyer open a parallel trade", async () => {
    const market = createTestMarket();
    const { listing } = await openTrade(market);

    const second = expectOk(await market.trades.start(listing._id, OTHER));
    expect(second.channelId).toBe("trade-channel-2");
  });

  it("fails for a listing that is gone", async () => {
    const market = createTestMarket();
    expect(expectErr(await market.trades.start("missing", BUYER)).code).toBe("NOT_FOUND");
  });

  it("closes the channel when the controls cannot be posted", async () => {
    const market = createTestMarket();
    const listing = await publishListing(market);
    market.presenter.failOn("postControls");

    expect(expectErr(await market.trades.start(listing._id, BUYER)).code).toBe("EXTERNAL_FAILURE");
    expect(market.presenter.callsOf("closeSpace")).toEqual([{ method: "closeSpace", channelId: "trade-channel-1" }]);
    expect(market.store.tradeRows.size).toBe(0);
  });
});

describe("confirmCompletion", () => {
  it("waits for the other party", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);

    const outcome = expectOk(await market.trades.confirmCompletion(trade._id, BUYER));
    expect(outcome.state).toBe("WAITING");
    expect(outcome.state === "WAITING" ? outcome.waitingOn : null).toEqual([SELLER.id]);
    expect(market.presenter.callsOf("announce").map((call) => call.notice.kind)).toEqual(["CONFIRMATION_RECORDED"]);

    const again = expectOk(await market.trades.confirmCompletion(trade._id, BUYER));
    expect(again.state).toBe("WAITING");
    expect(market.store.tradeRows.get(trade._id)?.confirmedBy).toEqual([BUYER.id]);
  });

  it.each([
    { label: "buyer first", first: BUYER, second: SELLER },
    { label: "seller first", first: SELLER, second: BUYER },
  ])("completes when both confirm ($label)", async ({ first, second }) => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);

    expectOk(await market.trades.confirmCompletion(trade._id, first));
    const outcome = expectOk(await market.trades.confirmCompletion(trade._id, second));

    expect(outcome.state).toBe("COMPLETED");
    expect(outcome.trade.status).toBe("COMPLETED");
    expect(outcome.trade.closedBy).toBe(second.id);
    expect(market.store.historyRows.get(trade._id)).toMatchObject({
      buyerId: BUYER.id,
      sellerId: SELLER.id,
      accountType: "Main - Maxed Pure",
      price: "250m GP",
      completedAt: START,
    });
    expect(market.store.reputationRows.get(SELLER.id)?.sales).toBe(1);
    expect(market.store.reputationRows.get(BUYER.id)?.purchases).toBe(1);
    expect(market.store.listingRows.size).toBe(0);
  });

  it("runs the completion side effects", async () => {
    const market = createTestMarket();
    const { trade } = await completeTrade(market);

    expect(market.presenter.callsOf("logCompletedTrade")).toHaveLength(1);
    expect(market.presenter.callsOf("retractListing")).toHaveLength(1);
    expect(market.presenter.callsOf("promptRating").map((call) => call.prompt)).toEqual([
      {
        tradeId: trade._id,
        role: "buyer",
        raterId: BUYER.id,
        ratedId: SELLER.id,
        ratedName: SELLER.name,
        accountType: "Main - Maxed Pure",
        expiresAt: new Date(START.getTime() + 300_000),
      },
      {
        tradeId: trade._id,
        role: "seller",
        raterId: SELLER.id,
        ratedId: BUYER.id,
        ratedName: BUYER.name,
        accountType: "Main - Maxed Pure",
        expiresAt: new Date(START.getTime() + 300_000),
      },
    ]);
    expect(market.presenter.callsOf("disableControls")).toEqual([
      { method: "disableControls", channelId: "trade-channel-1", messageId: "msg-2", tradeId: trade._id },
    ]);
    expect(market.presenter.callsOf("announce").at(-1)?.notice).toEqual({
      kind: "TRADE_COMPLETED",
      tradeId: trade._id,
      closesInMs: 0,
    });
    expect(market.sleeps).toEqual([0]);
    expect(market.presenter.callsOf("closeSpace")).toEqual([{ method: "closeSpace", channelId: "trade-channel-1" }]);
  });

  it("finalizes once when confirmations race", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);
    expectOk(await market.trades.confirmCompletion(trade._id, BUYER));

    const results = await Promise.all([
      market.trades.confirmCompletion(trade._id, SELLER),
      market.trades.confirmCompletion(trade._id, STAFF),
    ]);

    const completed = results.filter((res) => res.isOk() && res.unwrap().state === "COMPLETED");
    expect(completed).toHaveLength(1);
    expect(market.store.historyRows.size).toBe(1);
    expect(market.store.reputationRows.get(SELLER.id)?.sales).toBe(1);
    expect(market.presenter.callsOf("promptRating")).toHaveLength(2);
  });

  it("rejects confirmations after completion", async () => {
    const market = createTestMarket();
    const { trade } = await completeTrade(market);

    expect(expectErr(await market.trades.confirmCompletion(trade._id, BUYER)).code).toBe("TRADE_CLOSED");
    expect(market.store.historyRows.size).toBe(1);
  });

  it("refuses outsiders", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);

    expect(expectErr(await market.trades.confirmCompletion(trade._id, OTHER)).code).toBe("UNAUTHORIZED");
    expect(expectErr(await market.trades.cancel(trade._id, OTHER)).code).toBe("UNAUTHORIZED");
  });

  it("counts an overseer as one confirmation", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);

    const first = expectOk(await market.trades.confirmCompletion(trade._id, STAFF));
    expect(first).toMatchObject({ state: "WAITING", waitingOn: [SELLER.id] });
    expect(first.trade.confirmedBy).toEqual([BUYER.id]);
    expect(market.store.historyRows.size).toBe(0);

    const second = expectOk(await market.trades.confirmCompletion(trade._id, STAFF));
    expect(second.state).toBe("COMPLETED");
    expect(second.trade.confirmedBy).toEqual([BUYER.id, SELLER.id]);
    expect(second.trade.closedBy).toBe(STAFF.id);
  });

  it("lets an overseer complete once one party has confirmed", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);
    expectOk(await market.trades.confirmCompletion(trade._id, SELLER));

    const outcome = expectOk(await market.trades.confirmCompletion(trade._id, STAFF));
    expect(outcome.state).toBe("COMPLETED");
    expect(outcome.trade.confirmedBy).toEqual([SELLER.id, BUYER.id]);
    expect(market.logger.messages("info")).toContain("[trades] overseer confirmed completion");
  });

  it("reopens the trade when history cannot be written", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);
    expectOk(await market.trades.confirmCompletion(trade._id, BUYER));
    market.store.failNext("history.append");

    const error = expectErr(await market.trades.confirmCompletion(trade._id, SELLER));
    expect(error.message).toBe("Store operation failed: history.append");
    expect(market.store.tradeRows.get(trade._id)?.status).toBe("NEGOTIATING");
    expect(market.store.reputationRows.get(SELLER.id)?.sales).toBe(0);

    const retried = expectOk(await market.trades.confirmCompletion(trade._id, SELLER));
    expect(retried.state).toBe("COMPLETED");
    expect(market.store.historyRows.size).toBe(1);
  });

  it("completes even when the channel is already gone", async () => {
    const market = createTestMarket();
    market.presenter.failOn("closeSpace");
    market.presenter.failOn("disableControls");

    const { trade } = await completeTrade(market);
    expect(trade.status).toBe("COMPLETED");
    expect(market.logger.messages("warn")).toEqual([
      "[trades] could not disable controls",
      "[trades] could not close trade channel",
    ]);
  });
});

describe("cancel", () => {
  it("closes the trade without history or rating prompts", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);

    const canceled = expectOk(await market.trades.cancel(trade._id, BUYER));
    expect(canceled.status).toBe("CANCELED");
    expect(canceled.closedBy).toBe(BUYER.id);
    expect(market.store.historyRows.size).toBe(0);
    expect(market.store.listingRows.size).toBe(1);
    expect(market.presenter.callsOf("promptRating")).toHaveLength(0);
    expect(
      market.presenter
        .callsOf("notifyUser")
        .filter((call) => call.notice.kind === "TRADE_CANCELED")
        .map((call) => call.userId),
    ).toEqual([BUYER.id, SELLER.id]);
    expect(market.presenter.callsOf("announce").at(-1)?.notice).toEqual({
      kind: "TRADE_CANCELED",
      tradeId: trade._id,
      canceledBy: BUYER.id,
      closesInMs: 0,
    });
    expect(market.presenter.callsOf("closeSpace")).toHaveLength(1);
  });

  it("wins over a partial confirmation", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);
    expectOk(await market.trades.confirmCompletion(trade._id, BUYER));

    expectOk(await market.trades.cancel(trade._id, SELLER));
    expect(expectErr(await market.trades.confirmCompletion(trade._id, SELLER)).code).toBe("TRADE_CLOSED");
    expect(market.store.historyRows.size).toBe(0);
    expect(market.store.reputationRows.get(SELLER.id)?.sales).toBe(0);
  });

  it("lets an overseer cancel", async () => {
    const market = createTestMarket();
    const { trade } = await openTrade(market);

    expect(expectOk(await market.trades.cancel(trade._id, STAFF)).closedBy).toBe(STAFF.id);
    expect(expectErr(await market.trades.cancel(trade._id, BUYER)).code).toBe("TRADE_CLOSED");
  });
});
