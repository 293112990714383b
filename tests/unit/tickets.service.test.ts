/**
 * Unit Tests: Support tickets
 */

import { describe, it, expect } from "vitest";
import { BUYER, createTestMarket, expectErr, expectOk, OTHER, STAFF } from "../_utils/fixtures";

const USER = { id: BUYER.id, name: BUYER.name };

describe("openTicket", () => {
  it("creates a private channel and welcomes the user", async () => {
    const market = createTestMarket();

    const ticket = expectOk(await market.tickets.openTicket(USER));
    expect(ticket).toMatchObject({ _id: "ticket-channel-1", userId: BUYER.id, status: "open", closedBy: null });
    expect(market.ticketPresenter.calls).toEqual([
      { method: "openTicketChannel", userId: BUYER.id },
      { method: "postTicketWelcome", channelId: "ticket-channel-1", userId: BUYER.id },
    ]);
  });

  it("limits open tickets per user", async () => {
    const market = createTestMarket();
    expectOk(await market.tickets.openTicket(USER));

    const error = expectErr(await market.tickets.openTicket(USER));
    expect(error.code).toBe("QUOTA_EXCEEDED");
    expect(error.message).toBe("You already have an open ticket.");
    expect(market.store.ticketRows.size).toBe(1);
  });

  it("keeps only the oldest ticket when two opens race", async () => {
    const market = createTestMarket();

    const [first, second] = await Promise.all([
      market.tickets.openTicket(USER),
      market.tickets.openTicket(USER),
    ]);

    expect(expectOk(first)._id).toBe("ticket-channel-1");
    expect(expectErr(second).code).toBe("QUOTA_EXCEEDED");
    expect([...market.store.ticketRows.keys()]).toEqual(["ticket-channel-1"]);
    expect(market.ticketPresenter.calls).toContainEqual({ method: "closeTicketChannel", channelId: "ticket-channel-2" });
    expect(market.ticketPresenter.calls).not.toContainEqual({
      method: "postTicketWelcome",
      channelId: "ticket-channel-2",
      userId: BUYER.id,
    });
    expect(market.logger.messages("warn")).toEqual(["[tickets] concurrent open over the limit; rolling back"]);
  });

  it("deletes the channel when the ticket cannot be saved", async () => {
    const market = createTestMarket();
    market.store.failNext("tickets.insert");

    expect(expectErr(await market.tickets.openTicket(USER)).code).toBe("EXTERNAL_FAILURE");
    expect(market.ticketPresenter.calls.at(-1)).toEqual({ method: "closeTicketChannel", channelId: "ticket-channel-1" });
  });
});

describe("closeTicket", () => {
  it("closes for the owner and deletes the channel", async () => {
    const market = createTestMarket();
    const ticket = expectOk(await market.tickets.openTicket(USER));

    const closed = expectOk(await market.tickets.closeTicket(ticket._id, BUYER));
    expect(closed).toMatchObject({ status: "closed", closedBy: BUYER.id });
    expect(market.ticketPresenter.calls.slice(2)).toEqual([
      {
        method: "announce",
        channelId: "ticket-channel-1",
        notice: { kind: "TICKET_CLOSING", closedBy: BUYER.id, closesInMs: 0 },
      },
      { method: "closeTicketChannel", channelId: "ticket-channel-1" },
    ]);
    expect(expectErr(await market.tickets.closeTicket(ticket._id, BUYER)).code).toBe("TICKET_CLOSED");
  });

  it("lets staff close any ticket", async () => {
    const market = createTestMarket();
    const ticket = expectOk(await market.tickets.openTicket(USER));

    expect(expectErr(await market.tickets.closeTicket(ticket._id, OTHER)).code).toBe("FORBIDDEN");
    expect(expectOk(await market.tickets.closeTicket(ticket._id, STAFF)).closedBy).toBe(STAFF.id);
  });

  it("rejects channels that are not tickets", async () => {
    const market = createTestMarket();
    expect(expectErr(await market.tickets.closeTicket("general", STAFF)).code).toBe("NOT_FOUND");
  });

  it("allows a new ticket once the previous one is closed", async () => {
    const market = createTestMarket();
    const first = expectOk(await market.tickets.openTicket(USER));
    expectOk(await market.tickets.closeTicket(first._id, BUYER));

    expect(expectOk(await market.tickets.openTicket(USER))._id).toBe("ticket-channel-2");
  });
});

describe("getCounts", () => {
  it("counts open and all-time tickets", async () => {
    const market = createTestMarket();
    const first = expectOk(await market.tickets.openTicket(USER));
    expectOk(await market.tickets.openTicket({ id: OTHER.id, name: OTHER.name }));
    expectOk(await market.tickets.closeTicket(first._id, STAFF));

    expect(expectOk(await market.tickets.getCounts())).toEqual({ open: 1, total: 2 });
  });
});
