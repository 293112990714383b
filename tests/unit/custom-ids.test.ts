/**
 * Unit Tests: Component custom ids
 *
 * Purpose: every id the builders emit must parse back to its target; foreign ids must not.
 */

import { describe, it, expect } from "vitest";
import { CustomIds, parseCustomId } from "@/modules/presentation/custom-ids";

describe("parseCustomId", () => {
  it("parses panel and sale modal ids", () => {
    expect(parseCustomId(CustomIds.postListing("iron"))).toEqual({ kind: "postListing", category: "iron" });
    expect(parseCustomId(CustomIds.saleModal("main"))).toEqual({ kind: "saleModal", category: "main" });
  });

  it("parses listing actions", () => {
    expect(parseCustomId("listing:trade:id000001")).toEqual({ kind: "listingTrade", listingId: "id000001" });
    expect(parseCustomId(CustomIds.listingEditModal("id000001"))).toEqual({
      kind: "listingEditModal",
      listingId: "id000001",
    });
  });

  it("parses trade controls", () => {
    expect(parseCustomId(CustomIds.tradeCancel("id000002"))).toEqual({ kind: "tradeCancel", tradeId: "id000002" });
  });

  it("parses rating ids with role and stars", () => {
    expect(parseCustomId(CustomIds.rateStars("id000002", "buyer", 5))).toEqual({
      kind: "rateStars",
      tradeId: "id000002",
      role: "buyer",
      stars: 5,
    });
    expect(parseCustomId("vouch:comment:id000002:seller:4")).toEqual({
      kind: "rateComment",
      tradeId: "id000002",
      role: "seller",
      stars: 4,
    });
  });

  it("parses ticket ids", () => {
    expect(parseCustomId(CustomIds.ticketOpen())).toEqual({ kind: "ticketOpen" });
    expect(parseCustomId(CustomIds.ticketClose("ticket-channel-1"))).toEqual({
      kind: "ticketClose",
      channelId: "ticket-channel-1",
    });
  });

  describe("foreign or malformed ids", () => {
    it.each([
      "market:post:gold",
      "listing:trade",
      "listing:sell:id000001",
      "trade:complete:a:b",
      "vouch:stars:id000002:admin:5",
      "vouch:stars:id000002:buyer:x",
      "ticket:open:extra",
      "economy:deposit:10",
    ])("returns null for %s", (customId) => {
      expect(parseCustomId(customId)).toBeNull();
    });
  });
});
