/**
 * Unit Tests: Environment and marketplace settings
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import { loadEnv, routingFromEnv } from "@/configuration/env";
import { resolveMarketSettings } from "@/configuration/market";
import { expectErr, expectOk } from "../_utils/fixtures";

const VALID_ENV = {
  BOT_TOKEN: "test-token",
  MONGO_URI: "mongodb://localhost:27017",
  GUILD_ID: "100000000000000001",
  MAIN_LISTINGS_CHANNEL_ID: "100000000000000002",
  IRON_LISTINGS_CHANNEL_ID: "100000000000000003",
  TRADE_CATEGORY_ID: "100000000000000004",
  COMPLETED_SALES_CHANNEL_ID: "100000000000000005",
  VOUCH_LOG_CHANNEL_ID: "100000000000000006",
  TICKET_CATEGORY_ID: "100000000000000007",
  STAFF_ROLE_ID: "100000000000000008",
};

describe("loadEnv", () => {
  it("names every missing key", () => {
    expect(expectErr(loadEnv({})).message).toBe(
      "Invalid or missing environment variables: BOT_TOKEN, MONGO_URI, GUILD_ID, " +
        "MAIN_LISTINGS_CHANNEL_ID, IRON_LISTINGS_CHANNEL_ID, TRADE_CATEGORY_ID, " +
        "COMPLETED_SALES_CHANNEL_ID, VOUCH_LOG_CHANNEL_ID, TICKET_CATEGORY_ID, STAFF_ROLE_ID",
    );
  });

  it("rejects ids that are not snowflakes", () => {
    const error = expectErr(loadEnv({ ...VALID_ENV, GUILD_ID: "general" }));
    expect(error.message).toBe("Invalid or missing environment variables: GUILD_ID");
  });

  it("defaults the database name and builds the routing", () => {
    const env = expectOk(loadEnv(VALID_ENV));
    expect(env.DB_NAME).toBe("account_market");
    expect(routingFromEnv(env)).toEqual({
      guildId: "100000000000000001",
      mainListingsChannelId: "100000000000000002",
      ironListingsChannelId: "100000000000000003",
      tradeCategoryId: "100000000000000004",
      completedSalesChannelId: "100000000000000005",
      vouchLogChannelId: "100000000000000006",
      ticketCategoryId: "100000000000000007",
      staffRoleId: "100000000000000008",
    });
  });
});

describe("resolveMarketSettings", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses defaults when nothing is set", () => {
    expect(resolveMarketSettings({})).toEqual({
      maxActiveListings: 3,
      pendingListingTtlMs: 600_000,
      activeListingMaxAgeMs: 259_200_000,
      maxImages: 3,
      teardownDelayMs: 5_000,
      ratingPromptTtlMs: 300_000,
      sweepIntervalMs: 300_000,
      maxTicketsPerUser: 1,
    });
  });

  it("applies overrides", () => {
    const settings = resolveMarketSettings({ MARKET_MAX_IMAGES: "5", MARKET_TEARDOWN_DELAY_MS: "0" });
    expect(settings.maxImages).toBe(5);
    expect(settings.teardownDelayMs).toBe(0);
    expect(settings.maxActiveListings).toBe(3);
  });

  it("falls back to defaults on an invalid override", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const settings = resolveMarketSettings({ MARKET_MAX_ACTIVE_LISTINGS: "-1", MARKET_MAX_IMAGES: "5" });
    expect(settings.maxActiveListings).toBe(3);
    expect(settings.maxImages).toBe(3);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
