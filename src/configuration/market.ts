/**
 * Marketplace tunables.
 *
 * Role in system:
 * - Caps, windows and delays used by the listing, trade, vouch and ticket services.
 * - Every value has a default and can be overridden with a `MARKET_*` environment variable.
 *
 * Gotchas:
 * - Tests build settings with `resolveMarketSettings({})` plus overrides, never from `process.env`.
 */
import { z } from "zod";

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

export const MarketSettingsSchema = z.object({
  maxActiveListings: positiveInt(3),
  pendingListingTtlMs: positiveInt(10 * MINUTE),
  activeListingMaxAgeMs: positiveInt(72 * HOUR),
  maxImages: positiveInt(3),
  teardownDelayMs: nonNegativeInt(5_000),
  ratingPromptTtlMs: positiveInt(5 * MINUTE),
  sweepIntervalMs: positiveInt(5 * MINUTE),
  maxTicketsPerUser: positiveInt(1),
});

export type MarketSettings = z.infer<typeof MarketSettingsSchema>;

const ENV_KEYS: Record<keyof MarketSettings, string> = {
  maxActiveListings: "MARKET_MAX_ACTIVE_LISTINGS",
  pendingListingTtlMs: "MARKET_PENDING_LISTING_TTL_MS",
  activeListingMaxAgeMs: "MARKET_ACTIVE_LISTING_MAX_AGE_MS",
  maxImages: "MARKET_MAX_IMAGES",
  teardownDelayMs: "MARKET_TEARDOWN_DELAY_MS",
  ratingPromptTtlMs: "MARKET_RATING_PROMPT_TTL_MS",
  sweepIntervalMs: "MARKET_SWEEP_INTERVAL_MS",
  maxTicketsPerUser: "MARKET_MAX_TICKETS_PER_USER",
};

/** Resolves settings from `MARKET_*` variables; unknown or empty values fall back to defaults. */
export function resolveMarketSettings(
  source: Record<string, string | undefined> = process.env,
): MarketSettings {
  const raw: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = source[envKey]?.trim();
    if (value) raw[field] = value;
  }

  const parsed = MarketSettingsSchema.safeParse(raw);
  if (parsed.success) return parsed.data;

  console.warn("[config] invalid MARKET_* overrides; using defaults", parsed.error.issues);
  return MarketSettingsSchema.parse({});
}
