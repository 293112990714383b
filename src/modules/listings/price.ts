/**
 * Price grammar for listings.
 *
 * `[currency] amount [k|m|b] [unit words]`, case-insensitive. Examples: `250m GP`, `250m OSRS GP`,
 * `$150`, `1.5b`, `2,500k gp`, `150 usd`.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { MarketError } from "@/modules/market/types";

export const MAX_PRICE_LENGTH = 100;

const MULTIPLIERS = { k: 1e3, m: 1e6, b: 1e9 } as const;
type Multiplier = keyof typeof MULTIPLIERS;

const PRICE_PATTERN =
  /^([$€£])?\s*(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)\s*([kmb](?![a-z]))?\s*([a-z][a-z .]{0,23})?$/i;

export interface ParsedPrice {
  /** Trimmed input, as stored and displayed. */
  raw: string;
  currency: string | null;
  amount: number;
  multiplier: Multiplier | null;
  unit: string | null;
  /** `amount` scaled by the multiplier. */
  value: number;
}

const isMultiplier = (value: string): value is Multiplier => value in MULTIPLIERS;

export function parsePrice(input: string): Result<ParsedPrice, MarketError> {
  const raw = input.trim();
  if (!raw) {
    return ErrResult(new MarketError("VALIDATION", "Price is required."));
  }
  if (raw.length > MAX_PRICE_LENGTH) {
    return ErrResult(
      new MarketError("VALIDATION", `Price must be at most ${MAX_PRICE_LENGTH} characters.`),
    );
  }

  const match = PRICE_PATTERN.exec(raw);
  if (!match) {
    return ErrResult(
      new MarketError("VALIDATION", "Price must start with an amount, e.g. `250m GP` or `$150`."),
    );
  }

  const [, currency, amountText, multiplierText, unitText] = match;
  const amount = Number((amountText ?? "").replace(/,/g, ""));
  const key = (multiplierText ?? "").toLowerCase();
  const multiplier = isMultiplier(key) ? key : null;
  const value = multiplier ? amount * MULTIPLIERS[multiplier] : amount;

  if (!Number.isFinite(value) || value <= 0) {
    return ErrResult(new MarketError("VALIDATION", "Price must be greater than zero."));
  }

  return OkResult({
    raw,
    currency: currency ?? null,
    amount,
    multiplier,
    unit: unitText?.trim() || null,
    value,
  });
}

/** `1_500_000` -> `1.5M`; used by embeds next to the raw price. */
export function formatPriceValue(value: number): string {
  const scales: Array<[number, string]> = [
    [1e9, "B"],
    [1e6, "M"],
    [1e3, "K"],
  ];
  for (const [scale, suffix] of scales) {
    if (value >= scale) {
      return `${Number((value / scale).toFixed(2))}${suffix}`;
    }
  }
  return `${Number(value.toFixed(2))}`;
}
