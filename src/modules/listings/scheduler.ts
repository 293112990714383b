/**
 * Periodic expiry sweep for pending and active listings.
 */
import type { MarketLogger } from "@/modules/market/deps";
import type { ListingService } from "./service";

let timer: NodeJS.Timeout | null = null;
let ticking = false;

export function startListingSweeper(
  listings: ListingService,
  logger: MarketLogger,
  intervalMs: number,
): void {
  if (timer) return;
  timer = setInterval(() => {
    runListingSweep(listings, logger).catch((error) => {
      logger.error("[listings] sweep crashed", { error });
    });
  }, intervalMs);
  timer.unref?.();
}

export function stopListingSweeper(): void {
  if (!timer) return;
  clearInterval(timer);
  timer = null;
}

/** One sweep pass; overlapping calls are skipped while a pass is running. */
export async function runListingSweep(
  listings: ListingService,
  logger: MarketLogger,
): Promise<boolean> {
  if (ticking) return false;
  ticking = true;
  try {
    const res = await listings.sweepExpired();
    if (res.isErr()) {
      logger.error("[listings] sweep failed", { error: res.error });
    }
    return true;
  } finally {
    ticking = false;
  }
}
