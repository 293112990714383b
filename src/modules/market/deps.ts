/**
 * Dependencies shared by the marketplace services.
 *
 * The runtime builds one `MarketDeps` from the Seyfert client and the Mongo store; tests build it
 * from an in-memory store, a recording presenter and a fixed clock.
 */
import type { MarketSettings } from "@/configuration/market";
import type { MarketStore } from "@/db/store";
import type { MarketPresenter, TicketPresenter } from "./presenter";

/** Subset of Seyfert's `Logger` the services use. */
export interface MarketLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface MarketDeps {
  store: MarketStore;
  presenter: MarketPresenter;
  tickets: TicketPresenter;
  logger: MarketLogger;
  settings: MarketSettings;
  now: () => Date;
  sleep: (ms: number) => Promise<void>;
  generateId: () => string;
}

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs a non-critical side effect (message edit, DM, channel delete). Failures are logged under
 * `tag` with `context` and reported as `false`.
 */
export async function bestEffort(
  logger: MarketLogger,
  tag: string,
  context: Record<string, unknown>,
  effect: () => Promise<unknown>,
): Promise<boolean> {
  try {
    await effect();
    return true;
  } catch (error) {
    logger.warn(tag, { ...context, error });
    return false;
  }
}
