import { resolveMarketSettings, type MarketSettings } from "@/configuration/market";
import type { MarketLogger } from "@/modules/market/deps";
import { createMarketServices, type MarketServices } from "@/modules/market/services";
import type { Actor, MarketError } from "@/modules/market/types";
import type { Result } from "@/utils/result";
import { FakeMarketPresenter, FakeTicketPresenter } from "./fake-presenter";
import { MemoryMarketStore } from "./memory-store";

export const START = new Date("2026-03-01T12:00:00.000Z");
export const STAFF_ROLE = "staff-role";

export const SELLER: Actor = { id: "seller-1", name: "Seller", overseer: false };
export const BUYER: Actor = { id: "buyer-1", name: "Buyer", overseer: false };
export const OTHER: Actor = { id: "other-1", name: "Other", overseer: false };
export const STAFF: Actor = { id: "staff-1", name: "Staff", overseer: true };

export type LogEntry = { level: keyof MarketLogger; message: unknown; context: unknown };

export class RecordingLogger implements MarketLogger {
  readonly entries: LogEntry[] = [];

  private push(level: keyof MarketLogger, args: unknown[]): void {
    this.entries.push({ level, message: args[0], context: args[1] });
  }

  debug(...args: unknown[]): void {
    this.push("debug", args);
  }
  info(...args: unknown[]): void {
    this.push("info", args);
  }
  warn(...args: unknown[]): void {
    this.push("warn", args);
  }
  error(...args: unknown[]): void {
    this.push("error", args);
  }

  messages(level: keyof MarketLogger): unknown[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export class TestClock {
  private current: number;

  constructor(start: Date = START) {
    this.current = start.getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface TestMarket extends MarketServices {
  store: MemoryMarketStore;
  presenter: FakeMarketPresenter;
  ticketPresenter: FakeTicketPresenter;
  logger: RecordingLogger;
  clock: TestClock;
  sleeps: number[];
}

export function createTestMarket(overrides: Partial<MarketSettings> = {}): TestMarket {
  const store = new MemoryMarketStore();
  const presenter = new FakeMarketPresenter();
  const ticketPresenter = new FakeTicketPresenter();
  const logger = new RecordingLogger();
  const clock = new TestClock();
  const sleeps: number[] = [];
  let seq = 0;

  const services = createMarketServices(
    {
      store: store.asStore(),
      presenter,
      tickets: ticketPresenter,
      logger,
      settings: { ...resolveMarketSettings({}), teardownDelayMs: 0, ...overrides },
      now: clock.now,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      generateId: () => {
        seq += 1;
        return `id${String(seq).padStart(6, "0")}`;
      },
    },
    STAFF_ROLE,
  );

  return { ...services, store, presenter, ticketPresenter, logger, clock, sleeps };
}

export function expectOk<T, E>(res: Result<T, E>): T {
  if (res.isErr()) throw res.error;
  return res.unwrap();
}

export function expectErr<T, E = MarketError>(res: Result<T, E>): E {
  if (res.isOk()) throw new Error(`expected an error, got ${JSON.stringify(res.value)}`);
  return res.error;
}

export const ONE_IMAGE = ["https://cdn.example.test/shot-1.png"];
export const THREE_IMAGES = [
  "https://cdn.example.test/shot-1.png",
  "https://cdn.example.test/shot-2.png",
  "https://cdn.example.test/shot-3.png",
];

/** Runs the two-step sale flow and returns the published listing. */
export async function publishListing(
  market: TestMarket,
  owner: Actor = SELLER,
  fields: { accountType?: string; price?: string; description?: string } = {},
) {
  expectOk(
    await market.listings.beginListing({
      owner: { id: owner.id, name: owner.name },
      accountType: fields.accountType ?? "Main - Maxed Pure",
      price: fields.price ?? "250m GP",
      description: fields.description ?? "99 range, 99 str, 1 def",
    }),
  );
  return expectOk(await market.listings.submitImages(owner.id, ONE_IMAGE));
}

/** Publishes a listing and opens a trade on it for `buyer`. */
export async function openTrade(market: TestMarket, buyer: Actor = BUYER, seller: Actor = SELLER) {
  const listing = await publishListing(market, seller);
  const trade = expectOk(await market.trades.start(listing._id, buyer));
  return { listing, trade };
}

/** Both parties confirm; returns the completed trade. */
export async function completeTrade(market: TestMarket, buyer: Actor = BUYER, seller: Actor = SELLER) {
  const { listing, trade } = await openTrade(market, buyer, seller);
  expectOk(await market.trades.confirmCompletion(trade._id, buyer));
  const outcome = expectOk(await market.trades.confirmCompletion(trade._id, seller));
  return { listing, trade: outcome.trade };
}
