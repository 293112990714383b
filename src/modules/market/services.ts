/**
 * Builds every marketplace service over one set of dependencies.
 */
import { createListingService, type ListingService } from "@/modules/listings";
import { createReputationService, type ReputationService } from "@/modules/reputation";
import { createTicketService, type TicketService } from "@/modules/tickets";
import { createTradeService, type TradeService } from "@/modules/trades";
import { createVouchService, type VouchService } from "@/modules/vouches";
import type { MarketDeps } from "./deps";

export interface MarketServices {
  deps: MarketDeps;
  staffRoleId: string;
  listings: ListingService;
  trades: TradeService;
  vouches: VouchService;
  reputation: ReputationService;
  tickets: TicketService;
}

/** Builds every service over the same deps. Tests call it with in-memory deps. */
export function createMarketServices(deps: MarketDeps, staffRoleId: string): MarketServices {
  const reputation = createReputationService(deps);
  const vouches = createVouchService(deps, reputation);
  return {
    deps,
    staffRoleId,
    listings: createListingService(deps),
    trades: createTradeService(deps, reputation, vouches),
    vouches,
    reputation,
    tickets: createTicketService(deps),
  };
}
