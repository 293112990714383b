/**
 * Repositorios de base de datos (MongoDB).
 *
 * Este directorio es el único lugar donde se habla "Mongo" (colecciones, queries, upserts). El
 * resto del bot consume el contrato `MarketStore` de `@/db/store`.
 *
 * Alcance:
 * - CRUD + operaciones atómicas por documento.
 * - Validación vía schemas (Zod).
 * - No implementa reglas de negocio (eso vive en `modules/*`).
 */
import type { MarketStore } from "@/db/store";
import { mongoListingRepository, mongoPendingListingRepository } from "./listings";
import { mongoReputationRepository } from "./reputation";
import { mongoTicketRepository } from "./tickets";
import { mongoTradeHistoryRepository, mongoTradeRepository } from "./trades";
import { mongoVouchRepository } from "./vouches";

export function createMongoMarketStore(): MarketStore {
  return {
    reputation: mongoReputationRepository,
    pendingListings: mongoPendingListingRepository,
    listings: mongoListingRepository,
    trades: mongoTradeRepository,
    history: mongoTradeHistoryRepository,
    vouches: mongoVouchRepository,
    tickets: mongoTicketRepository,
  };
}

export {
  mongoListingRepository,
  mongoPendingListingRepository,
  mongoReputationRepository,
  mongoTicketRepository,
  mongoTradeHistoryRepository,
  mongoTradeRepository,
  mongoVouchRepository,
};
