/**
 * Motivación: construir una sola vez los servicios del mercado con sus dependencias reales.
 *
 * Idea/concepto: `initMarket` se llama en el bootstrap con el cliente y el entorno ya validado;
 * comandos, componentes y eventos obtienen los servicios con `getMarket()`.
 *
 * Alcance: wiring; la lógica vive en cada servicio.
 */
import type { UsingClient } from "seyfert";
import { type BotEnv, resolveMarketSettings, routingFromEnv } from "@/configuration";
import { createMongoMarketStore } from "@/db/repositories";
import { DiscordMarketPresenter, DiscordTicketPresenter } from "@/modules/presentation/discord";
import { generateId } from "@/utils/ids";
import { delay } from "./deps";
import { createMarketServices, type MarketServices } from "./services";

let market: MarketServices | null = null;

export function initMarket(client: UsingClient, env: BotEnv): MarketServices {
  if (market) return market;
  const routing = routingFromEnv(env);
  market = createMarketServices(
    {
      store: createMongoMarketStore(),
      presenter: new DiscordMarketPresenter(client, routing),
      tickets: new DiscordTicketPresenter(client, routing),
      logger: client.logger,
      settings: resolveMarketSettings(),
      now: () => new Date(),
      sleep: delay,
      generateId,
    },
    routing.staffRoleId,
  );
  return market;
}

export function getMarket(): MarketServices {
  if (!market) throw new Error("[market] services used before initMarket()");
  return market;
}
