/**
 * Motivación: punto de arranque del bot del mercado de cuentas.
 *
 * Idea/concepto: valida el entorno, construye los servicios del mercado sobre el cliente de Seyfert
 * y deja que Seyfert cargue comandos, componentes y eventos desde `dist/`.
 *
 * Alcance: orquesta el bootstrap y la subida de comandos; no contiene reglas de negocio.
 */
import "module-alias/register";
import "dotenv/config";

import type { ParseClient } from "seyfert";
import { Client } from "seyfert";
import { loadEnv } from "@/configuration";
import { disconnectDb, getDb } from "@/db/mongo";
import { stopListingSweeper } from "@/modules/listings";
import { initMarket } from "@/modules/market/runtime";

const client = new Client<true>();

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  if (env.isErr()) throw env.error;

  console.log("[bootstrap] Starting bot...");
  await getDb();
  initMarket(client, env.unwrap());
  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  client.logger.info(`[bootstrap] ${signal} received, shutting down`);
  stopListingSweeper();
  await disconnectDb();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("[bootstrap] Shutdown failed:", error);
      process.exit(1);
    });
  });
}

bootstrap().catch((error) => {
  console.error("[bootstrap] Failed to start bot:", error);
  process.exitCode = 1;
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {}
}
