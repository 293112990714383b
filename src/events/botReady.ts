/**
 * Motivación: arrancar las tareas periódicas del mercado cuando el bot está listo.
 */
import { createEvent } from "seyfert";
import { startListingSweeper } from "@/modules/listings";
import { getMarket } from "@/modules/market/runtime";

export default createEvent({
  data: { name: "botReady", once: true },
  async run(user, client) {
    client.logger.info(`${user.username} encendido!`);
    const { listings, deps } = getMarket();
    startListingSweeper(listings, deps.logger, deps.settings.sweepIntervalMs);
  },
});
