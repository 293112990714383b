/**
 * Motivación: recibir por DM las capturas de un listado pendiente.
 *
 * Idea/concepto: cualquier DM con imágenes se entrega a `ListingService.submitImages`; los errores
 * se contestan en el mismo DM. La confirmación con el enlace la manda el propio servicio.
 *
 * Alcance: mensajes de servidor, de bots o sin imágenes se ignoran.
 */
import { createEvent } from "seyfert";
import { imageUrls } from "@/modules/listings";
import { getMarket } from "@/modules/market/runtime";
import { isMarketError } from "@/modules/market";
import { describeMarketError } from "@/modules/presentation/messages";

export default createEvent({
  data: { name: "messageCreate" },
  async run(message, client) {
    if (message.author.bot || message.guildId) return;

    const images = imageUrls(message.attachments);
    if (!images.length) return;

    const res = await getMarket().listings.submitImages(message.author.id, images);
    if (res.isOk()) {
      client.logger.debug("[listings] screenshots received", {
        userId: message.author.id,
        listingId: res.unwrap()._id,
        count: images.length,
      });
      return;
    }

    if (!isMarketError(res.error) || res.error.code === "EXTERNAL_FAILURE") {
      client.logger.error("[listings] image submission failed", {
        userId: message.author.id,
        error: res.error,
      });
    }
    await message.reply({ content: describeMarketError(res.error) });
  },
});
