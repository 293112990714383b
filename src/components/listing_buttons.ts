/**
 * Motivación: manejar los botones Trade / Edit / Cancel de cada listado publicado.
 *
 * Idea/concepto: el id del listado viaja en el customId; los permisos (dueño, comprador) los decide
 * el servicio correspondiente.
 */
import { ComponentCommand, type ComponentContext } from "seyfert";
import { getMarket } from "@/modules/market/runtime";
import { MarketError } from "@/modules/market";
import { parseCustomId } from "@/modules/presentation/custom-ids";
import { buildEditModal } from "@/modules/presentation/embeds";
import { actorFrom, replyEphemeral, replyError } from "@/modules/presentation/interaction";

const KINDS = new Set(["listingTrade", "listingEdit", "listingCancel"]);

export default class ListingButtons extends ComponentCommand {
  componentType = "Button" as const;

  filter(ctx: ComponentContext<"Button">) {
    return KINDS.has(parseCustomId(ctx.customId)?.kind ?? "");
  }

  async run(ctx: ComponentContext<"Button">) {
    const parsed = parseCustomId(ctx.customId);
    if (!parsed) return;
    const market = getMarket();

    switch (parsed.kind) {
      case "listingTrade": {
        await ctx.deferReply(true);
        const res = await market.trades.start(parsed.listingId, actorFrom(ctx, market.staffRoleId));
        if (res.isErr()) {
          await replyError(ctx, res.error, "[trades] start failed");
          return;
        }
        await replyEphemeral(ctx, `🤝 Trade opened: <#${res.unwrap().channelId}>`);
        return;
      }

      case "listingEdit": {
        // The modal has to be the first response, so ownership is checked here before showing it.
        const found = await market.listings.getListing(parsed.listingId);
        if (found.isErr()) {
          await replyError(ctx, found.error, "[listings] edit lookup failed");
          return;
        }
        const listing = found.unwrap();
        if (!listing) {
          await replyError(ctx, new MarketError("NOT_FOUND", "This listing no longer exists."), "[listings] edit");
          return;
        }
        if (listing.ownerId !== ctx.author.id) {
          await replyError(ctx, new MarketError("FORBIDDEN", "Only the seller can edit this listing."), "[listings] edit");
          return;
        }
        await ctx.interaction.modal(buildEditModal(listing));
        return;
      }

      case "listingCancel": {
        await ctx.deferReply(true);
        const res = await market.listings.cancelListing(parsed.listingId, ctx.author.id);
        if (res.isErr()) {
          await replyError(ctx, res.error, "[listings] cancel failed");
          return;
        }
        await replyEphemeral(ctx, "🗑️ Your listing was removed.");
        return;
      }
    }
  }
}
