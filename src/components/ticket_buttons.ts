/**
 * Motivación: abrir y cerrar tickets de soporte desde sus botones.
 *
 * Gotchas:
 * - Cerrar espera el retardo y borra el canal; la respuesta final puede no llegar.
 */
import { ComponentCommand, type ComponentContext } from "seyfert";
import { getMarket } from "@/modules/market/runtime";
import { parseCustomId } from "@/modules/presentation/custom-ids";
import { actorFrom, replyEphemeral, replyError } from "@/modules/presentation/interaction";

export default class TicketButtons extends ComponentCommand {
  componentType = "Button" as const;

  filter(ctx: ComponentContext<"Button">) {
    const kind = parseCustomId(ctx.customId)?.kind;
    return kind === "ticketOpen" || kind === "ticketClose";
  }

  async run(ctx: ComponentContext<"Button">) {
    const parsed = parseCustomId(ctx.customId);
    if (!parsed) return;
    const market = getMarket();
    await ctx.deferReply(true);

    if (parsed.kind === "ticketOpen") {
      const res = await market.tickets.openTicket({
        id: ctx.author.id,
        name: ctx.author.globalName ?? ctx.author.username,
      });
      if (res.isErr()) {
        await replyError(ctx, res.error, "[tickets] open failed");
        return;
      }
      await replyEphemeral(ctx, `🎫 Your ticket is ready: <#${res.unwrap()._id}>`);
      return;
    }

    if (parsed.kind === "ticketClose") {
      const res = await market.tickets.closeTicket(parsed.channelId, actorFrom(ctx, market.staffRoleId));
      if (res.isErr()) {
        await replyError(ctx, res.error, "[tickets] close failed");
        return;
      }
      await replyEphemeral(ctx, "🔒 Ticket closed.").catch((error) => {
        ctx.client.logger.debug("[tickets] could not answer after closing", {
          channelId: parsed.channelId,
          error,
        });
      });
    }
  }
}
