/**
 * Motivación: botones "Trade Completed" / "Trade Canceled" del canal privado de cada trade.
 *
 * Gotchas:
 * - El servicio espera el retardo de cierre y borra el canal antes de devolver; la respuesta
 *   final puede fallar si el canal ya no existe, y solo se loguea.
 */
import { ComponentCommand, type ComponentContext } from "seyfert";
import { getMarket } from "@/modules/market/runtime";
import { parseCustomId } from "@/modules/presentation/custom-ids";
import { actorFrom, replyEphemeral, replyError } from "@/modules/presentation/interaction";

export default class TradeButtons extends ComponentCommand {
  componentType = "Button" as const;

  filter(ctx: ComponentContext<"Button">) {
    const kind = parseCustomId(ctx.customId)?.kind;
    return kind === "tradeComplete" || kind === "tradeCancel";
  }

  async run(ctx: ComponentContext<"Button">) {
    const parsed = parseCustomId(ctx.customId);
    if (parsed?.kind !== "tradeComplete" && parsed?.kind !== "tradeCancel") return;

    const market = getMarket();
    const actor = actorFrom(ctx, market.staffRoleId);
    await ctx.deferReply(true);

    let reply: string;
    if (parsed.kind === "tradeComplete") {
      const res = await market.trades.confirmCompletion(parsed.tradeId, actor);
      if (res.isErr()) {
        await replyError(ctx, res.error, "[trades] confirm failed");
        return;
      }
      const outcome = res.unwrap();
      reply =
        outcome.state === "WAITING"
          ? "✅ Your confirmation is recorded."
          : "🎉 Trade completed. Check your DMs to leave a vouch.";
    } else {
      const res = await market.trades.cancel(parsed.tradeId, actor);
      if (res.isErr()) {
        await replyError(ctx, res.error, "[trades] cancel failed");
        return;
      }
      reply = "❌ Trade canceled.";
    }

    await replyEphemeral(ctx, reply).catch((error) => {
      ctx.client.logger.debug("[trades] could not answer after teardown", {
        tradeId: parsed.tradeId,
        error,
      });
    });
  }
}
