/**
 * Motivación: mostrar ventas, compras, promedio de estrellas y últimos vouches de un usuario.
 */
import { createUserOption, Declare, type GuildCommandContext, Options, SubCommand } from "seyfert";
import { getMarket } from "@/modules/market/runtime";
import { buildStatsEmbed } from "@/modules/presentation/embeds";
import { replyError } from "@/modules/presentation/interaction";

const options = {
  user: createUserOption({
    description: "Trader to look up (defaults to you)",
    required: false,
  }),
};

@Declare({
  name: "stats",
  description: "Show a trader's sales, purchases and rating",
})
@Options(options)
export default class MarketStatsCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const target = ctx.options.user ?? ctx.author;
    const { reputation, vouches } = getMarket();

    const stats = await reputation.getStats(target.id, target.globalName ?? target.username);
    if (stats.isErr()) {
      await replyError(ctx, stats.error, "[market] stats failed");
      return;
    }

    const recent = await vouches.listReceived(target.id);
    if (recent.isErr()) {
      ctx.client.logger.warn("[market] could not load recent vouches", {
        userId: target.id,
        error: recent.error,
      });
    }

    await ctx.write({
      embeds: [buildStatsEmbed(stats.unwrap(), recent.unwrapOr([]))],
    });
  }
}
