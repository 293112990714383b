import { Declare, type GuildCommandContext, SubCommand } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { getMarket } from "@/modules/market/runtime";
import { buildListingsEmbed } from "@/modules/presentation/embeds";
import { replyError } from "@/modules/presentation/interaction";

@Declare({
  name: "listings",
  description: "Show your active listings",
})
export default class MarketListingsCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const res = await getMarket().listings.listByOwner(ctx.author.id);
    if (res.isErr()) {
      await replyError(ctx, res.error, "[market] listings failed");
      return;
    }

    await ctx.write({
      embeds: [buildListingsEmbed(res.unwrap())],
      flags: MessageFlags.Ephemeral,
    });
  }
}
