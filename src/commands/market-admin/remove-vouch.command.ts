import { createStringOption, Declare, type GuildCommandContext, Options, SubCommand } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { getMarket } from "@/modules/market/runtime";
import { shortId } from "@/modules/market";
import { replyError } from "@/modules/presentation/interaction";

const options = {
  trade: createStringOption({
    description: "Trade id the vouches belong to",
    required: true,
  }),
};

@Declare({
  name: "remove-vouch",
  description: "Remove the vouches of one trade",
})
@Options(options)
export default class RemoveVouchCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const tradeId = ctx.options.trade.trim();
    const res = await getMarket().vouches.removeVouchesForTrade(tradeId);
    if (res.isErr()) {
      await replyError(ctx, res.error, "[marketadmin] remove-vouch failed");
      return;
    }

    const { removed } = res.unwrap();
    await ctx.write({
      content: removed
        ? `🗑️ Removed ${removed} vouch(es) from trade \`${shortId(tradeId)}\`.`
        : `No vouches found for trade \`${shortId(tradeId)}\`.`,
      flags: MessageFlags.Ephemeral,
    });
  }
}
