import { Declare, type GuildCommandContext, SubCommand } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { getMarket } from "@/modules/market/runtime";
import { replyError } from "@/modules/presentation/interaction";

@Declare({
  name: "stats",
  description: "Show how many support tickets are open",
  defaultMemberPermissions: ["ManageChannels"],
})
export default class TicketStatsCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const res = await getMarket().tickets.getCounts();
    if (res.isErr()) {
      await replyError(ctx, res.error, "[tickets] stats failed");
      return;
    }

    const { open, total } = res.unwrap();
    await ctx.write({
      content: `🎫 Open tickets: **${open}** · All time: **${total}**`,
      flags: MessageFlags.Ephemeral,
    });
  }
}
