import { createUserOption, Declare, type GuildCommandContext, Options, SubCommand } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { getMarket } from "@/modules/market/runtime";
import { replyError } from "@/modules/presentation/interaction";

const options = {
  rater: createUserOption({
    description: "User who left the vouches",
    required: true,
  }),
  rated: createUserOption({
    description: "User who received the vouches",
    required: true,
  }),
};

@Declare({
  name: "remove-vouches-between",
  description: "Remove every vouch one user left for another",
})
@Options(options)
export default class RemoveVouchesBetweenCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { rater, rated } = ctx.options;
    const res = await getMarket().vouches.removeVouchesBetween(rater.id, rated.id);
    if (res.isErr()) {
      await replyError(ctx, res.error, "[marketadmin] remove-vouches-between failed");
      return;
    }

    await ctx.write({
      content: `🗑️ Removed ${res.unwrap().removed} vouch(es) from <@${rater.id}> to <@${rated.id}>.`,
      flags: MessageFlags.Ephemeral,
    });
  }
}
