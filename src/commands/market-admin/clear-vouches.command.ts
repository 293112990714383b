import { createUserOption, Declare, type GuildCommandContext, Options, SubCommand } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { getMarket } from "@/modules/market/runtime";
import { replyError } from "@/modules/presentation/interaction";

const options = {
  user: createUserOption({
    description: "User whose received vouches and rating are cleared",
    required: true,
  }),
};

@Declare({
  name: "clear-vouches",
  description: "Clear every vouch a user received and zero their rating",
})
@Options(options)
export default class ClearVouchesCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user } = ctx.options;
    const res = await getMarket().vouches.clearUserVouches(user.id);
    if (res.isErr()) {
      await replyError(ctx, res.error, "[marketadmin] clear-vouches failed");
      return;
    }

    ctx.client.logger.info("[marketadmin] vouches cleared", {
      userId: user.id,
      by: ctx.author.id,
      removed: res.unwrap().removed,
    });
    await ctx.write({
      content: `🧹 Cleared ${res.unwrap().removed} vouch(es) for <@${user.id}>. Their rating is reset.`,
      flags: MessageFlags.Ephemeral,
    });
  }
}
