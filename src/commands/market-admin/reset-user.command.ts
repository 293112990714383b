/**
 * Reset completo de un usuario: reputación, listados y vouches. El historial de trades se conserva.
 */
import { createUserOption, Declare, type GuildCommandContext, Options, SubCommand } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { getMarket } from "@/modules/market/runtime";
import { replyError } from "@/modules/presentation/interaction";

const options = {
  user: createUserOption({
    description: "User to reset",
    required: true,
  }),
};

@Declare({
  name: "reset-user",
  description: "Delete a user's reputation, listings and vouches (trade history is kept)",
})
@Options(options)
export default class ResetUserCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user } = ctx.options;
    await ctx.deferReply(true);

    const res = await getMarket().reputation.resetUser(user.id);
    if (res.isErr()) {
      await replyError(ctx, res.error, "[marketadmin] reset-user failed");
      return;
    }

    const report = res.unwrap();
    ctx.client.logger.info("[marketadmin] user reset", { userId: user.id, by: ctx.author.id, report });
    await ctx.editOrReply({
      content: [
        `♻️ Reset <@${user.id}>:`,
        `- Listings removed: ${report.listingsRemoved}${report.pendingListingRemoved ? " (+1 pending)" : ""}`,
        `- Vouches removed: ${report.vouchesRemoved}`,
        `- Pending vouch pairs removed: ${report.pendingPairsRemoved}`,
        `- Reputation row removed: ${report.reputationRemoved ? "yes" : "no"}`,
      ].join("\n"),
      flags: MessageFlags.Ephemeral,
    });
  }
}
