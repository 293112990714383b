import { Declare, type GuildCommandContext, SubCommand } from "seyfert";
import { buildTicketPanel } from "@/modules/presentation/embeds";

@Declare({
  name: "panel",
  description: "Post the open-a-ticket panel in this channel",
  defaultMemberPermissions: ["ManageChannels"],
})
export default class TicketPanelCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.write(buildTicketPanel());
  }
}
