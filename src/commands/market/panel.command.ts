/**
 * Motivación: publicar el panel con los botones para vender una cuenta.
 */
import { Declare, type GuildCommandContext, SubCommand } from "seyfert";
import { buildMarketPanel } from "@/modules/presentation/embeds";

@Declare({
  name: "panel",
  description: "Post the sell-an-account panel in this channel",
  defaultMemberPermissions: ["ManageGuild"],
})
export default class MarketPanelCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    await ctx.write(buildMarketPanel());
  }
}
