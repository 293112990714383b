/**
 * Motivación: herramientas de staff para corregir reputación y vouches.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "marketadmin",
  description: "Marketplace moderation tools",
  defaultMemberPermissions: ["ManageGuild"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class MarketAdminParent extends Command {}
