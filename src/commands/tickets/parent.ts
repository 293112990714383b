import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "ticket",
  description: "Support tickets",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class TicketParent extends Command {}
