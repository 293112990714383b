/**
 * Motivación: agrupar los subcomandos públicos del mercado de cuentas bajo `/market`.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "market",
  description: "Account marketplace",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class MarketParent extends Command {}
