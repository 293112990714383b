/**
 * Motivación: abrir el formulario de venta cuando alguien pulsa un botón del panel del mercado.
 *
 * Alcance: solo muestra el modal; la validación ocurre al enviarlo (`sale_modal_handler`).
 */
import { ComponentCommand, type ComponentContext } from "seyfert";
import { buildSaleModal } from "@/modules/presentation/embeds";
import { parseCustomId } from "@/modules/presentation/custom-ids";

export default class MarketPanelButtons extends ComponentCommand {
  componentType = "Button" as const;

  filter(ctx: ComponentContext<"Button">) {
    return parseCustomId(ctx.customId)?.kind === "postListing";
  }

  async run(ctx: ComponentContext<"Button">) {
    const parsed = parseCustomId(ctx.customId);
    if (parsed?.kind !== "postListing") return;
    await ctx.interaction.modal(buildSaleModal(parsed.category));
  }
}
