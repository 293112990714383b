/**
 * Motivación: convertir el formulario de venta en un listado pendiente y pedir capturas por DM.
 */
import { ModalCommand, type ModalContext } from "seyfert";
import { getMarket } from "@/modules/market/runtime";
import { formatAccountType } from "@/modules/market";
import { parseCustomId, SALE_INPUT } from "@/modules/presentation/custom-ids";
import { getTextInput, replyEphemeral, replyError } from "@/modules/presentation/interaction";

export default class SaleModalHandler extends ModalCommand {
  filter(ctx: ModalContext) {
    return parseCustomId(ctx.customId)?.kind === "saleModal";
  }

  async run(ctx: ModalContext) {
    const parsed = parseCustomId(ctx.customId);
    if (parsed?.kind !== "saleModal") return;
    await ctx.deferReply(true);

    const label = getTextInput(ctx, SALE_INPUT.accountType);
    const res = await getMarket().listings.beginListing({
      owner: { id: ctx.author.id, name: ctx.author.globalName ?? ctx.author.username },
      accountType: label.trim() ? formatAccountType(parsed.category, label) : "",
      price: getTextInput(ctx, SALE_INPUT.price),
      description: getTextInput(ctx, SALE_INPUT.description),
    });

    if (res.isErr()) {
      await replyError(ctx, res.error, "[market] begin listing failed");
      return;
    }
    await replyEphemeral(ctx, "📩 Check your DMs and send the screenshots of the account there.");
  }
}
