import { ModalCommand, type ModalContext } from "seyfert";
import { getMarket } from "@/modules/market/runtime";
import { parseCustomId, SALE_INPUT } from "@/modules/presentation/custom-ids";
import { getTextInput, replyEphemeral, replyError } from "@/modules/presentation/interaction";

export default class ListingEditModal extends ModalCommand {
  filter(ctx: ModalContext) {
    return parseCustomId(ctx.customId)?.kind === "listingEditModal";
  }

  async run(ctx: ModalContext) {
    const parsed = parseCustomId(ctx.customId);
    if (parsed?.kind !== "listingEditModal") return;
    await ctx.deferReply(true);

    const res = await getMarket().listings.editListing(parsed.listingId, ctx.author.id, {
      accountType: getTextInput(ctx, SALE_INPUT.accountType),
      price: getTextInput(ctx, SALE_INPUT.price),
      description: getTextInput(ctx, SALE_INPUT.description),
    });
    if (res.isErr()) {
      await replyError(ctx, res.error, "[listings] edit failed");
      return;
    }
    await replyEphemeral(ctx, "✏️ Listing updated.");
  }
}
