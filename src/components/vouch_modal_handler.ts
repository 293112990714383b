/**
 * Motivación: registrar la calificación (estrellas + comentario) enviada desde el DM del trade.
 *
 * Idea/concepto: el customId trae trade, rol y estrellas; el calificado se deduce del trade para
 * que nadie pueda calificar a un tercero.
 */
import { ModalCommand, type ModalContext } from "seyfert";
import { getMarket } from "@/modules/market/runtime";
import { MarketError } from "@/modules/market";
import { COMMENT_INPUT, parseCustomId } from "@/modules/presentation/custom-ids";
import { getTextInput, replyEphemeral, replyError } from "@/modules/presentation/interaction";
import { partiesFor } from "@/modules/vouches";

export default class VouchModalHandler extends ModalCommand {
  filter(ctx: ModalContext) {
    return parseCustomId(ctx.customId)?.kind === "rateComment";
  }

  async run(ctx: ModalContext) {
    const parsed = parseCustomId(ctx.customId);
    if (parsed?.kind !== "rateComment") return;
    await ctx.deferReply(true);

    const { trades, vouches } = getMarket();
    const found = await trades.get(parsed.tradeId);
    if (found.isErr()) {
      await replyError(ctx, found.error, "[vouches] trade lookup failed");
      return;
    }
    const trade = found.unwrap();
    if (!trade) {
      await replyError(ctx, new MarketError("NOT_FOUND", "This trade no longer exists."), "[vouches]");
      return;
    }

    const res = await vouches.submitRating({
      tradeId: parsed.tradeId,
      role: parsed.role,
      raterId: ctx.author.id,
      ratedId: partiesFor(trade, parsed.role).ratedId,
      stars: parsed.stars,
      comment: getTextInput(ctx, COMMENT_INPUT),
    });
    if (res.isErr()) {
      await replyError(ctx, res.error, "[vouches] submit failed");
      return;
    }

    const outcome = res.unwrap();
    if (outcome.published) {
      await replyEphemeral(ctx, "🙏 Thanks! Both vouches are in and have been posted.");
    } else if (outcome.replaced) {
      await replyEphemeral(ctx, "✏️ Your vouch was updated. It will be posted once the other party rates.");
    } else {
      await replyEphemeral(ctx, "🙏 Thanks! Your vouch will be posted once the other party rates.");
    }
  }
}
