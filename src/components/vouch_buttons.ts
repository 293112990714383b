import { ComponentCommand, type ComponentContext } from "seyfert";
import { buildCommentModal } from "@/modules/presentation/embeds";
import { parseCustomId } from "@/modules/presentation/custom-ids";

/** Star buttons of the rating DM: open the comment modal carrying the chosen rating. */
export default class VouchButtons extends ComponentCommand {
  componentType = "Button" as const;

  filter(ctx: ComponentContext<"Button">) {
    return parseCustomId(ctx.customId)?.kind === "rateStars";
  }

  async run(ctx: ComponentContext<"Button">) {
    const parsed = parseCustomId(ctx.customId);
    if (parsed?.kind !== "rateStars") return;
    await ctx.interaction.modal(buildCommentModal(parsed.tradeId, parsed.role, parsed.stars));
  }
}
