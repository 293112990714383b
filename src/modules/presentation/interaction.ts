/**
 * Helpers shared by the market commands and component handlers.
 */
import type { CommandContext, ComponentContext, ModalContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { type Actor, isMarketError } from "@/modules/market/types";
import { describeMarketError } from "./messages";

type AnyContext = CommandContext | ComponentContext<"Button"> | ModalContext;

/** The reply surface every context shares. */
interface ReplyTarget {
  author: { id: string };
  client: { logger: { error(...args: unknown[]): void } };
  editOrReply(body: { content: string; flags: MessageFlags }): Promise<unknown>;
}

/** Resolves the acting user; holding the staff role makes them an overseer. */
export function actorFrom(ctx: AnyContext, staffRoleId: string): Actor {
  return {
    id: ctx.author.id,
    name: ctx.author.globalName ?? ctx.author.username,
    overseer: ctx.member?.roles.keys.includes(staffRoleId) ?? false,
  };
}

/** The submitted modal; its inputs are read from the interaction, not the context. */
export interface ModalInputSource {
  interaction: { getInputValue(customId: string): unknown };
}

export function getTextInput(ctx: ModalInputSource, id: string): string {
  const value = ctx.interaction.getInputValue(id);
  return typeof value === "string" ? value : "";
}

export async function replyEphemeral(ctx: ReplyTarget, content: string): Promise<void> {
  await ctx.editOrReply({ content, flags: MessageFlags.Ephemeral });
}

/** Logs unexpected failures and answers with the short user-facing text. */
export async function replyError(ctx: ReplyTarget, error: unknown, tag: string): Promise<void> {
  if (!isMarketError(error) || error.code === "EXTERNAL_FAILURE") {
    ctx.client.logger.error(tag, { error, userId: ctx.author.id });
  }
  await replyEphemeral(ctx, describeMarketError(error));
}
