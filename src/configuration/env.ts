/**
 * Process environment for the bot.
 *
 * Role in system:
 * - Single place where `process.env` is read and validated (Zod).
 * - Channel/role ids the presenter needs to route listings, trades, vouches and tickets.
 *
 * Invariants:
 * - A missing required key is a fatal startup error naming every missing key.
 */
import { z } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";

const Snowflake = z.string().trim().regex(/^\d{5,25}$/, "expected a Discord id");

export const EnvSchema = z.object({
  BOT_TOKEN: z.string().trim().min(1),
  MONGO_URI: z.string().trim().min(1),
  DB_NAME: z.string().trim().min(1).default("account_market"),
  GUILD_ID: Snowflake,
  MAIN_LISTINGS_CHANNEL_ID: Snowflake,
  IRON_LISTINGS_CHANNEL_ID: Snowflake,
  TRADE_CATEGORY_ID: Snowflake,
  COMPLETED_SALES_CHANNEL_ID: Snowflake,
  VOUCH_LOG_CHANNEL_ID: Snowflake,
  TICKET_CATEGORY_ID: Snowflake,
  STAFF_ROLE_ID: Snowflake,
});

export type BotEnv = z.infer<typeof EnvSchema>;

/** Ids the Discord presenter routes messages and channels to. */
export interface DiscordRouting {
  guildId: string;
  mainListingsChannelId: string;
  ironListingsChannelId: string;
  tradeCategoryId: string;
  completedSalesChannelId: string;
  vouchLogChannelId: string;
  ticketCategoryId: string;
  staffRoleId: string;
}

type EnvSource = Record<string, string | undefined>;

export function loadEnv(source: EnvSource = process.env): Result<BotEnv> {
  const parsed = EnvSchema.safeParse(source);
  if (parsed.success) return OkResult(parsed.data);

  const keys = parsed.error.issues.map((issue) => issue.path.join("."));
  return ErrResult(
    new Error(`Invalid or missing environment variables: ${[...new Set(keys)].join(", ")}`),
  );
}

export function routingFromEnv(env: BotEnv): DiscordRouting {
  return {
    guildId: env.GUILD_ID,
    mainListingsChannelId: env.MAIN_LISTINGS_CHANNEL_ID,
    ironListingsChannelId: env.IRON_LISTINGS_CHANNEL_ID,
    tradeCategoryId: env.TRADE_CATEGORY_ID,
    completedSalesChannelId: env.COMPLETED_SALES_CHANNEL_ID,
    vouchLogChannelId: env.VOUCH_LOG_CHANNEL_ID,
    ticketCategoryId: env.TICKET_CATEGORY_ID,
    staffRoleId: env.STAFF_ROLE_ID,
  };
}
