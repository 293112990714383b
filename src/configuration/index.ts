export { EnvSchema, loadEnv, routingFromEnv, type BotEnv, type DiscordRouting } from "./env";
export {
  MarketSettingsSchema,
  resolveMarketSettings,
  type MarketSettings,
} from "./market";
