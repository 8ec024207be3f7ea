/**
 * @capvault/node — HTTP service exposing a CapVault vault.
 */

export { VaultService } from "./services/vault-service.js";
export type { VaultServiceConfig } from "./services/vault-service.js";
export { buildMarket } from "./services/market.js";
export type { Market } from "./services/market.js";
export {
  loadConfig,
  loadMarketFile,
  parseApiKeys,
  ConfigSchema,
  MarketFileSchema,
} from "./config.js";
export type { AppConfig, MarketFile, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
