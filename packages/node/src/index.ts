/**
 * @concord/node — HTTP service for the Concord ledger.
 *
 * @packageDocumentation
 */

export { ConcordService } from "./services/concord-service.js";
export type {
  ConcordServiceConfig,
  GenesisBalance,
  TreasuryState,
  SignResult,
} from "./services/concord-service.js";
export { loadConfig, parseGenesisBalances, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
