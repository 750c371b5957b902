/**
 * @capstream/node — HTTP surface for the stream ledger.
 */

export { loadConfig, parseApiKeys, parseVaultSeed, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey, VaultSeedEntry } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { createGateway } from "./gateway.js";
export type { GatewayChoice } from "./gateway.js";
export { logLedgerEvents } from "./event-log.js";
export type { LedgerEventLogEntry } from "./event-log.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
