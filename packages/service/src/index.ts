/**
 * @navsync/service — Pool registry, configuration and logging.
 */

export { PoolService } from "./services/pool-service.js";
export type { PoolServiceConfig } from "./services/pool-service.js";
export { PoolRegistry } from "./services/pool-registry.js";
export type { PoolDefaults } from "./services/pool-registry.js";
export { loadConfig, parseTokenList, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { createApp, createBalanceReader } from "./app.js";
export type { CreateAppOptions } from "./app.js";
