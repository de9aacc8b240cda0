export {
  DEFAULT_ADMIN_CACHE_TTL_MS,
  DEFAULT_ADMIN_LOOKUP_TIMEOUT_MS,
  DEFAULT_LOCK_DATA_PATH,
  DEFAULT_ROLE_CACHE_TTL_MS,
  GroupwardenConfigSchema,
  loadConfigFromEnv,
  validateConfig,
  type ConfigValidationResult,
  type GroupwardenConfig,
  type GroupwardenConfigInput,
} from "./config/config.js";
export { GroupwardenEngine, type GroupwardenEngineOptions } from "./engine.js";
export { DEFAULT_CACHE_MAX_ENTRIES, TtlCache, type Clock, type TtlCacheOptions } from "./infra/ttl-cache.js";
export { KeyedLock } from "./infra/keyed-lock.js";
export { TimeoutError, runWithTimeout } from "./infra/timeout.js";
export { createSubsystemLogger, type LogLevel, type SubsystemLogger } from "./logger.js";
export * from "./locks/index.js";
export * from "./rbac/index.js";
