export {
  isEntryLive,
  resolveExpiry,
  type CacheEntry,
  type CacheStore,
} from "./cache/cache-store.js";
export {
  MemoryCacheStore,
  createMemoryCacheStore,
  type MemoryCacheStoreOptions,
} from "./cache/memory-cache-store.js";
export {
  startExpirySweeper,
  type ExpirySweeper,
} from "./cache/expiry-sweeper.js";
export {
  createCacheFromConfig,
  getAppConfig,
  type AppConfig,
} from "./config/app-config.js";
