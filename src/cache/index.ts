/**
 * Persistent stores and the two-tier validation cache.
 */

export {
  MemoryKeyValueStore,
  JsonFileKeyValueStore,
  StoreError,
  systemClock,
  type KeyValueStore,
  type Clock,
} from "./store.js";
export {
  ValidationCache,
  type CacheCodec,
  type CacheEntry,
  type CacheStats,
  type ValidationCacheOptions,
} from "./validation-cache.js";
