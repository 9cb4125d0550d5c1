export {
  type CacheConfig,
  type CacheFromConfigDeps,
  cacheConfigSchema,
  createCacheFromConfig,
  DEFAULT_ENV_PREFIX,
  loadCacheConfig,
} from "./core/config/cache-config"
export {
  CacheInvariantError,
  EmptyPolicyError,
  InvalidCapacityError,
  KeyNotFoundError,
} from "./core/errors/cache-errors"
export {
  createFixedSizeCache,
  FixedSizeCache,
  type FixedSizeCacheDeps,
  type FixedSizeCacheOptions,
} from "./core/fixed-size-cache"
export { KeyedOrderList } from "./core/order/keyed-order-list"
export { createEvictionPolicy } from "./core/policies/create-eviction-policy"
export { FifoEvictionPolicy } from "./core/policies/fifo-eviction-policy"
export { LifoEvictionPolicy } from "./core/policies/lifo-eviction-policy"
export { LruEvictionPolicy } from "./core/policies/lru-eviction-policy"
export { NoEvictionPolicy } from "./core/policies/no-eviction-policy"
export type {
  BoundedCache,
  CacheEntry,
  CacheHit,
  CacheLookup,
  CacheMiss,
  EraseHook,
} from "./ports/bounded-cache"
export {
  type EvictionPolicyKind,
  evictionPolicyKinds,
  type FifoEvictionPolicyKind,
  type LifoEvictionPolicyKind,
  type LruEvictionPolicyKind,
  type NoneEvictionPolicyKind,
} from "./ports/cache-eviction-policy"
export type { EntryStore } from "./ports/entry-store"
export type { EvictionPolicy } from "./ports/eviction-policy"
