import { createNullLogger, type Logger } from "@stowage/logger"
import type {
  BoundedCache,
  CacheEntry,
  CacheLookup,
  EraseHook,
} from "../ports/bounded-cache"
import type { EvictionPolicyKind } from "../ports/cache-eviction-policy"
import type { EntryStore } from "../ports/entry-store"
import type { EvictionPolicy } from "../ports/eviction-policy"
import {
  CacheInvariantError,
  InvalidCapacityError,
  KeyNotFoundError,
} from "./errors/cache-errors"
import { createEvictionPolicy } from "./policies/create-eviction-policy"

export type FixedSizeCacheOptions = {
  /**
   * Maximum number of entries. Must be a positive integer and cannot change
   * after construction.
   */
  capacity: number
}

export type FixedSizeCacheDeps<K, V> = {
  /**
   * Owned by the cache from here on. Must be empty.
   */
  policy: EvictionPolicy<K>

  /**
   * Owned by the cache from here on. Must be empty. Default: a new `Map`.
   */
  store?: EntryStore<K, CacheEntry<V>>

  onErase?: EraseHook<K, V>

  logger?: Logger
}

const noopEraseHook = (): void => {}

export class FixedSizeCache<K, V> implements BoundedCache<K, V> {
  readonly capacity: number

  private readonly policy: EvictionPolicy<K>
  private readonly store: EntryStore<K, CacheEntry<V>>
  private readonly onErase: EraseHook<K, V>
  private readonly logger: Logger

  public constructor(deps: FixedSizeCacheDeps<K, V>, opts: FixedSizeCacheOptions) {
    if (!Number.isSafeInteger(opts.capacity) || opts.capacity <= 0) {
      throw new InvalidCapacityError(opts.capacity)
    }

    const store = deps.store ?? new Map<K, CacheEntry<V>>()

    if (store.size !== 0 || deps.policy.size() !== 0) {
      throw new CacheInvariantError("Cache store and policy must start empty", {
        storeSize: store.size,
        policySize: deps.policy.size(),
      })
    }

    this.capacity = opts.capacity
    this.policy = deps.policy
    this.store = store
    this.onErase = deps.onErase ?? noopEraseHook
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "fixed-size-cache",
      policy: deps.policy.name,
    })
  }

  put(key: K, value: V): void {
    if (this.store.has(key)) {
      this.policy.touch(key)
      this.store.set(key, { value })

      return
    }

    if (this.store.size >= this.capacity) this.evict()

    this.policy.insert(key)
    this.store.set(key, { value })
  }

  tryGet(key: K): CacheLookup<V> {
    const entry = this.store.get(key)

    if (entry === undefined) return { kind: "miss" }

    this.policy.touch(key)

    return { kind: "hit", value: entry.value }
  }

  get(key: K): V {
    const res = this.tryGet(key)

    if (res.kind === "miss") throw new KeyNotFoundError(key)

    return res.value
  }

  has(key: K): boolean {
    return this.store.has(key)
  }

  size(): number {
    return this.store.size
  }

  remove(key: K): boolean {
    const entry = this.store.get(key)

    if (entry === undefined) return false

    this.erase(key, entry)

    return true
  }

  clear(): void {
    const size = this.store.size

    for (const [key] of this.store.entries()) {
      this.policy.erase(key)
    }

    this.store.clear()

    this.logger.debug("cache cleared", { size })
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, entry] of this.store.entries()) {
      yield [key, entry.value]
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.store.entries()) {
      yield key
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  private evict(): void {
    const victim = this.policy.replacementCandidate()
    const entry = this.store.get(victim)

    if (entry === undefined) {
      throw new CacheInvariantError("Eviction policy chose a key the cache does not hold", {
        policy: this.policy.name,
        key: victim,
      })
    }

    this.logger.debug("evicting entry", {
      key: victim,
      size: this.store.size,
      capacity: this.capacity,
    })

    this.erase(victim, entry)
  }

  private erase(key: K, entry: CacheEntry<V>): void {
    this.policy.erase(key)
    this.store.delete(key)

    this.onErase(key, entry.value)
  }
}

/**
 * Shorthand for `new FixedSizeCache({ policy, onErase }, { capacity })`.
 *
 * @example
 * ```ts
 * const sessions = createFixedSizeCache<string, Session>(1_000, "lru")
 *
 * sessions.put("s-1", session)
 * sessions.tryGet("s-1") // { kind: "hit", value: session }
 * ```
 */
export function createFixedSizeCache<K, V>(
  capacity: number,
  policy: EvictionPolicy<K> | EvictionPolicyKind = "none",
  onErase?: EraseHook<K, V>,
): FixedSizeCache<K, V> {
  return new FixedSizeCache<K, V>(
    {
      policy: typeof policy === "string" ? createEvictionPolicy<K>(policy) : policy,
      onErase,
    },
    { capacity },
  )
}
