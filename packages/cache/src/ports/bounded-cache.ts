export type CacheHit<V> = {
  kind: "hit"
  value: V
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheLookup<V> = CacheHit<V> | CacheMiss

/**
 * Stored form of a value. Boxing lets `undefined` be cached like any other value.
 */
export type CacheEntry<V> = {
  readonly value: V
}

/**
 * Called once for every entry that leaves the cache through eviction or
 * `remove()`, after the cache has dropped it. Never called by `clear()`.
 *
 * Must not mutate the cache that calls it.
 */
export type EraseHook<K, V> = (key: K, value: V) => void

/**
 * A key-value cache holding at most `capacity` entries.
 */
export interface BoundedCache<K, V> extends Iterable<[K, V]> {
  readonly capacity: number

  /**
   * Insert or update. Updating an existing key counts as a use. Inserting a
   * new key into a full cache first evicts the policy's candidate.
   */
  put(key: K, value: V): void

  /**
   * Look up `key`. A hit counts as a use.
   */
  tryGet(key: K): CacheLookup<V>

  /**
   * Like `tryGet`, for callers that treat a miss as a bug.
   *
   * @throws KeyNotFoundError
   */
  get(key: K): V

  /**
   * Membership check. Does not count as a use.
   */
  has(key: K): boolean

  size(): number

  /**
   * Remove `key`, calling the erase hook if it was present.
   *
   * @returns whether the key was present
   */
  remove(key: K): boolean

  /**
   * Drop every entry without calling the erase hook.
   */
  clear(): void

  /**
   * Entries in storage order, which is unrelated to eviction order.
   */
  entries(): IterableIterator<[K, V]>

  keys(): IterableIterator<K>
}
