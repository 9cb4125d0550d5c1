/**
 * Key-value storage behind a bounded cache. A `Map` satisfies it as is.
 *
 * Implementations must keep keys unique and should offer O(1) expected-time
 * lookup, insert and delete. The cache never calls `set` for a new key while
 * `size` is at capacity.
 */
export interface EntryStore<K, V> {
  readonly size: number

  get(key: K): V | undefined
  has(key: K): boolean
  set(key: K, value: V): unknown
  delete(key: K): boolean
  clear(): void
  entries(): Iterable<[K, V]>
}
