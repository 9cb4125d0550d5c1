import type { EvictionPolicy } from "../../ports/eviction-policy"
import { EmptyPolicyError } from "../errors/cache-errors"
import { KeyedOrderList } from "../order/keyed-order-list"

/**
 * Keeps keys ordered by last use: inserts and touches move a key to the
 * front, the back is evicted first.
 */
export class LruEvictionPolicy<K> implements EvictionPolicy<K> {
  readonly name = "lru"

  private readonly recency = new KeyedOrderList<K>()

  insert(key: K): void {
    this.recency.pushFront(key)
  }

  touch(key: K): void {
    this.recency.moveToFront(key)
  }

  erase(key: K): void {
    this.recency.remove(key)
  }

  replacementCandidate(): K {
    const leastRecent = this.recency.back()

    if (leastRecent === undefined) throw new EmptyPolicyError(this.name)

    return leastRecent.key
  }

  size(): number {
    return this.recency.size
  }

  /**
   * Keys from most to least recently used.
   */
  keys(): IterableIterator<K> {
    return this.recency.keys()
  }
}
