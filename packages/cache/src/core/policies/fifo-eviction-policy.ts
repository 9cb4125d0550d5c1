import type { EvictionPolicy } from "../../ports/eviction-policy"
import { EmptyPolicyError } from "../errors/cache-errors"
import { KeyedOrderList } from "../order/keyed-order-list"

export class FifoEvictionPolicy<K> implements EvictionPolicy<K> {
  readonly name = "fifo"

  private readonly queue = new KeyedOrderList<K>()

  insert(key: K): void {
    this.queue.pushFront(key)
  }

  // Insertion order only.
  touch(_key: K): void {}

  erase(key: K): void {
    this.queue.remove(key)
  }

  replacementCandidate(): K {
    const oldest = this.queue.back()

    if (oldest === undefined) throw new EmptyPolicyError(this.name)

    return oldest.key
  }

  size(): number {
    return this.queue.size
  }
}
