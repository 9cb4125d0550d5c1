import type { EvictionPolicy } from "../../ports/eviction-policy"
import { EmptyPolicyError } from "../errors/cache-errors"
import { KeyedOrderList } from "../order/keyed-order-list"

export class LifoEvictionPolicy<K> implements EvictionPolicy<K> {
  readonly name = "lifo"

  private readonly stack = new KeyedOrderList<K>()

  insert(key: K): void {
    this.stack.pushFront(key)
  }

  touch(_key: K): void {}

  erase(key: K): void {
    this.stack.remove(key)
  }

  replacementCandidate(): K {
    const newest = this.stack.front()

    if (newest === undefined) throw new EmptyPolicyError(this.name)

    return newest.key
  }

  size(): number {
    return this.stack.size
  }
}
