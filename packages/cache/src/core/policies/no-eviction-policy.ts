import type { EvictionPolicy } from "../../ports/eviction-policy"
import { EmptyPolicyError } from "../errors/cache-errors"

/**
 * Tracks membership only. The replacement candidate is the first key the
 * backing set yields, i.e. the oldest insert still tracked. That order is
 * deterministic but not part of the contract; callers must not depend on it.
 */
export class NoEvictionPolicy<K> implements EvictionPolicy<K> {
  readonly name = "none"

  private readonly keys = new Set<K>()

  insert(key: K): void {
    this.keys.add(key)
  }

  touch(_key: K): void {}

  erase(key: K): void {
    this.keys.delete(key)
  }

  replacementCandidate(): K {
    for (const key of this.keys) return key

    throw new EmptyPolicyError(this.name)
  }

  size(): number {
    return this.keys.size
  }
}
