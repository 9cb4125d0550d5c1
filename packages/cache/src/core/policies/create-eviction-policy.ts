import type { EvictionPolicyKind } from "../../ports/cache-eviction-policy"
import type { EvictionPolicy } from "../../ports/eviction-policy"
import { FifoEvictionPolicy } from "./fifo-eviction-policy"
import { LifoEvictionPolicy } from "./lifo-eviction-policy"
import { LruEvictionPolicy } from "./lru-eviction-policy"
import { NoEvictionPolicy } from "./no-eviction-policy"

export function createEvictionPolicy<K>(kind: EvictionPolicyKind): EvictionPolicy<K> {
  switch (kind) {
    case "none":
      return new NoEvictionPolicy<K>()
    case "fifo":
      return new FifoEvictionPolicy<K>()
    case "lifo":
      return new LifoEvictionPolicy<K>()
    case "lru":
      return new LruEvictionPolicy<K>()
  }
}
