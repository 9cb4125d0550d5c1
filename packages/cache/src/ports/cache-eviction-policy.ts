export const evictionPolicyKinds = ["none", "fifo", "lifo", "lru"] as const

/**
 * No eviction order. Any tracked key may be chosen when room is needed.
 */
export type NoneEvictionPolicyKind = "none"

/**
 * First In, First Out: evicts the oldest inserted key. Reads and updates do
 * not change the order.
 */
export type FifoEvictionPolicyKind = "fifo"

/**
 * Last In, First Out: evicts the most recently inserted key. Reads and
 * updates do not change the order.
 */
export type LifoEvictionPolicyKind = "lifo"

/**
 * Least Recently Used: evicts the key that has gone longest without being
 * inserted, read or updated.
 */
export type LruEvictionPolicyKind = "lru"

export type EvictionPolicyKind =
  | NoneEvictionPolicyKind
  | FifoEvictionPolicyKind
  | LifoEvictionPolicyKind
  | LruEvictionPolicyKind
