/**
 * Decides which key a bounded cache discards when it is full.
 *
 * A policy only tracks keys, never values. The cache that owns it keeps the
 * policy's key set equal to its own: every stored key is inserted exactly
 * once and erased exactly once.
 */
export interface EvictionPolicy<K> {
  /**
   * Kind name, used in log records.
   */
  readonly name: string

  /**
   * Start tracking `key`. Inserting a key that is already tracked is a no-op
   * and never creates a second order entry.
   */
  insert(key: K): void

  /**
   * Record a use of `key` (a read hit or an update). No-op for unknown keys.
   */
  touch(key: K): void

  /**
   * Stop tracking `key`. No-op for unknown keys.
   */
  erase(key: K): void

  /**
   * The key to evict next. Does not stop tracking it.
   *
   * @throws EmptyPolicyError when no key is tracked.
   */
  replacementCandidate(): K

  size(): number
}
