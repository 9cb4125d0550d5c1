/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_CAPACITY: z.coerce.number().int().positive() }),
 *   sources: [new EnvSource({ prefix: "STOWAGE_" })],
 * })
 *
 * config.value.CACHE_CAPACITY     // 512
 * config.explain("CACHE_CAPACITY") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  /**
   * Name of the source that supplied the final value for `key`, or
   * "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Distinct source names behind the final values, in first-use order;
   * "default" appears when the schema filled in a value.
   */
  sourcesUsed(): string[]

  /**
   * Keys some source provided that the schema does not know about
   * (typos, stale settings).
   */
  unknownKeys(): string[]
}
