/**
 * Loads raw configuration values. Validation, coercion and merging happen in
 * `loadConfig`; later sources override earlier ones there.
 */
export interface ConfigSource {
  /**
   * Shown by `IConfig.explain()`, e.g. "env" or "object:overrides".
   */
  readonly name: string

  /**
   * A key mapped to `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
