import { type ConfigSource, EnvSource, type IConfig, loadConfig } from "@stowage/config"
import { type Logger, logLevelNames, PinoLogger } from "@stowage/logger"
import { z } from "zod"
import type { EraseHook } from "../../ports/bounded-cache"
import { evictionPolicyKinds } from "../../ports/cache-eviction-policy"
import { FixedSizeCache } from "../fixed-size-cache"
import { createEvictionPolicy } from "../policies/create-eviction-policy"

export const cacheConfigSchema = z.object({
  CACHE_CAPACITY: z.coerce.number().int().positive(),
  CACHE_POLICY: z.enum(evictionPolicyKinds).default("lru"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type CacheConfig = z.infer<typeof cacheConfigSchema>

export const DEFAULT_ENV_PREFIX = "STOWAGE_"

/**
 * Reads `STOWAGE_CACHE_CAPACITY`, `STOWAGE_CACHE_POLICY`, `STOWAGE_LOG_LEVEL`
 * and `STOWAGE_LOG_PRETTY` from the environment unless other sources are given.
 */
export function loadCacheConfig(
  sources: readonly ConfigSource[] = [new EnvSource({ prefix: DEFAULT_ENV_PREFIX })],
): Promise<IConfig<CacheConfig>> {
  return loadConfig({ schema: cacheConfigSchema, sources })
}

export type CacheFromConfigDeps<K, V> = {
  onErase?: EraseHook<K, V>

  /**
   * Default: a pino logger at `LOG_LEVEL`, pretty-printed when `LOG_PRETTY`.
   */
  logger?: Logger
}

export function createCacheFromConfig<K, V>(
  config: Readonly<CacheConfig>,
  deps: CacheFromConfigDeps<K, V> = {},
): FixedSizeCache<K, V> {
  return new FixedSizeCache<K, V>(
    {
      policy: createEvictionPolicy<K>(config.CACHE_POLICY),
      onErase: deps.onErase,
      logger:
        deps.logger ??
        new PinoLogger({}, { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY }),
    },
    { capacity: config.CACHE_CAPACITY },
  )
}
