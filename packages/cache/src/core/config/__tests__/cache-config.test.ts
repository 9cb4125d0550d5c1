import { ConfigValidationError, EnvSource, ObjectSource } from "@stowage/config"
import {
  type LogContextPatch,
  type LoggerOptions,
  NullLogger,
  type PinoLoggerDeps,
} from "@stowage/logger"
import { FixedSizeCache } from "../../fixed-size-cache"
import { createCacheFromConfig, loadCacheConfig } from "../cache-config"

const pinoLoggerOptions = vi.hoisted((): Partial<LoggerOptions>[] => [])

vi.mock("@stowage/logger", async (importOriginal) => {
  const mod = await importOriginal<typeof import("@stowage/logger")>()

  class RecordingPinoLogger extends mod.PinoLogger {
    constructor(
      deps: PinoLoggerDeps = {},
      opts: Partial<LoggerOptions> = {},
      context: LogContextPatch = {},
    ) {
      super(deps, { ...opts, prettify: false }, context)
      pinoLoggerOptions.push(opts)
    }
  }

  return { ...mod, PinoLogger: RecordingPinoLogger }
})

beforeEach(() => {
  pinoLoggerOptions.length = 0
})

describe("loadCacheConfig", () => {
  it("reads prefixed variables and applies defaults", async () => {
    const config = await loadCacheConfig([
      new EnvSource({ prefix: "STOWAGE_", env: { STOWAGE_CACHE_CAPACITY: "256" } }),
    ])

    expect(config.value).toEqual({
      CACHE_CAPACITY: 256,
      CACHE_POLICY: "lru",
      LOG_LEVEL: "info",
      LOG_PRETTY: false,
    })
    expect(config.explain("CACHE_CAPACITY")).toBe("env:STOWAGE_")
    expect(config.explain("CACHE_POLICY")).toBe("default")
    expect(config.explain("LOG_PRETTY")).toBe("default")
  })

  it.each([
    ["true", true],
    ["1", true],
    ["false", false],
    ["0", false],
  ])("reads LOG_PRETTY=%s as %s", async (raw, expected) => {
    const config = await loadCacheConfig([
      new EnvSource({ env: { CACHE_CAPACITY: "4", LOG_PRETTY: raw } }),
    ])

    expect(config.value.LOG_PRETTY).toBe(expected)
  })

  it("lets later sources override the policy", async () => {
    const config = await loadCacheConfig([
      new EnvSource({ env: { CACHE_CAPACITY: "8", CACHE_POLICY: "fifo" } }),
      new ObjectSource({ CACHE_POLICY: "lifo" }),
    ])

    expect(config.value.CACHE_POLICY).toBe("lifo")
    expect(config.explain("CACHE_POLICY")).toBe("object:overrides")
  })

  it("reads STOWAGE_ variables from process.env by default", async () => {
    vi.stubEnv("STOWAGE_CACHE_CAPACITY", "12")
    vi.stubEnv("STOWAGE_CACHE_POLICY", "none")

    try {
      const config = await loadCacheConfig()

      expect(config.value.CACHE_CAPACITY).toBe(12)
      expect(config.value.CACHE_POLICY).toBe("none")
    } finally {
      vi.unstubAllEnvs()
    }
  })

  it.each([
    ["missing capacity", {}],
    ["zero capacity", { CACHE_CAPACITY: "0" }],
    ["fractional capacity", { CACHE_CAPACITY: "2.5" }],
    ["unknown policy", { CACHE_CAPACITY: "2", CACHE_POLICY: "random" }],
    ["unknown log level", { CACHE_CAPACITY: "2", LOG_LEVEL: "verbose" }],
    ["non-boolean pretty flag", { CACHE_CAPACITY: "2", LOG_PRETTY: "sometimes" }],
  ])("rejects %s", async (_label, env) => {
    await expect(loadCacheConfig([new EnvSource({ env })])).rejects.toBeInstanceOf(
      ConfigValidationError,
    )
  })
})

describe("createCacheFromConfig", () => {
  it("builds a cache with the configured capacity and policy", () => {
    const onErase = vi.fn()
    const cache = createCacheFromConfig<string, number>(
      { CACHE_CAPACITY: 2, CACHE_POLICY: "lifo", LOG_LEVEL: "info", LOG_PRETTY: false },
      { onErase, logger: new NullLogger() },
    )

    cache.put("a", 1)
    cache.put("b", 2)
    cache.put("c", 3)

    expect(cache).toBeInstanceOf(FixedSizeCache)
    expect(cache.capacity).toBe(2)
    expect(onErase).toHaveBeenCalledExactlyOnceWith("b", 2)
    expect(pinoLoggerOptions).toEqual([])
  })

  it("creates its own logger when none is given", () => {
    const cache = createCacheFromConfig<string, number>({
      CACHE_CAPACITY: 1,
      CACHE_POLICY: "fifo",
      LOG_LEVEL: "fatal",
      LOG_PRETTY: false,
    })

    cache.put("a", 1)
    cache.put("b", 2)

    expect([...cache]).toEqual([["b", 2]])
    expect(pinoLoggerOptions).toEqual([{ level: "fatal", prettify: false }])
  })

  it("asks the pino logger for pretty output when LOG_PRETTY is set", () => {
    createCacheFromConfig<string, number>({
      CACHE_CAPACITY: 1,
      CACHE_POLICY: "lru",
      LOG_LEVEL: "debug",
      LOG_PRETTY: true,
    })

    expect(pinoLoggerOptions).toEqual([{ level: "debug", prettify: true }])
  })
})
