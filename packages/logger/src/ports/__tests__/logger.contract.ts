import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ module: "sessions" }).child({ policy: "lru" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ module: "sessions", policy: "lru" })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ policy: "fifo" }).child({ policy: "lifo" }).info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.policy).toBe("lifo")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ module: "sessions" })
      const child = parent.child({ policy: "lru" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ module: "sessions" })
      expect(logs[0]?.payload).not.toHaveProperty("policy")
      expect(logs[1]?.payload).toMatchObject({ module: "sessions", policy: "lru" })

      clear()

      expect(read()).toEqual([])
    })

    it("per-call meta is included in the entry", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "sessions" }).debug("evicted", { key: "a", size: 3 })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.level).toBe("debug")
      expect(logs[0]?.payload).toMatchObject({ module: "sessions", key: "a", size: 3 })
    })

    it("level filtering: entries below the configured minimum are dropped", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")
      logger.fatal("fatal")

      expect(read().map((l) => l.level)).toEqual(["warn", "error", "fatal"])
    })
  })
}
