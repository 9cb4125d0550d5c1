import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  make: () => ConfigSource
  expectedValue: () => Record<string, unknown>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let source: ConfigSource

    beforeEach(() => {
      source = h.make()
    })

    it("has a non-empty name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to a plain object", async () => {
      const result = await source.load()

      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("load() is idempotent", async () => {
      expect(await source.load()).toEqual(await source.load())
    })

    it("load() does not leak a mutable reference", async () => {
      const first = await source.load()
      first.__MUTATED__ = "x"

      expect(await source.load()).not.toHaveProperty("__MUTATED__")
    })

    it("load() returns expected values", async () => {
      expect(await source.load()).toMatchObject(h.expectedValue())
    })
  })
}
