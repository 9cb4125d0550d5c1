import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /**
   * Applied in order, later sources win. Default: `[new EnvSource()]`.
   */
  sources?: readonly ConfigSource[]
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: string) {
    super(`Configuration validation failed:\n${issues}`)
    this.name = "ConfigValidationError"
  }
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error))
  }

  const known = new Set(Object.keys(result.data))
  const usedProvenance: Record<string, string> = {}

  for (const [key, name] of Object.entries(provenance)) {
    if (known.has(key)) usedProvenance[key] = name
  }

  for (const key of known) {
    usedProvenance[key] ??= "default"
  }

  return new Config<T>(result.data, usedProvenance, new Set(Object.keys(merged)))
}
