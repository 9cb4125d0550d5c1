import type { ConfigSource } from "../../ports/source"

/**
 * In-code values, typically placed last to override everything else.
 */
export class ObjectSource implements ConfigSource {
  private readonly values: Readonly<Record<string, unknown>>

  constructor(
    values: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {
    this.values = { ...values }
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
