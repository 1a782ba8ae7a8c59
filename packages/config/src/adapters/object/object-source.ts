import type { ConfigSource } from "../../ports/source"

/**
 * Explicit values, typically overrides passed in by a caller or a test.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
