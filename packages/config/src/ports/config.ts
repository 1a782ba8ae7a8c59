/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ START_MASK: z.coerce.number().default(50000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.START_MASK      // 50000
 * config.explain("START_MASK") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that supplied `key`, or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that supplied at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys some source provided that the schema does not know, usually typos or
   * stale settings.
   */
  unknownKeys(): string[]
}
