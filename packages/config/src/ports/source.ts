/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in `loadConfig`.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Name reported by `IConfig.explain`, e.g. "env", "dotenv:.env".
   */
  readonly name: string

  /**
   * A key mapped to `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
