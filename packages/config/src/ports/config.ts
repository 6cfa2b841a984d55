/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ LOG_LEVEL: z.enum(["info", "warn"]).default("warn") }),
 *   sources: [new EnvSource({ prefix: "RELAYCACHE_" })],
 * })
 *
 * config.value.LOG_LEVEL     // "warn"
 * config.explain("LOG_LEVEL") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   *
   * Useful for spotting typos in variable names.
   */
  unknownKeys(): string[]
}
