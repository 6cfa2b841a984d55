/**
 * Supplies raw settings keyed by their schema name.
 *
 * Values stay untyped until `loadConfig` validates them. An `undefined`
 * value leaves the key to earlier sources or to the schema default.
 */
export interface ConfigSource {
  /** Reported by `IConfig.explain`, e.g. `env:RELAYCACHE_*`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
