import type { LogLevelName } from "./log-level"

/**
 * Logging policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Minimum level to emit. */
  level: LogLevelName

  /** Human-readable output for local debugging. Structured JSON otherwise. */
  prettify?: boolean

  /**
   * Paths whose values are replaced before an entry is written
   * (e.g. `["password", "*.password"]`).
   *
   * @remarks
   * A safety net only. Callers must still not log secrets.
   */
  redact?: readonly string[]
}
