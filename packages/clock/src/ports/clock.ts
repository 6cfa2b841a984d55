import type { Milliseconds } from "./time"

export type TimeSource = {
  /** Current time as a Date object. */
  now(): Date

  /** Current time as milliseconds since Unix epoch. Use for elapsed-time arithmetic. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Delay execution for `ms` milliseconds. Resolves early if `signal` is aborted.
   *
   * @remarks
   * Used as the deadline side of the command timeout race, so a pending sleep
   * must not keep the process alive once its signal aborts.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
