import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingSleep = {
  wakeAt: Milliseconds
  resolve: () => void
}

/**
 * Manually driven clock for tests.
 *
 * @remarks
 * `sleep()` resolves only once `advance()` or `set()` moves time to or past its
 * deadline (or its signal aborts), so timeout races can be driven step by step.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private pending: PendingSleep[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: Milliseconds): void {
    this.time = ms
    this.wakeDue()
  }

  /** Number of sleeps that have neither elapsed nor been aborted. */
  get pendingSleeps(): number {
    return this.pending.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = { wakeAt: this.time + ms, resolve }
      this.pending.push(entry)

      signal?.addEventListener(
        "abort",
        () => {
          this.pending = this.pending.filter((p) => p !== entry)
          resolve()
        },
        { once: true },
      )
    })
  }

  private wakeDue(): void {
    const due = this.pending.filter((p) => p.wakeAt <= this.time)
    this.pending = this.pending.filter((p) => p.wakeAt > this.time)

    for (const p of due) p.resolve()
  }
}
