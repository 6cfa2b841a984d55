import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Wall-clock time and `setTimeout`-based sleeps. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date(this.nowMs())
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer)
        signal?.removeEventListener("abort", wake)
        resolve()
      }

      const timer = setTimeout(wake, ms)

      // A deadline alone must not hold a short-lived process open.
      timer.unref()

      signal?.addEventListener("abort", wake, { once: true })
    })
  }
}
