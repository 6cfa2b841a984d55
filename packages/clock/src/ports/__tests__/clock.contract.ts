import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    describe("TimeSource", () => {
      it("now() returns a Date", () => {
        expect(h.make().now()).toBeInstanceOf(Date)
      })

      it("now() and nowMs() are consistent", () => {
        const clock = h.make()
        const date = clock.now()
        const ms = clock.nowMs()

        expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
      })
    })

    describe("Sleeper", () => {
      it("sleep(0) resolves", async () => {
        await expect(h.make().sleep(0)).resolves.toBeUndefined()
      })

      it("sleep() resolves at once when the signal is already aborted", async () => {
        const ac = new AbortController()
        ac.abort()

        await expect(h.make().sleep(10_000, ac.signal)).resolves.toBeUndefined()
      })

      it("sleep() resolves when the signal aborts mid-sleep", async () => {
        const ac = new AbortController()
        const p = h.make().sleep(10_000, ac.signal)

        ac.abort()

        await expect(p).resolves.toBeUndefined()
      })
    })
  })
}
