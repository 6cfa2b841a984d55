import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("never throws for any method", () => {
    const logger = new NullLogger()

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x")).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x")).not.toThrow()
    expect(() => logger.error("x")).not.toThrow()
    expect(() => logger.fatal("x")).not.toThrow()
  })

  it("child() returns another no-op logger", () => {
    const child = createNullLogger().child({ module: "remote-storage" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x", { key: "ccache:00" })).not.toThrow()
  })
})
