import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ configurator: "server" }).child({ key: "port" })

      child.info("applied")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ configurator: "server", key: "port" })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ key: "port" }).child({ key: "host" }).info("applied")

      expect(read()[0]?.payload.key).toBe("host")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ configurator: "server" })
      const child = parent.child({ key: "port" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("key")
      expect(logs[1]?.payload).toMatchObject({ configurator: "server", key: "port" })
    })

    it("per-call meta overrides context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ source: "env" }).info("applied", { source: "args" })

      expect(read()[0]?.payload.source).toBe("args")
    })

    it("suppresses entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
