import { ConfigurationError, DuplicateKeyError, IllegalValueError } from "@knobs/errors"
import { LogLevels } from "@knobs/logger"
import type { ConfigurationInfo, ParameterEntry } from "../../ports/configurator"
import {
  captureLogger,
  makeServer,
  makeTuning,
  serverConfigurator,
  tuningConfigurator,
} from "../../tests/fixtures"
import { describeErrors } from "../apply"
import { converters } from "../converters"
import { InstanceConfigurator } from "../instance-configurator"
import { parameter } from "../parameter"

describe("InstanceConfigurator", () => {
  it("lists its keys sorted", () => {
    expect(serverConfigurator().keys()).toEqual(["debug", "host", "level", "port"])
  })

  it("finds the first key as well as the others", () => {
    const configurator = serverConfigurator()

    expect(configurator.hasKey("debug")).toBe(true)
    expect(configurator.hasKey("port")).toBe(true)
    expect(configurator.hasKey("colour")).toBe(false)
    expect(configurator.hasKey("")).toBe(false)
  })

  it("returns parameters and values by key", () => {
    const configurator = serverConfigurator()

    expect(configurator.parameter("host")?.description).toBe("bind address")
    expect(configurator.parameter("colour")).toBeUndefined()
    expect(configurator.value("port")).toBe("8080")
    expect(configurator.value("colour")).toBeUndefined()
  })

  it("sets one value", () => {
    const server = makeServer()
    const configurator = serverConfigurator(server)

    expect(configurator.set("port", "9090")).toBe(1)
    expect(server.port).toBe(9090)
    expect(configurator.value("port")).toBe("9090")
  })

  it("returns 0 for an unknown key", () => {
    expect(serverConfigurator().set("colour", "red")).toBe(0)
  })

  it("throws for an illegal value and keeps the old one", () => {
    const server = makeServer()
    const configurator = serverConfigurator(server)

    expect(() => configurator.set("port", "eighty")).toThrow(IllegalValueError)
    expect(server.port).toBe(8080)
  })

  describe("setAll", () => {
    it("applies valid pairs and reports the rest", () => {
      const server = makeServer()
      const errors = serverConfigurator(server).setAll({
        host: "0.0.0.0",
        port: "9000",
        debug: "yes",
        level: "loud",
        colour: "red",
      })

      expect(server).toEqual({ host: "0.0.0.0", port: 9000, debug: true, level: "info" })
      expect(describeErrors(errors)).toEqual({
        level: '"loud" is not one of debug, info, warn',
        colour: 'unknown key "colour"',
      })
      expect(errors.get("level")).toMatchObject({ kind: "illegal-value", value: "loud" })
      expect(errors.get("colour")?.kind).toBe("unknown-key")
    })

    it("reports a setter that refuses a value and applies the pairs after it", () => {
      const tuning = makeTuning()

      const errors = tuningConfigurator(tuning).setAll({ name: "b", ratio: "-1", zeta: "y" })

      expect(tuning).toEqual({ name: "b", ratio: 1, zeta: "y" })
      expect(describeErrors(errors)).toEqual({ ratio: 'could not set "ratio" to "-1"' })

      const ratio = errors.get("ratio")
      expect(ratio?.kind).toBe("illegal-value")
      if (ratio?.kind === "illegal-value") {
        expect(ratio.error.cause).toBeInstanceOf(RangeError)
      }
    })

    it("accepts a Map and skips undefined values", () => {
      const server = makeServer()
      const configurator = serverConfigurator(server)

      expect(configurator.setAll(new Map([["port", "81"]])).size).toBe(0)
      expect(configurator.setAll({ host: undefined }).size).toBe(0)
      expect(server.port).toBe(81)
      expect(server.host).toBe("localhost")
    })

    it("logs rejected values and unknown keys", () => {
      const { logger, lines } = captureLogger()
      const configurator = serverConfigurator(makeServer(), { name: "server", logger })

      configurator.setAll({ level: "loud", colour: "red" })

      expect(lines).toContainEqual(
        expect.objectContaining({
          level: LogLevels.warn,
          msg: "value rejected",
          key: "level",
          module: "configurator",
          configurator: "server",
        }),
      )
      expect(lines).toContainEqual(
        expect.objectContaining({
          level: LogLevels.debug,
          msg: "keys not owned by this configurator",
          keys: ["colour"],
        }),
      )
    })
  })

  describe("control", () => {
    it("rejects an empty parameter list", () => {
      let caught: unknown
      try {
        InstanceConfigurator.control(makeServer(), [], { name: "server" })
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(ConfigurationError)
      expect(caught).toMatchObject({
        code: "configuration",
        message: "configuration has no parameters",
        context: { name: "server" },
      })
    })

    it("rejects two parameters with the same key", () => {
      const server = makeServer()

      expect(() =>
        InstanceConfigurator.control(server, [
          parameter(server, "port", converters.integer),
          parameter(server, "host", converters.string, { key: "port" }),
        ]),
      ).toThrow(DuplicateKeyError)
    })
  })

  describe("walk", () => {
    it("visits the configuration, then each parameter in key order", () => {
      const server = makeServer()
      const configurator = serverConfigurator(server)
      const infos: ConfigurationInfo[] = []
      const entries: ParameterEntry[] = []

      server.port = 9090
      configurator.walk({
        visitConfiguration: (info) => infos.push(info),
        visitParameter: (entry) => entries.push(entry),
      })

      expect(infos).toEqual([
        { name: "server", description: "HTTP server", keys: ["debug", "host", "level", "port"] },
      ])
      expect(entries.map((e) => e.key)).toEqual(["debug", "host", "level", "port"])
      expect(entries[3]).toEqual({
        key: "port",
        type: "integer",
        value: "9090",
        defaultValue: "8080",
        description: "listen port",
        options: [],
      })
      expect(entries[2]?.options).toEqual([
        { name: "debug", description: "" },
        { name: "info", description: "normal operation" },
        { name: "warn", description: "" },
      ])
    })

    it("works with visitors that only want parameters", () => {
      const keys: string[] = []

      serverConfigurator().walk({ visitParameter: (entry) => keys.push(entry.key) })

      expect(keys).toHaveLength(4)
    })

    it("stops at the first exception from the visitor", () => {
      const seen: string[] = []

      expect(() =>
        serverConfigurator().walk({
          visitParameter: (entry) => {
            seen.push(entry.key)
            if (entry.key === "host") throw new Error("stop")
          },
        }),
      ).toThrow("stop")
      expect(seen).toEqual(["debug", "host"])
    })
  })
})
