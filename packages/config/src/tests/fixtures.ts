import { Writable } from "node:stream"
import { createPinoLogger, type Logger } from "@knobs/logger"
import { converters } from "../core/converters"
import { type ConfiguratorOptions, configure } from "../core/instance-configurator"

export type Level = "debug" | "info" | "warn"

export type ServerConfig = {
  host: string
  port: number
  debug: boolean
  level: Level
}

export type DatabaseConfig = {
  url: string
  poolSize: number
}

export const levels = converters.enumeration<Level>([
  "warn",
  "debug",
  { name: "info", description: "normal operation" },
])

export function makeServer(): ServerConfig {
  return { host: "localhost", port: 8080, debug: false, level: "info" }
}

export function makeDatabase(): DatabaseConfig {
  return { url: "postgres://localhost/test", poolSize: 4 }
}

export function serverConfigurator(
  server: ServerConfig = makeServer(),
  options: ConfiguratorOptions = { name: "server", description: "HTTP server" },
) {
  return configure(
    server,
    (p) =>
      p
        .field("port", converters.integer, { description: "listen port" })
        .field("host", converters.string, { description: "bind address" })
        .field("debug", converters.boolean)
        .field("level", levels, { description: "log level" }),
    options,
  )
}

export function databaseConfigurator(database: DatabaseConfig = makeDatabase()) {
  return configure(
    database,
    (p) =>
      p
        .field("url", converters.string, { description: "connection string" })
        .field("poolSize", converters.integer),
    { name: "database" },
  )
}

export type TuningConfig = {
  name: string
  ratio: number
  zeta: string
}

export function makeTuning(): TuningConfig {
  return { name: "a", ratio: 1, zeta: "z" }
}

/**
 * `ratio` sits behind a setter that refuses negative numbers.
 */
export function tuningConfigurator(tuning: TuningConfig = makeTuning()) {
  return configure(
    tuning,
    (p) =>
      p
        .field("name", converters.string)
        .field("zeta", converters.string)
        .accessor(
          {
            name: "ratio",
            read: (t) => t.ratio,
            write: (t, value: number) => {
              if (value < 0) throw new RangeError("ratio must not be negative")
              t.ratio = value
            },
          },
          converters.number,
        ),
    { name: "tuning" },
  )
}

export type CapturedLine = {
  level: number
  msg: string
  [field: string]: unknown
}

/**
 * A real pino logger writing into memory.
 */
export function captureLogger(): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(JSON.parse(chunk.toString("utf8")))
      callback()
    },
  })

  return { logger: createPinoLogger({ level: "trace" }, { destination }), lines }
}
