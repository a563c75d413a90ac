export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric severities, higher is more severe. Matches pino's numbering.
 */
export const LogLevels = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
} as const satisfies Record<LogLevelName, number>

export type LogLevel = (typeof LogLevels)[LogLevelName]

/**
 * Name of a numeric severity, `undefined` for numbers that are not a level.
 */
export function logLevelName(level: number): LogLevelName | undefined {
  return logLevelNames.find((name) => LogLevels[name] === level)
}
