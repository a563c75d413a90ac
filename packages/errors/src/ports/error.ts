export type ErrorCode = Lowercase<string>

/**
 * Codes raised by the configuration packages.
 *
 * Lookup misses (unknown keys) are not errors and have no code.
 */
export type ConfigErrorCode =
  | "configuration"
  | "duplicate_key"
  | "name_collision"
  | "illegal_value"
  | "conversion"

/**
 * Structured metadata attached to errors (keys, values, owners) so callers
 * never have to parse the message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for failures caused by input (a bad value on the command line),
   * `false` for misconfiguration of the program itself (two sources claiming
   * one key). A process should not continue after a non-operational error.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and reports.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
