import type { ConfigErrorCode, ErrorContext } from "../ports/error"
import { BaseError } from "./base-error"

type ConfigErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

type StructuralCode = Extract<ConfigErrorCode, "configuration" | "duplicate_key" | "name_collision">

/**
 * The program itself is misconfigured: an empty source list, an empty key,
 * an unusable parameter definition.
 */
export class ConfigurationError extends BaseError<StructuralCode> {
  constructor(message: string, options: ConfigErrorOptions & { code?: StructuralCode } = {}) {
    super(message, {
      code: options.code ?? "configuration",
      context: options.context,
      cause: options.cause,
      isOperational: false,
    })
  }
}

/**
 * Two parameters or two configurators claim the same canonical key.
 */
export class DuplicateKeyError extends ConfigurationError {
  readonly key: string

  constructor(key: string, context: ErrorContext = {}) {
    super(`duplicate key "${key}"`, {
      code: "duplicate_key",
      context: { key, ...context },
    })
    this.key = key
  }
}

export type NameCollision = Readonly<{
  externalName: string
  keys: readonly string[]
}>

/**
 * Distinct keys map to the same environment variable or argument name, so
 * external input for that name would be ambiguous.
 */
export class NameCollisionError extends ConfigurationError {
  readonly collisions: readonly NameCollision[]

  constructor(target: string, collisions: readonly NameCollision[]) {
    const listed = collisions
      .map((c) => `${c.externalName} <- ${c.keys.join(", ")}`)
      .join("; ")

    super(`collisions for ${target} names: ${listed}`, {
      code: "name_collision",
      context: { target, collisions },
    })
    this.collisions = collisions
  }
}

/**
 * A string does not parse for the declared type of a parameter.
 */
export class IllegalValueError extends BaseError<"illegal_value"> {
  readonly value: string

  constructor(message: string, value: string, options: ConfigErrorOptions = {}) {
    super(message, {
      code: "illegal_value",
      context: { value, ...options.context },
      cause: options.cause,
    })
    this.value = value
  }
}

/**
 * A stored value could not be rendered to its string form.
 */
export class ConversionError extends BaseError<"conversion"> {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super(message, {
      code: "conversion",
      context: options.context,
      cause: options.cause,
      isOperational: false,
    })
  }
}
