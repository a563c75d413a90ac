import { IllegalValueError } from "@knobs/errors"
import { z } from "zod"
import type { Converter, OptionInfo } from "../ports/converter"
import { binarySearch, compareKeys } from "./binary-search"

const INTEGER_PATTERN = /^[+-]?\d+$/
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const integerSchema = z
  .string()
  .trim()
  .regex(INTEGER_PATTERN)
  .transform(Number)
  .pipe(z.number().int())

const numberSchema = z.string().trim().regex(NUMBER_PATTERN).transform(Number).pipe(z.number())

const booleanSchema = z.stringbool()

function parseWith<T>(schema: z.ZodType<T, string>, type: string, value: string): T {
  const result = schema.safeParse(value)

  if (!result.success) {
    throw new IllegalValueError(`"${value}" is not a valid ${type}`, value, {
      cause: result.error,
      context: { type },
    })
  }

  return result.data
}

const string: Converter<string> = {
  type: "string",
  fromString: (value) => value,
  toString: (value) => value,
}

/** Safe integers in decimal notation with an optional sign. */
const integer: Converter<number> = {
  type: "integer",
  fromString: (value) => parseWith(integerSchema, "integer", value),
  toString: (value) => String(value),
}

/** Finite decimal numbers, exponent notation allowed. */
const number: Converter<number> = {
  type: "number",
  fromString: (value) => parseWith(numberSchema, "number", value),
  toString: (value) => String(value),
}

/**
 * Accepts true/false, 1/0, yes/no, on/off, y/n and enabled/disabled in any
 * case; always renders "true" or "false".
 */
const boolean: Converter<boolean> = {
  type: "boolean",
  fromString: (value) => parseWith(booleanSchema, "boolean", value),
  toString: (value) => (value ? "true" : "false"),
}

export type OptionSpec<T extends string> = T | Readonly<{ name: T; description?: string }>

/**
 * Converter for a closed set of names. Matching is case-sensitive.
 *
 * @example
 * ```ts
 * enumeration(["debug", "info", { name: "warn", description: "only problems" }])
 * ```
 */
function enumeration<const T extends string>(specs: readonly OptionSpec<T>[]): Converter<T> {
  const byName = new Map<string, { name: T; description: string }>()

  for (const spec of specs) {
    const option =
      typeof spec === "string"
        ? { name: spec, description: "" }
        : { name: spec.name, description: spec.description ?? "" }
    byName.set(option.name, option)
  }

  const sorted = [...byName.values()].sort((a, b) => compareKeys(a.name, b.name))
  const names = sorted.map((o) => o.name)
  const options: OptionInfo[] = sorted.map((o) => Object.freeze({ ...o }))
  const type = `one of ${names.join(", ")}`

  return {
    type: "enum",
    options: Object.freeze(options),
    fromString: (value) => {
      const found = sorted[binarySearch(names, value)]

      if (found === undefined) {
        throw new IllegalValueError(`"${value}" is not ${type}`, value, {
          context: { type: "enum", options: names },
        })
      }

      return found.name
    },
    toString: (value) => value,
  }
}

/**
 * Lets a parameter be unset: "" parses to `undefined` and `undefined` renders
 * as "".
 */
function optional<T>(inner: Converter<T>): Converter<T | undefined> {
  return {
    type: `${inner.type}?`,
    ...(inner.options && { options: inner.options }),
    fromString: (value) => (value === "" ? undefined : inner.fromString(value)),
    toString: (value) => (value === undefined ? "" : inner.toString(value)),
  }
}

export const converters = {
  string,
  integer,
  number,
  boolean,
  enumeration,
  optional,
}
