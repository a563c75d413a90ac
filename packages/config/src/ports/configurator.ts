import type { IllegalValueError } from "@knobs/errors"
import type { OptionInfo } from "./converter"
import type { ConfigParameter } from "./parameter"

export type UnknownKeyError = Readonly<{
  kind: "unknown-key"
  key: string
  reason: string
}>

export type IllegalValueSetError = Readonly<{
  kind: "illegal-value"
  key: string
  value: string
  reason: string
  error: IllegalValueError
}>

export type SetError = UnknownKeyError | IllegalValueSetError

/**
 * Failures of a bulk set, keyed by the failing key. Empty means every pair
 * was applied.
 */
export type ErrorMap = ReadonlyMap<string, SetError>

/**
 * Key/value pairs for a bulk set. `undefined` values are skipped.
 */
export type Batch = ReadonlyMap<string, string> | Readonly<Record<string, string | undefined>>

export type ConfigurationInfo = Readonly<{
  name: string
  description: string
  keys: readonly string[]
}>

export type ParameterEntry = Readonly<{
  key: string
  type: string
  value: string
  defaultValue: string
  description: string
  options: readonly OptionInfo[]
}>

export interface ConfigVisitor {
  /** Called once per configuration object before its parameters. */
  visitConfiguration?(info: ConfigurationInfo): void

  visitParameter(entry: ParameterEntry): void
}

/**
 * A flat namespace of parameters addressed by canonical key.
 */
export interface Configurator<C = unknown> {
  /** Sorted copy of all keys. */
  keys(): string[]

  hasKey(key: string): boolean

  parameter(key: string): ConfigParameter<C> | undefined

  value(key: string): string | undefined

  /**
   * Sets one value.
   *
   * @returns 1 if applied, 0 if the key is unknown.
   * @throws IllegalValueError if `value` does not parse.
   */
  set(key: string, value: string): number

  /**
   * Applies every resolvable pair and reports the rest. Nothing is rolled back.
   */
  setAll(batch: Batch): ErrorMap

  /**
   * Visits every parameter in key order. An exception thrown by the visitor
   * propagates and ends the walk.
   */
  walk(visitor: ConfigVisitor): void
}
