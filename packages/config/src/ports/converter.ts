export type OptionInfo = Readonly<{
  name: string
  description: string
}>

/**
 * Converts between the string form of a value (as typed on a command line or
 * found in the environment) and its typed form on the configuration object.
 */
export interface Converter<T> {
  /** Type name shown in help output, e.g. "integer". */
  readonly type: string

  /**
   * @throws IllegalValueError when `value` does not parse.
   */
  fromString(value: string): T

  toString(value: T): string

  /**
   * Allowed values of an enumeration, sorted by name. Absent for open types.
   */
  readonly options?: readonly OptionInfo[]
}
