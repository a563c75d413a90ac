/**
 * Handle on one configurable value of a configuration object `C`.
 *
 * A parameter is immutable; only the value it proxies to on the configuration
 * object changes.
 */
export interface ConfigParameter<C> {
  /** Canonical key, unique within a configurator. */
  readonly key: string

  /** String form of the value the configuration object held at construction. */
  readonly defaultValue: string

  readonly description: string

  readonly type: string

  /**
   * Reads the live value and renders it.
   *
   * @throws ConversionError if the stored value cannot be rendered.
   */
  get(configuration: C): string

  /**
   * Parses `value` and writes it. Nothing is written when parsing fails.
   *
   * @throws IllegalValueError if `value` does not parse for the parameter's type
   * or the binding refuses to write it.
   */
  set(configuration: C, value: string): void

  /** Option names sorted by name; empty unless the type is an enumeration. */
  options(): string[]

  /** Documentation of one option, `undefined` for unknown options. */
  describeOption(option: string): string | undefined

  /** Same key, same underlying binding and same converter. */
  equals(other: ConfigParameter<unknown>): boolean
}

/**
 * How a parameter reads and writes its value. `name` identifies the
 * underlying field (or property) and is the default key.
 */
export type Binding<C, T> = Readonly<{
  name: string
  read: (configuration: C) => T
  write: (configuration: C, value: T) => void
}>
