import { ConfigurationError, ConversionError, IllegalValueError } from "@knobs/errors"
import type { Converter } from "../ports/converter"
import type { Binding, ConfigParameter } from "../ports/parameter"
import { binarySearch } from "./binary-search"

export type ParameterOptions = {
  /** Canonical key. Defaults to the binding's name. */
  key?: string

  /** Prepended to the key, e.g. "db." for a second database section. */
  keyPrefix?: string

  description?: string
}

export class Parameter<C, T> implements ConfigParameter<C> {
  readonly key: string
  readonly defaultValue: string
  readonly description: string
  private readonly optionNames: readonly string[]
  private readonly optionDocs: readonly string[]

  constructor(
    configuration: C,
    private readonly binding: Binding<C, T>,
    private readonly converter: Converter<T>,
    options: ParameterOptions = {},
  ) {
    this.key = (options.keyPrefix ?? "") + (options.key || binding.name)

    if (this.key === "") {
      throw new ConfigurationError("parameter key is empty", {
        context: { binding: binding.name },
      })
    }

    this.description = options.description ?? ""
    this.optionNames = (converter.options ?? []).map((o) => o.name)
    this.optionDocs = (converter.options ?? []).map((o) => o.description)
    this.defaultValue = this.get(configuration)
  }

  get type(): string {
    return this.converter.type
  }

  get(configuration: C): string {
    try {
      return this.converter.toString(this.binding.read(configuration))
    } catch (err) {
      throw new ConversionError(`could not render the value of "${this.key}"`, {
        cause: err,
        context: { key: this.key },
      })
    }
  }

  /**
   * A setter that throws is reported like a value that does not parse.
   */
  set(configuration: C, value: string): void {
    try {
      this.binding.write(configuration, this.converter.fromString(value))
    } catch (err) {
      if (err instanceof IllegalValueError) throw err
      throw new IllegalValueError(`could not set "${this.key}" to "${value}"`, value, {
        cause: err,
        context: { key: this.key },
      })
    }
  }

  options(): string[] {
    return [...this.optionNames]
  }

  describeOption(option: string): string | undefined {
    const index = binarySearch(this.optionNames, option)

    return index >= 0 ? this.optionDocs[index] : undefined
  }

  equals(other: ConfigParameter<unknown>): boolean {
    if (this === other) return true
    if (!(other instanceof Parameter)) return false

    return (
      this.key === other.key &&
      this.binding.name === other.binding.name &&
      this.converter === other.converter
    )
  }

  toString(): string {
    return `${this.key} (${this.defaultValue}): ${this.description}`
  }
}

/**
 * Binding to a plain property of the configuration object.
 */
export function fieldBinding<C extends object, K extends keyof C & string>(
  field: K,
): Binding<C, C[K]> {
  return {
    name: field,
    read: (configuration) => configuration[field],
    write: (configuration, value) => {
      configuration[field] = value
    },
  }
}

/**
 * Creates a parameter for one property of `configuration`. The converter must
 * produce the property's type.
 *
 * @example
 * ```ts
 * const server = { port: 8080 }
 * const port = parameter(server, "port", converters.integer, { description: "listen port" })
 * ```
 */
export function parameter<C extends object, K extends keyof C & string>(
  configuration: C,
  field: K,
  converter: Converter<C[K]>,
  options?: ParameterOptions,
): ConfigParameter<C> {
  return new Parameter(configuration, fieldBinding<C, K>(field), converter, options)
}

/**
 * Registers the parameters of one configuration object.
 */
export class ParameterBuilder<C extends object> {
  private readonly built: ConfigParameter<C>[] = []

  constructor(
    private readonly configuration: C,
    private readonly keyPrefix: string = "",
  ) {}

  field<K extends keyof C & string>(
    field: K,
    converter: Converter<C[K]>,
    options: Omit<ParameterOptions, "keyPrefix"> = {},
  ): this {
    this.built.push(
      new Parameter(this.configuration, fieldBinding<C, K>(field), converter, {
        ...options,
        keyPrefix: this.keyPrefix,
      }),
    )
    return this
  }

  /**
   * For values not stored as a plain property, e.g. behind a setter method.
   */
  accessor<T>(
    binding: Binding<C, T>,
    converter: Converter<T>,
    options: Omit<ParameterOptions, "keyPrefix"> = {},
  ): this {
    this.built.push(
      new Parameter(this.configuration, binding, converter, {
        ...options,
        keyPrefix: this.keyPrefix,
      }),
    )
    return this
  }

  build(): ConfigParameter<C>[] {
    return [...this.built]
  }
}
