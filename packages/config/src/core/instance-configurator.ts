import { ConfigurationError, DuplicateKeyError, IllegalValueError } from "@knobs/errors"
import { createNullLogger, type Logger } from "@knobs/logger"
import type {
  Batch,
  Configurator,
  ConfigVisitor,
  ErrorMap,
  SetError,
} from "../ports/configurator"
import type { ConfigParameter } from "../ports/parameter"
import { batchEntries } from "./batch"
import { binarySearch, compareKeys } from "./binary-search"
import { ParameterBuilder } from "./parameter"

export type ConfiguratorOptions = {
  /** Shown as a section header in help output. */
  name?: string
  description?: string
  logger?: Logger
}

/**
 * Configurator over the parameters of a single configuration object.
 */
export class InstanceConfigurator<C extends object> implements Configurator<C> {
  readonly name: string
  readonly description: string
  private readonly sortedKeys: readonly string[]
  private readonly params: readonly ConfigParameter<C>[]
  private readonly logger: Logger

  private constructor(
    private readonly configuration: C,
    params: readonly ConfigParameter<C>[],
    options: ConfiguratorOptions,
  ) {
    this.name = options.name ?? ""
    this.description = options.description ?? ""
    this.params = [...params].sort((a, b) => compareKeys(a.key, b.key))
    this.sortedKeys = this.params.map((p) => p.key)
    this.logger = (options.logger ?? createNullLogger()).child({
      module: "configurator",
      configurator: this.name,
    })
  }

  /**
   * Puts `params` under control of a configurator.
   *
   * @throws ConfigurationError if `params` is empty.
   * @throws DuplicateKeyError if two parameters share a key.
   */
  static control<C extends object>(
    configuration: C,
    params: readonly ConfigParameter<C>[],
    options: ConfiguratorOptions = {},
  ): InstanceConfigurator<C> {
    if (params.length === 0) {
      throw new ConfigurationError("configuration has no parameters", {
        context: { name: options.name ?? "" },
      })
    }

    const keys = params.map((p) => p.key).sort(compareKeys)

    for (let i = 1; i < keys.length; i++) {
      if (keys[i] === keys[i - 1]) {
        throw new DuplicateKeyError(keys[i] ?? "", { configurator: options.name ?? "" })
      }
    }

    return new InstanceConfigurator(configuration, params, options)
  }

  keys(): string[] {
    return [...this.sortedKeys]
  }

  hasKey(key: string): boolean {
    return binarySearch(this.sortedKeys, key) >= 0
  }

  parameter(key: string): ConfigParameter<C> | undefined {
    return this.params[binarySearch(this.sortedKeys, key)]
  }

  value(key: string): string | undefined {
    return this.parameter(key)?.get(this.configuration)
  }

  set(key: string, value: string): number {
    const param = this.parameter(key)
    if (!param) return 0

    param.set(this.configuration, value)
    this.logger.debug("value applied", { key })

    return 1
  }

  setAll(batch: Batch): ErrorMap {
    const errors = new Map<string, SetError>()
    const unknown: string[] = []

    for (const [key, value] of batchEntries(batch)) {
      const param = this.parameter(key)

      if (!param) {
        unknown.push(key)
        errors.set(key, { kind: "unknown-key", key, reason: `unknown key "${key}"` })
        continue
      }

      try {
        param.set(this.configuration, value)
        this.logger.debug("value applied", { key })
      } catch (err) {
        if (!(err instanceof IllegalValueError)) throw err

        this.logger.warn("value rejected", { key, err })
        errors.set(key, { kind: "illegal-value", key, value, reason: err.message, error: err })
      }
    }

    if (unknown.length > 0) {
      this.logger.debug("keys not owned by this configurator", { keys: unknown })
    }

    return errors
  }

  walk(visitor: ConfigVisitor): void {
    visitor.visitConfiguration?.({
      name: this.name,
      description: this.description,
      keys: this.keys(),
    })

    for (const param of this.params) {
      visitor.visitParameter({
        key: param.key,
        type: param.type,
        value: param.get(this.configuration),
        defaultValue: param.defaultValue,
        description: param.description,
        options: param.options().map((name) => ({
          name,
          description: param.describeOption(name) ?? "",
        })),
      })
    }
  }
}

/**
 * Builds a configurator for `configuration` from the parameters registered by
 * `define`.
 *
 * @example
 * ```ts
 * const server = { host: "localhost", port: 8080 }
 * const configurator = configure(server, (p) => p
 *   .field("host", converters.string, { description: "bind address" })
 *   .field("port", converters.integer),
 *   { name: "server" },
 * )
 * ```
 */
export function configure<C extends object>(
  configuration: C,
  define: (builder: ParameterBuilder<C>) => ParameterBuilder<C>,
  options: ConfiguratorOptions & { keyPrefix?: string } = {},
): InstanceConfigurator<C> {
  const params = define(new ParameterBuilder(configuration, options.keyPrefix)).build()

  return InstanceConfigurator.control(configuration, params, options)
}
