import { ConfigurationError, DuplicateKeyError } from "@knobs/errors"
import { createNullLogger, type Logger } from "@knobs/logger"
import type {
  Batch,
  Configurator,
  ConfigVisitor,
  ErrorMap,
  SetError,
} from "../ports/configurator"
import type { ConfigParameter } from "../ports/parameter"
import { binarySearch, compareKeys } from "./binary-search"

type OwnedKey = {
  key: string
  owner: number
}

export type MultiConfiguratorOptions = {
  logger?: Logger
}

/**
 * Merges several configurators into one key space.
 *
 * Keys of all children are indexed once at construction; every lookup is a
 * binary search over that index and is routed to the owning child.
 */
export class MultiConfigurator implements Configurator {
  private constructor(
    private readonly configurators: readonly Configurator[],
    private readonly sortedKeys: readonly string[],
    private readonly owners: readonly number[],
    private readonly logger: Logger,
  ) {}

  /**
   * @throws ConfigurationError if `configurators` is empty.
   * @throws DuplicateKeyError if two configurators own the same key. No
   * resolver is created in that case.
   */
  static configure(
    configurators: readonly Configurator[],
    options: MultiConfiguratorOptions = {},
  ): MultiConfigurator {
    if (configurators.length === 0) {
      throw new ConfigurationError("configurators are empty")
    }

    const children = [...configurators]
    const owned: OwnedKey[] = []

    children.forEach((configurator, owner) => {
      for (const key of configurator.keys()) {
        owned.push({ key, owner })
      }
    })

    owned.sort((a, b) => compareKeys(a.key, b.key))

    const keys: string[] = []
    const owners: number[] = []

    for (const [i, entry] of owned.entries()) {
      const previous = owned[i - 1]

      if (previous && previous.key === entry.key) {
        throw new DuplicateKeyError(entry.key, { owners: [previous.owner, entry.owner] })
      }

      keys.push(entry.key)
      owners.push(entry.owner)
    }

    const logger = (options.logger ?? createNullLogger()).child({ module: "multi-configurator" })
    logger.debug("configurators merged", { configurators: children.length, keys: keys.length })

    return new MultiConfigurator(children, keys, owners, logger)
  }

  private ownerOf(key: string): Configurator | undefined {
    const index = binarySearch(this.sortedKeys, key)
    if (index < 0) return undefined

    const owner = this.owners[index]

    return owner === undefined ? undefined : this.configurators[owner]
  }

  keys(): string[] {
    return [...this.sortedKeys]
  }

  hasKey(key: string): boolean {
    return binarySearch(this.sortedKeys, key) >= 0
  }

  parameter(key: string): ConfigParameter<unknown> | undefined {
    return this.ownerOf(key)?.parameter(key)
  }

  value(key: string): string | undefined {
    return this.ownerOf(key)?.value(key)
  }

  set(key: string, value: string): number {
    return this.ownerOf(key)?.set(key, value) ?? 0
  }

  /**
   * Hands the whole batch to every child. A child reports keys it does not
   * own as unknown; those reports are dropped for keys another child owns,
   * so only keys nobody owns remain, each reported once.
   */
  setAll(batch: Batch): ErrorMap {
    const errors = new Map<string, SetError>()

    for (const configurator of this.configurators) {
      for (const [key, error] of configurator.setAll(batch)) {
        if (error.kind === "unknown-key" && this.hasKey(key)) continue
        if (!errors.has(key)) errors.set(key, error)
      }
    }

    const unresolved = [...errors.values()]
      .filter((e) => e.kind === "unknown-key")
      .map((e) => e.key)

    if (unresolved.length > 0) {
      this.logger.warn("unresolved keys", { keys: unresolved })
    }

    return errors
  }

  /**
   * Visits children in the order they were given, each in its own key order.
   */
  walk(visitor: ConfigVisitor): void {
    for (const configurator of this.configurators) {
      configurator.walk(visitor)
    }
  }
}

/**
 * Combines configurators into one: none is an error, a single one is
 * returned as is, more are merged by a {@link MultiConfigurator}.
 */
export function manage(
  configurators: readonly Configurator[],
  options: MultiConfiguratorOptions = {},
): Configurator {
  const [first, ...rest] = configurators

  if (first === undefined) {
    throw new ConfigurationError("configurators are empty")
  }

  return rest.length === 0 ? first : MultiConfigurator.configure(configurators, options)
}
