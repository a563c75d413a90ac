import { type NameCollision, NameCollisionError } from "@knobs/errors"

export type KeyTarget = "arg" | "env"

const SEPARATOR: Record<KeyTarget, string> = {
  arg: "-",
  env: "_",
}

const SEPARATOR_RUN: Record<KeyTarget, RegExp> = {
  arg: /-+/g,
  env: /_+/g,
}

function isUpper(c: string): boolean {
  return c >= "A" && c <= "Z"
}

function isAlphanumeric(c: string): boolean {
  return isUpper(c) || (c >= "a" && c <= "z") || (c >= "0" && c <= "9")
}

/**
 * Derives the environment variable (`env`) or command line argument (`arg`)
 * name of a canonical key.
 *
 * Every char that is not an ASCII letter or digit becomes a separator, every
 * run of uppercase letters not at the start gets a separator in front, runs
 * of separators collapse into one, and the result is upper- (`env`) or
 * lowercased (`arg`). `prefix` is prepended as is.
 *
 * @example
 * ```ts
 * externalName("myApp", "arg")          // "my-app"
 * externalName("myApp", "env", "SVC_")  // "SVC_MY_APP"
 * externalName("HTML$Valües", "arg")    // "html-val-es"
 * ```
 */
export function externalName(key: string, target: KeyTarget, prefix: string = ""): string {
  const separator = SEPARATOR[target]
  let name = ""
  let previousUpper = false

  for (let i = 0; i < key.length; i++) {
    const c = key.charAt(i)
    const upper = isUpper(c)

    if (upper && !previousUpper && i > 0) name += separator
    name += isAlphanumeric(c) ? c : separator

    previousUpper = upper
  }

  name = name.replace(SEPARATOR_RUN[target], separator)

  return prefix + (target === "env" ? name.toUpperCase() : name.toLowerCase())
}

/**
 * Finds every external name produced by more than one distinct key.
 */
export function collisions(
  keys: readonly string[],
  target: KeyTarget,
  prefix: string = "",
): NameCollision[] {
  const byName = new Map<string, string[]>()

  for (const key of new Set(keys)) {
    const name = externalName(key, target, prefix)
    const owners = byName.get(name)

    if (owners) {
      owners.push(key)
    } else {
      byName.set(name, [key])
    }
  }

  return [...byName]
    .filter(([, owners]) => owners.length > 1)
    .map(([name, owners]) => ({ externalName: name, keys: owners }))
}

/**
 * Maps external names back to the canonical keys they were derived from.
 * This is a lookup over precomputed names, not a decoding.
 */
export class NameMatcher {
  private readonly keysByName: ReadonlyMap<string, string>

  /**
   * @throws NameCollisionError if two keys share an external name.
   */
  constructor(
    keys: readonly string[],
    readonly target: KeyTarget,
    readonly prefix: string = "",
  ) {
    const found = collisions(keys, target, prefix)

    if (found.length > 0) {
      throw new NameCollisionError(target, found)
    }

    this.keysByName = new Map(keys.map((key) => [externalName(key, target, prefix), key]))
  }

  match(name: string): string | undefined {
    return this.keysByName.get(name)
  }

  nameOf(key: string): string {
    return externalName(key, this.target, this.prefix)
  }
}
