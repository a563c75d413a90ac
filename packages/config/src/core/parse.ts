import { NameMatcher } from "./key-names"

/** Command line arguments start with a dash. */
export const ARG_PREFIX = "-"

export type ParseResult = {
  /** Canonical key to raw value, in input order; later occurrences win. */
  values: Map<string, string>

  /** Input that matched no key, verbatim. */
  unused: string[]
}

export type ParseArgsOptions = {
  /**
   * Stripped from each argument before matching.
   * @default "-"
   */
  prefix?: string
}

/**
 * Parses `-name=value` and bare `-name` (meaning `-name=true`) arguments
 * against the argument names of `keys`.
 *
 * @throws NameCollisionError if two keys share an argument name.
 */
export function parseArgs(
  keys: readonly string[],
  args: readonly string[],
  options: ParseArgsOptions = {},
): ParseResult {
  const prefix = options.prefix ?? ARG_PREFIX
  const matcher = new NameMatcher(keys, "arg")
  const values = new Map<string, string>()
  const unused: string[] = []

  for (const arg of args) {
    if (!arg.startsWith(prefix)) {
      unused.push(arg)
      continue
    }

    const body = arg.slice(prefix.length)
    const eq = body.indexOf("=")
    const name = eq < 0 ? body : body.slice(0, eq)
    const key = matcher.match(name)

    if (key === undefined) {
      unused.push(arg)
      continue
    }

    values.set(key, eq < 0 ? "true" : body.slice(eq + 1))
  }

  return { values, unused }
}

export type ParseEnvOptions = {
  /**
   * Common prefix of the program's variables, e.g. "MYAPP_".
   * @default ""
   */
  prefix?: string
}

/**
 * Picks the variables named `prefix + externalName(key, "env")` out of `env`.
 *
 * `unused` lists variables that carry the prefix but match no key. Without a
 * prefix nothing is reported, since every unrelated variable would be.
 *
 * @throws NameCollisionError if two keys share a variable name.
 */
export function parseEnv(
  keys: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
  options: ParseEnvOptions = {},
): ParseResult {
  const prefix = options.prefix ?? ""
  const matcher = new NameMatcher(keys, "env", prefix)
  const values = new Map<string, string>()
  const unused: string[] = []

  for (const [name, value] of Object.entries(env)) {
    if (value === undefined) continue

    const key = matcher.match(name)

    if (key !== undefined) {
      values.set(key, value)
    } else if (prefix !== "" && name.startsWith(prefix)) {
      unused.push(name)
    }
  }

  return { values, unused }
}
