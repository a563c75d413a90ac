import type { Configurator, ErrorMap } from "../ports/configurator"
import { type ParseArgsOptions, type ParseEnvOptions, parseArgs, parseEnv } from "./parse"

/**
 * Sets values from command line arguments.
 *
 * @returns the arguments that were not applied: unknown or malformed ones
 * verbatim, and `key=reason` for each rejected value.
 */
export function setFromArgs(
  configurator: Configurator,
  args: readonly string[],
  options: ParseArgsOptions = {},
): string[] {
  const { values, unused } = parseArgs(configurator.keys(), args, options)
  const invalid = configurator.setAll(values)

  for (const [key, error] of invalid) {
    unused.push(`${key}=${error.reason}`)
  }

  return unused
}

export type SetFromEnvOptions = ParseEnvOptions & {
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Sets values from environment variables, see {@link parseEnv} for naming.
 */
export function setFromEnv(configurator: Configurator, options: SetFromEnvOptions = {}): ErrorMap {
  const { values } = parseEnv(configurator.keys(), options.env ?? process.env, options)

  return configurator.setAll(values)
}

/**
 * Reasons of a bulk set keyed by the failing key.
 */
export function describeErrors(errors: ErrorMap): Record<string, string> {
  return Object.fromEntries([...errors].map(([key, error]) => [key, error.reason]))
}
