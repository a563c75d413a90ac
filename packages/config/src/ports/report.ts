import type { SetError } from "./configurator"

export type SourcedError = SetError & {
  /** Name of the source whose value failed. */
  readonly source: string
}

/**
 * Outcome of applying several sources to one configurator.
 *
 * @example
 * ```typescript
 * const report = await reconcile(configurator, {
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 *   args: process.argv.slice(2),
 *   envPrefix: "MYAPP_",
 * })
 *
 * report.explain("port")   // "args"
 * report.explain("host")   // "dotenv:.env"
 * report.explain("debug")  // "default"
 * ```
 */
export interface ReconcileReport {
  /**
   * Failures by key, across all sources. When two sources fail for the same
   * key, the later one is kept.
   */
  readonly errors: ReadonlyMap<string, SourcedError>

  /**
   * Explains which source provided the final value of a key.
   *
   * @returns the source name, or "default" when no source set the key.
   */
  explain(key: string): string

  /**
   * Names of sources that provided at least one final value, in the order
   * they were applied. A source whose values were all overridden is absent.
   */
  sourcesUsed(): string[]

  /**
   * Variables carrying the env prefix and arguments that matched no key.
   * Useful for spotting typos and stale configuration.
   */
  unused(): string[]
}
