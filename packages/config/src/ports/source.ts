/**
 * A source of environment-shaped values (`EXTERNAL_NAME -> value`).
 *
 * A source only loads; names are matched against canonical keys and values
 * are parsed downstream. Sources are applied in order, later ones win.
 */
export interface ConfigSource {
  /**
   * Human-readable name used for provenance.
   * Example: "env", "dotenv:.env.defaults"
   */
  readonly name: string

  /**
   * `undefined` for a name means "not provided".
   */
  load(): Promise<Record<string, string | undefined>>
}
