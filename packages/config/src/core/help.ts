import type {
  Configurator,
  ConfigurationInfo,
  ConfigVisitor,
  ParameterEntry,
} from "../ports/configurator"
import { externalName } from "./key-names"
import { ARG_PREFIX } from "./parse"

export type HelpOptions = {
  /** Must match the prefix used when reading the environment. @default "" */
  envPrefix?: string

  /** @default "-" */
  argPrefix?: string
}

export type HelpSink = {
  write(chunk: string): unknown
}

/**
 * Collects one line per parameter and a header line per named configuration.
 */
export class HelpPrinter implements ConfigVisitor {
  private readonly lines: string[] = []
  private readonly envPrefix: string
  private readonly argPrefix: string

  constructor(options: HelpOptions = {}) {
    this.envPrefix = options.envPrefix ?? ""
    this.argPrefix = options.argPrefix ?? ARG_PREFIX
  }

  visitConfiguration(info: ConfigurationInfo): void {
    if (info.name === "") return

    this.lines.push(info.description ? `${info.name}: ${info.description}` : info.name)
  }

  visitParameter(entry: ParameterEntry): void {
    const columns = [
      entry.key,
      externalName(entry.key, "env", this.envPrefix),
      this.argPrefix + externalName(entry.key, "arg"),
      `= ${entry.value} (default ${entry.defaultValue})`,
    ]

    if (entry.description) columns.push(entry.description)
    if (entry.options.length > 0) {
      columns.push(`[${entry.options.map((o) => o.name).join("|")}]`)
    }

    this.lines.push(`  ${columns.join("  ")}`)
  }

  toString(): string {
    return `${this.lines.join("\n")}\n`
  }
}

export function formatHelp(configurator: Configurator, options: HelpOptions = {}): string {
  const printer = new HelpPrinter(options)

  configurator.walk(printer)

  return printer.toString()
}

/**
 * Writes help for every parameter: key, variable name, argument, current and
 * default value, description.
 */
export function printHelp(
  configurator: Configurator,
  out: HelpSink = process.stderr,
  options: HelpOptions = {},
): void {
  out.write(formatHelp(configurator, options))
}
