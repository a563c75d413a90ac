import { createNullLogger, type Logger } from "@knobs/logger"
import { EnvSource } from "../adapters/env/env-source"
import type { Configurator } from "../ports/configurator"
import type { ReconcileReport, SourcedError } from "../ports/report"
import type { ConfigSource } from "../ports/source"
import { type ParseResult, parseArgs, parseEnv } from "./parse"
import { Report } from "./report"

export type ReconcileOptions = {
  /**
   * Environment-shaped sources, applied in order.
   * @default [new EnvSource()]
   */
  sources?: readonly ConfigSource[]

  /** Command line arguments, applied after every source. */
  args?: readonly string[]

  /** @default "" */
  envPrefix?: string

  /** @default "-" */
  argPrefix?: string

  logger?: Logger
}

/** Source name recorded for values that came from `args`. */
export const ARGS_SOURCE = "args"

/**
 * Applies every source to `configurator`, then the command line. A failing
 * value never stops the remaining ones; all failures end up in the report.
 *
 * Name collisions and source load failures reject the whole operation.
 */
export async function reconcile(
  configurator: Configurator,
  options: ReconcileOptions = {},
): Promise<ReconcileReport> {
  const logger = (options.logger ?? createNullLogger()).child({ module: "reconcile" })
  const keys = configurator.keys()
  const errors = new Map<string, SourcedError>()
  const provenance = new Map<string, string>()
  const unused: string[] = []
  const applied: string[] = []

  const apply = (source: string, parsed: ParseResult) => {
    const failed = configurator.setAll(parsed.values)

    for (const key of parsed.values.keys()) {
      const error = failed.get(key)

      if (error) {
        errors.set(key, { ...error, source })
      } else {
        provenance.set(key, source)
      }
    }

    unused.push(...parsed.unused)
    applied.push(source)
    logger.debug("source applied", {
      source,
      applied: parsed.values.size - failed.size,
      failed: failed.size,
    })
  }

  for (const source of options.sources ?? [new EnvSource()]) {
    const env = await source.load()

    apply(source.name, parseEnv(keys, env, { prefix: options.envPrefix ?? "" }))
  }

  if (options.args) {
    apply(ARGS_SOURCE, parseArgs(keys, options.args, { prefix: options.argPrefix }))
  }

  const report = new Report(errors, provenance, unused, applied)

  if (errors.size > 0) {
    logger.warn("configuration reconciled with errors", {
      errors: [...errors.keys()],
      sources: report.sourcesUsed(),
    })
  } else {
    logger.info("configuration reconciled", { sources: report.sourcesUsed() })
  }

  return report
}
