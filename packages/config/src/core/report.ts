import type { ReconcileReport, SourcedError } from "../ports/report"

export class Report implements ReconcileReport {
  constructor(
    readonly errors: ReadonlyMap<string, SourcedError>,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly unmatched: readonly string[],
    /** Source names in the order they were applied. */
    private readonly applied: readonly string[],
  ) {}

  explain(key: string): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    const used = new Set(this.provenance.values())

    return [...new Set(this.applied)].filter((source) => used.has(source))
  }

  unused(): string[] {
    return [...this.unmatched]
  }
}
