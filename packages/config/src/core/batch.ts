import type { Batch } from "../ports/configurator"

function isMap(batch: Batch): batch is ReadonlyMap<string, string> {
  return batch instanceof Map
}

/**
 * Entries of a batch in insertion order, without `undefined` values.
 */
export function batchEntries(batch: Batch): [string, string][] {
  const entries: [string, string][] = []
  const source = isMap(batch) ? batch.entries() : Object.entries(batch)

  for (const [key, value] of source) {
    if (value !== undefined) entries.push([key, value])
  }

  return entries
}
