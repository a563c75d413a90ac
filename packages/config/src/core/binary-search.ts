/**
 * Orders keys by UTF-16 code units, the order `Array.prototype.sort` uses
 * for strings. Never locale-aware.
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Searches a sorted array for `key`.
 *
 * @returns the index of `key`, or `-(insertionPoint + 1)` when absent, so a
 * result is a hit if and only if it is `>= 0`.
 */
export function binarySearch(sorted: readonly string[], key: string): number {
  let low = 0
  let high = sorted.length - 1

  while (low <= high) {
    const mid = (low + high) >>> 1
    const cmp = compareKeys(sorted[mid] ?? "", key)

    if (cmp < 0) {
      low = mid + 1
    } else if (cmp > 0) {
      high = mid - 1
    } else {
      return mid
    }
  }

  return -(low + 1)
}
