/**
 * Case-folding helpers shared by matching, grouping and merging
 * @module utils/strings
 */

/**
 * Folds a value for case-insensitive comparison. No other normalization.
 */
export function foldCase(value: string): string {
  return value.toLowerCase()
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Canonical string order: case-folded first, raw value as tiebreaker.
 * Independent of locale and of input order.
 */
export function compareCanonical(a: string, b: string): number {
  return compareCodeUnits(foldCase(a), foldCase(b)) || compareCodeUnits(a, b)
}

/**
 * Returns a sorted copy in canonical order
 */
export function sortCanonical(values: Iterable<string>): string[] {
  return Array.from(values).sort(compareCanonical)
}

/**
 * Collects strings, deduplicated case-insensitively.
 * The first casing added for a folded value is the one kept.
 */
export class CaseInsensitiveSet {
  private readonly values = new Map<string, string>()
  private readonly excluded: Set<string>

  constructor(exclude: Iterable<string> = []) {
    this.excluded = new Set(Array.from(exclude, foldCase))
  }

  /** Adds a value; returns false when it was empty, excluded or already present */
  add(value: string | null | undefined): boolean {
    if (value === null || value === undefined || value.length === 0) {
      return false
    }
    const key = foldCase(value)
    if (this.excluded.has(key) || this.values.has(key)) {
      return false
    }
    this.values.set(key, value)
    return true
  }

  addAll(values: Iterable<string>): void {
    for (const value of values) {
      this.add(value)
    }
  }

  has(value: string): boolean {
    return this.values.has(foldCase(value))
  }

  get size(): number {
    return this.values.size
  }

  /** Kept values in canonical order */
  toSortedArray(): string[] {
    return sortCanonical(this.values.values())
  }
}

/**
 * Removes exact duplicates (case-sensitive, as written), keeping first occurrence
 */
export function uniqueAsWritten(values: Iterable<string>): string[] {
  return Array.from(new Set(values))
}
