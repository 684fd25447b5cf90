/**
 * Field combination strategies used when building merged records.
 * Every strategy receives member values already ordered by source priority.
 * @module merge/strategies
 */

import type { DiseaseFlag } from '../types/record.js'
import { CaseInsensitiveSet, sortCanonical } from '../utils/strings.js'

/**
 * First non-empty string, or the empty string when there is none.
 *
 * @example
 * ```typescript
 * preferNonEmpty([null, '', 'Lung Carcinoma']) // 'Lung Carcinoma'
 * preferNonEmpty([undefined]) // ''
 * ```
 */
export function preferNonEmpty(
  values: ReadonlyArray<string | null | undefined>
): string {
  for (const value of values) {
    if (value !== null && value !== undefined && value.length > 0) {
      return value
    }
  }
  return ''
}

/**
 * Case-insensitive union of string lists. Each list is visited in canonical
 * order so the casing kept for a value does not depend on how a source
 * happened to order its list. Output is in canonical order.
 *
 * @param lists - One list per member, highest priority first
 * @param exclude - Values to leave out (compared case-insensitively)
 *
 * @example
 * ```typescript
 * unionCaseInsensitive([['NSCLC'], ['nsclc', 'Non-small cell lung cancer']])
 * // ['Non-small cell lung cancer', 'NSCLC']
 * ```
 */
export function unionCaseInsensitive(
  lists: ReadonlyArray<ReadonlyArray<string>>,
  exclude: Iterable<string> = []
): string[] {
  const collected = new CaseInsensitiveSet(exclude)
  for (const list of lists) {
    collected.addAll(sortCanonical(list))
  }
  return collected.toSortedArray()
}

/**
 * Logical OR over tri-state flags. Unknown never overwrites a known value;
 * `false` is only returned when some member asserted it and none asserted
 * `true`.
 *
 * @example
 * ```typescript
 * anyTrue([null, false, true]) // true
 * anyTrue([null, false]) // false
 * anyTrue([undefined, null]) // null
 * ```
 */
export function anyTrue(
  values: ReadonlyArray<DiseaseFlag | undefined>
): DiseaseFlag {
  let result: DiseaseFlag = null
  for (const value of values) {
    if (value === true) return true
    if (value === false) result = false
  }
  return result
}
