import type { CanonicalPolicy } from '../../types/config'
import type { FieldName, RecordId } from '../../types/record'
import { isAttributeField } from '../../types/record'

/**
 * One member's normalized value for a field.
 */
export interface CandidateValue {
  recordId: RecordId
  value: string
}

export type CanonicalPolicyFunction = (candidates: readonly CandidateValue[]) => string | undefined

/**
 * Default policy per field: identifiers prefer completeness, everything else plurality.
 */
export function defaultPolicyFor(field: FieldName): CanonicalPolicy {
  if (isAttributeField(field)) return 'plurality'
  return field === 'email' || field === 'phone' ? 'plurality-or-most-complete' : 'plurality'
}

interface Tally {
  value: string
  count: number
  /** Lowest id of a record holding the value */
  firstHolder: RecordId
}

function tally(candidates: readonly CandidateValue[]): Tally[] {
  const tallies = new Map<string, Tally>()
  for (const { recordId, value } of candidates) {
    if (value === '') continue
    const existing = tallies.get(value)
    if (existing) {
      existing.count++
      if (recordId < existing.firstHolder) existing.firstHolder = recordId
    } else {
      tallies.set(value, { value, count: 1, firstHolder: recordId })
    }
  }
  return Array.from(tallies.values())
}

function lowerHolder(a: Tally, b: Tally): Tally {
  return a.firstHolder <= b.firstHolder ? a : b
}

/**
 * Most frequent value. Ties go to the value held by the lowest record id.
 *
 * @example
 * ```typescript
 * plurality([
 *   { recordId: 'r1', value: 'jon smith' },
 *   { recordId: 'r2', value: 'john smith' },
 *   { recordId: 'r3', value: 'john smith' },
 * ]) // 'john smith'
 * ```
 */
export const plurality: CanonicalPolicyFunction = (candidates) => {
  let best: Tally | undefined
  for (const entry of tally(candidates)) {
    if (!best || entry.count > best.count) {
      best = entry
    } else if (entry.count === best.count) {
      best = lowerHolder(best, entry)
    }
  }
  return best?.value
}

/**
 * A value held by strictly more records than any other wins. Otherwise the
 * longest value, ties to the lowest record id.
 *
 * @example
 * ```typescript
 * pluralityOrMostComplete([
 *   { recordId: 'r1', value: '5550123' },
 *   { recordId: 'r2', value: '2025550123' },
 * ]) // '2025550123'
 * ```
 */
export const pluralityOrMostComplete: CanonicalPolicyFunction = (candidates) => {
  const tallies = tally(candidates)
  if (tallies.length === 0) return undefined

  const sorted = tallies.slice().sort((a, b) => b.count - a.count)
  if (sorted.length === 1 || sorted[0].count > sorted[1].count) {
    return sorted[0].value
  }

  let longest = tallies[0]
  for (const entry of tallies.slice(1)) {
    if (entry.value.length > longest.value.length) {
      longest = entry
    } else if (entry.value.length === longest.value.length) {
      longest = lowerHolder(longest, entry)
    }
  }
  return longest.value
}

export const CANONICAL_POLICIES: Record<CanonicalPolicy, CanonicalPolicyFunction> = {
  plurality,
  'plurality-or-most-complete': pluralityOrMostComplete,
}
