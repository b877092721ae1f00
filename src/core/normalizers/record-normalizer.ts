import type { NormalizedFields, NormalizedRecord, RawRecord } from '../../types/record'
import { fieldTypeOf, getRawValue, presentFields } from '../../types/record'
import type { NormalizerRegistry } from './registry'
import type { NormalizerOptions } from './types'

/**
 * Normalizes every present field of a record.
 * Blank raw values produce no normalized entry.
 *
 * @example
 * ```typescript
 * normalizeRecord({ id: '1', name: 'Mr. John  SMITH', email: ' ' }, registry, {})
 * // { id: '1', raw: {...}, fields: { name: 'john smith' } }
 * ```
 */
export function normalizeRecord(
  record: RawRecord,
  registry: NormalizerRegistry,
  options: NormalizerOptions
): NormalizedRecord {
  const fields: NormalizedFields = {}

  for (const field of presentFields(record)) {
    const raw = getRawValue(record, field)
    if (raw === undefined || raw.trim() === '') continue

    const normalized = registry.apply(raw, fieldTypeOf(field), options)
    if (normalized !== '') {
      fields[field] = normalized
    }
  }

  return { id: record.id, raw: record, fields }
}
