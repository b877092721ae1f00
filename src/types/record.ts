/**
 * Stable unique identifier of an input record.
 */
export type RecordId = string

/**
 * The typed fields every record may carry.
 */
export type CoreField = 'name' | 'email' | 'phone' | 'address' | 'postalCode'

/**
 * Extension fields live under `attributes` and are addressed as `attributes.<key>`.
 */
export type AttributeField = `attributes.${string}`

/**
 * Any field that can be normalized, blocked on, scored or canonicalized.
 */
export type FieldName = CoreField | AttributeField

/**
 * Normalizer families. Extension attributes use `text`.
 */
export type FieldType = 'name' | 'email' | 'phone' | 'address' | 'postalCode' | 'text'

export const CORE_FIELDS: readonly CoreField[] = [
  'name',
  'email',
  'phone',
  'address',
  'postalCode',
] as const

/**
 * An input record: a stable id plus a fixed set of optional string fields.
 *
 * `attributes` is the extension point for fields beyond the core set. They
 * are normalized as free text and may be used for blocking, scoring and
 * canonical values like any core field.
 *
 * @example
 * ```typescript
 * const record: RawRecord = {
 *   id: 'crm-1001',
 *   name: 'Dr. Jane Smith',
 *   email: 'JANE@example.com',
 *   phone: '+1 202 555 0123',
 *   postalCode: '20500',
 *   attributes: { employer: 'Acme Corp' },
 * }
 * ```
 */
export interface RawRecord {
  readonly id: RecordId
  readonly name?: string
  readonly email?: string
  readonly phone?: string
  readonly address?: string
  readonly postalCode?: string
  readonly attributes?: Readonly<Record<string, string>>
}

/**
 * Normalized values keyed by field name. Absent or blank raw values have no entry.
 */
export type NormalizedFields = Partial<Record<FieldName, string>>

/**
 * A record after normalization. `raw` is the original, borrowed read-only.
 */
export interface NormalizedRecord {
  readonly id: RecordId
  readonly raw: RawRecord
  readonly fields: NormalizedFields
}

/**
 * Returns true for `attributes.<key>` field names.
 */
export function isAttributeField(field: string): field is AttributeField {
  return field.startsWith('attributes.') && field.length > 'attributes.'.length
}

/**
 * Returns true for any name usable as a field.
 */
export function isFieldName(field: string): field is FieldName {
  return (CORE_FIELDS as readonly string[]).includes(field) || isAttributeField(field)
}

/**
 * Normalizer family for a field.
 */
export function fieldTypeOf(field: FieldName): FieldType {
  return isAttributeField(field) ? 'text' : field
}

/**
 * Reads a raw field value from a record.
 */
export function getRawValue(record: RawRecord, field: FieldName): string | undefined {
  if (isAttributeField(field)) {
    return record.attributes?.[field.slice('attributes.'.length)]
  }
  return record[field]
}

/**
 * Every field present on a record, core fields first, then attributes in key order.
 */
export function presentFields(record: RawRecord): FieldName[] {
  const fields: FieldName[] = CORE_FIELDS.filter((field) => record[field] !== undefined)
  const attributeKeys = Object.keys(record.attributes ?? {}).sort()
  for (const key of attributeKeys) {
    fields.push(`attributes.${key}`)
  }
  return fields
}

/**
 * Ordinal comparison of record ids. Used wherever a deterministic
 * tie-break on ids is needed.
 */
export function compareRecordIds(a: RecordId, b: RecordId): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
