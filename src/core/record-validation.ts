import type { RawRecord, RecordId } from '../types/record'
import { CORE_FIELDS } from '../types/record'
import type { RecordRejection } from '../types/resolution'
import { MalformedRecordError, isPlainObject } from '../utils/errors'

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

export interface RecordValidationResult {
  accepted: RawRecord[]
  rejections: RecordRejection[]
}

/**
 * Checks the structure of a single input.
 * Unknown top-level keys are ignored; `null` field values count as absent.
 *
 * @returns A fresh frozen record holding only the known fields
 * @throws {MalformedRecordError} If the input cannot take part in a run
 */
export function validateRecord(input: unknown, index: number): RawRecord {
  if (!isPlainObject(input)) {
    throw new MalformedRecordError(index, 'record must be an object')
  }

  const { id } = input
  if (typeof id !== 'string' || id.trim() === '') {
    throw new MalformedRecordError(index, 'id must be a non-empty string')
  }

  const record: Mutable<RawRecord> = { id }
  for (const field of CORE_FIELDS) {
    const value = input[field]
    if (value === undefined || value === null) continue
    if (typeof value !== 'string') {
      throw new MalformedRecordError(index, `field '${field}' must be a string`, id, {
        field,
        type: typeof value,
      })
    }
    record[field] = value
  }

  if (input.attributes !== undefined && input.attributes !== null) {
    if (!isPlainObject(input.attributes)) {
      throw new MalformedRecordError(index, 'attributes must be an object', id)
    }
    const attributes: Record<string, string> = {}
    for (const [key, value] of Object.entries(input.attributes)) {
      if (value === undefined || value === null) continue
      if (typeof value !== 'string') {
        throw new MalformedRecordError(index, `attribute '${key}' must be a string`, id, {
          field: `attributes.${key}`,
          type: typeof value,
        })
      }
      attributes[key] = value
    }
    record.attributes = Object.freeze(attributes)
  }

  return Object.freeze(record)
}

/**
 * Validates a batch. Later records reusing an earlier id are rejected;
 * the first occurrence is kept.
 */
export function validateRecords(inputs: readonly unknown[]): RecordValidationResult {
  const accepted: RawRecord[] = []
  const rejections: RecordRejection[] = []
  const seen = new Set<RecordId>()

  inputs.forEach((input, index) => {
    try {
      const record = validateRecord(input, index)
      if (seen.has(record.id)) {
        throw new MalformedRecordError(index, 'duplicate id', record.id)
      }
      seen.add(record.id)
      accepted.push(record)
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) throw error
      rejections.push({ index, recordId: error.recordId, error })
    }
  })

  return { accepted, rejections }
}
