import type { BlockKeyDefinition } from '../../types/config'
import type { NormalizedRecord } from '../../types/record'
import { compareRecordIds } from '../../types/record'
import type { BlockKey } from '../../types/resolution'
import { applyTransform } from './transforms'
import { CATCH_ALL_BLOCK_KEY } from './types'

/**
 * Derives block keys for normalized records.
 *
 * Each definition is a conjunction of key parts. A record receives a
 * definition's key only when every part yields a non-empty value, and the
 * union of keys over all definitions. A record with no key is placed in the
 * catch-all block.
 *
 * @example
 * ```typescript
 * const blocker = new Blocker([
 *   { name: 'postal', parts: [{ field: 'postalCode', transform: 'identity' }] },
 *   { name: 'phone4', parts: [{ field: 'phone', transform: 'lastN', length: 4 }] },
 * ])
 * blocker.keysFor(record) // ['phone4=0123', 'postal=20500']
 * ```
 */
export class Blocker {
  constructor(private readonly definitions: readonly BlockKeyDefinition[]) {}

  /**
   * Every block key of a record, sorted and de-duplicated.
   */
  keysFor(record: NormalizedRecord): BlockKey[] {
    const keys = new Set<BlockKey>()
    for (const definition of this.definitions) {
      const key = this.deriveKey(definition, record)
      if (key !== null) keys.add(key)
    }

    if (keys.size === 0) {
      return [CATCH_ALL_BLOCK_KEY]
    }
    return Array.from(keys).sort(compareRecordIds)
  }

  /**
   * Builds one definition's key, formatted `name=value1|value2`.
   *
   * @returns The key, or null when any part is missing or transforms to nothing
   */
  deriveKey(definition: BlockKeyDefinition, record: NormalizedRecord): BlockKey | null {
    const values: string[] = []
    for (const part of definition.parts) {
      const value = record.fields[part.field]
      if (value === undefined) return null

      const transformed = applyTransform(value, part)
      if (transformed === null || transformed === '') return null
      values.push(transformed)
    }

    return `${definition.name}=${values.join('|')}`
  }
}
