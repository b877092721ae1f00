import type { FieldType } from '../../types/record'
import type { Logger } from '../../utils/logger'
import { createSilentLogger } from '../../utils/logger'
import { normalizeAddress, normalizePostalCode } from './address'
import { normalizeText } from './basic'
import { normalizeEmail } from './email'
import { normalizeName } from './name'
import { normalizePhone } from './phone'
import type { NormalizerFunction, NormalizerMetadata, NormalizerOptions } from './types'

const BUILT_IN_NORMALIZERS: ReadonlyArray<[FieldType, NormalizerFunction]> = [
  ['name', normalizeName],
  ['email', normalizeEmail],
  ['phone', normalizePhone],
  ['address', normalizeAddress],
  ['postalCode', normalizePostalCode],
  ['text', normalizeText],
]

/**
 * Registry of normalizer functions keyed by field type.
 *
 * Each resolver owns its own registry; registering a custom normalizer never
 * affects another resolver in the same process.
 */
export class NormalizerRegistry {
  private readonly normalizers = new Map<FieldType, NormalizerFunction>()
  private readonly custom = new Set<FieldType>()
  private readonly logger: Logger

  constructor(logger: Logger = createSilentLogger()) {
    this.logger = logger
    for (const [fieldType, fn] of BUILT_IN_NORMALIZERS) {
      this.normalizers.set(fieldType, fn)
    }
  }

  /**
   * Registers a normalizer for a field type, replacing the current one.
   *
   * @example
   * ```typescript
   * registry.register('email', (value) => value.trim().toLowerCase().replace(/\+[^@]*@/, '@'))
   * ```
   */
  register(fieldType: FieldType, fn: NormalizerFunction): void {
    if (this.custom.has(fieldType)) {
      this.logger.warn(`Normalizer for '${fieldType}' is already registered. Overwriting.`)
    }
    this.normalizers.set(fieldType, fn)
    this.custom.add(fieldType)
  }

  get(fieldType: FieldType): NormalizerFunction {
    return this.normalizers.get(fieldType) ?? normalizeText
  }

  list(): NormalizerMetadata[] {
    return Array.from(this.normalizers.keys()).map((fieldType) => ({
      fieldType,
      custom: this.custom.has(fieldType),
    }))
  }

  /**
   * Applies the normalizer for `fieldType`.
   * A custom normalizer that throws falls back to the lowercased, trimmed value.
   */
  apply(value: string, fieldType: FieldType, options: NormalizerOptions): string {
    const normalizer = this.get(fieldType)
    try {
      return normalizer(value, options)
    } catch (error) {
      this.logger.warn(`Normalizer for '${fieldType}' failed; using fallback form`, {
        error: error instanceof Error ? error.message : String(error),
      })
      return normalizeText(value)
    }
  }
}

/**
 * Composes normalizers into one that applies them left to right.
 *
 * @example
 * ```typescript
 * const nameThenAscii = composeNormalizers(normalizeName, (v) => v.replace(/[^a-z ]/g, ''))
 * ```
 */
export function composeNormalizers(...normalizers: NormalizerFunction[]): NormalizerFunction {
  return (value: string, options: NormalizerOptions) =>
    normalizers.reduce((result, normalizer) => normalizer(result, options), value)
}
