import type { CountryCode } from 'libphonenumber-js'
import type { FieldType } from '../../types/record'

/**
 * Options shared by every normalizer in a run.
 */
export interface NormalizerOptions {
  /** Country whose calling code is dropped from phone numbers */
  phoneCountry?: CountryCode
}

/**
 * Normalizer function signature.
 * Must be total (never throw) and idempotent: applying it to its own output
 * returns that output unchanged.
 *
 * @example
 * ```typescript
 * const trimNormalizer: NormalizerFunction = (value) => value.trim()
 * ```
 */
export type NormalizerFunction = (value: string, options: NormalizerOptions) => string

/**
 * Metadata about a normalizer for introspection and documentation.
 */
export interface NormalizerMetadata {
  /** Field type the normalizer is registered for */
  fieldType: FieldType
  /** Whether the normalizer was registered by the caller */
  custom: boolean
}
