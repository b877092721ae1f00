import type { CountryCode } from 'libphonenumber-js'
import type { FieldName } from './record'

/**
 * Available similarity metrics for field comparison.
 * - `'jaro-winkler'`: edit similarity tuned for short strings such as names
 * - `'levenshtein'`: normalized edit distance
 * - `'exact'`: 1 when equal, 0 otherwise (emails, phones)
 * - `'token-overlap'`: Jaccard overlap of whitespace tokens (addresses)
 */
export type SimilarityMetric = 'jaro-winkler' | 'levenshtein' | 'exact' | 'token-overlap'

export const SIMILARITY_METRICS: readonly SimilarityMetric[] = [
  'jaro-winkler',
  'levenshtein',
  'exact',
  'token-overlap',
] as const

/**
 * How a single field contributes to the aggregated pair score.
 */
export interface FieldScoringConfig {
  field: FieldName
  metric: SimilarityMetric
  /** Share of the aggregate; all weights sum to 1 */
  weight: number
}

/**
 * What to do with a field that is missing on one or both records.
 * - `'renormalize'`: leave it out and rescale the remaining weights
 * - `'zero'`: score it as 0
 */
export type MissingFieldPolicy = 'renormalize' | 'zero'

export interface ScoringConfig {
  fields: FieldScoringConfig[]
  missingFields: MissingFieldPolicy
}

/**
 * Transformations applied to a normalized value to derive a block-key part.
 */
export type BlockTransform = 'identity' | 'firstN' | 'lastN' | 'soundex'

export const BLOCK_TRANSFORMS: readonly BlockTransform[] = [
  'identity',
  'firstN',
  'lastN',
  'soundex',
] as const

export interface BlockKeyPart {
  field: FieldName
  transform: BlockTransform
  /** Character count for `firstN` / `lastN` */
  length?: number
}

/**
 * A named conjunction of key parts. A record gets this key only when every
 * part yields a non-empty value.
 *
 * @example
 * ```typescript
 * const namePostal: BlockKeyDefinition = {
 *   name: 'name3-postal',
 *   parts: [
 *     { field: 'name', transform: 'firstN', length: 3 },
 *     { field: 'postalCode', transform: 'identity' },
 *   ],
 * }
 * ```
 */
export interface BlockKeyDefinition {
  name: string
  parts: BlockKeyPart[]
}

/**
 * Handling of an oversized catch-all block.
 * - `'proceed'`: compare everything and report the warning
 * - `'sample'`: compare a seeded sample of `sampleSize` records
 * - `'skip'`: make no comparisons in the catch-all block
 */
export type CatchAllPolicy = 'proceed' | 'sample' | 'skip'

export interface CatchAllConfig {
  /** Size above which a BlockingExhaustionWarning is raised */
  ceiling: number
  policy: CatchAllPolicy
  sampleSize: number
}

export interface BlockingConfig {
  keys: BlockKeyDefinition[]
  catchAll: CatchAllConfig
}

/**
 * Pair score thresholds.
 * `low` bounds which pairs become edges; `cluster` bounds which edges drive
 * partitioning. `low <= cluster`.
 */
export interface ThresholdConfig {
  low: number
  cluster: number
}

/**
 * - `'merge'`: replace every cluster with one merged record
 * - `'link'`: keep every record and link cluster members with same-as relations
 */
export type ResolutionMode = 'merge' | 'link'

export interface ClusteringConfig {
  /** Algorithm name; an unregistered name falls back to connected components */
  algorithm: string
  seed: number
  /** Louvain resolution (gamma); lower values favour larger communities */
  resolution: number
}

/**
 * Policies for choosing a master entity's canonical value per field.
 * - `'plurality'`: most frequent value, ties to the lowest record id
 * - `'plurality-or-most-complete'`: a strict plurality wins, otherwise the
 *   longest value, ties to the lowest record id
 */
export type CanonicalPolicy = 'plurality' | 'plurality-or-most-complete'

export interface NormalizationConfig {
  /** Calling code of this country is dropped from phone numbers */
  phoneCountry?: CountryCode
}

/**
 * Complete, validated configuration for one resolution run.
 * Constructed once and passed by reference to every stage.
 */
export interface ResolutionConfig {
  readonly normalization: NormalizationConfig
  readonly blocking: BlockingConfig
  readonly scoring: ScoringConfig
  readonly thresholds: ThresholdConfig
  readonly mode: ResolutionMode
  readonly clustering: ClusteringConfig
  readonly promoteSingletons: boolean
  /** Overrides of the default per-field canonical policy */
  readonly canonicalPolicies: Partial<Record<FieldName, CanonicalPolicy>>
}
