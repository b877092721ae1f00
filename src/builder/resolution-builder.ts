import type { CountryCode } from 'libphonenumber-js'
import type {
  BlockKeyDefinition,
  BlockKeyPart,
  CanonicalPolicy,
  CatchAllConfig,
  FieldScoringConfig,
  MissingFieldPolicy,
  ResolutionConfig,
  ResolutionMode,
  SimilarityMetric,
} from '../types/config'
import type { FieldName } from '../types/record'
import { validateConfig } from './config-validator'

export interface ClusteringOptions {
  /** Defaults to `louvain` */
  algorithm?: string
  seed: number
  /** Louvain resolution, defaults to `DEFAULT_LOUVAIN_RESOLUTION` */
  resolution?: number
}

/**
 * Fluent builder for a `ResolutionConfig`.
 *
 * Nothing is checked until `build()`, which validates the whole
 * configuration at once and returns it frozen.
 *
 * @example
 * ```typescript
 * const config = new ResolutionBuilder()
 *   .blockOn('postal', [{ field: 'postalCode', transform: 'identity' }])
 *   .blockOn('name-sx', [{ field: 'name', transform: 'soundex' }])
 *   .field('name', 'jaro-winkler', 0.5)
 *   .field('phone', 'exact', 0.3)
 *   .field('email', 'exact', 0.2)
 *   .thresholds(0.5, 0.7)
 *   .mode('merge')
 *   .clustering({ seed: 42 })
 *   .build()
 * ```
 */
export class ResolutionBuilder {
  private readonly keys: BlockKeyDefinition[] = []
  private readonly fields: FieldScoringConfig[] = []
  private readonly policies: Partial<Record<FieldName, CanonicalPolicy>> = {}
  private lowThreshold?: number
  private clusterThreshold?: number
  private resolutionMode?: ResolutionMode
  private clusteringOptions?: ClusteringOptions
  private promote = false
  private catchAllConfig?: Partial<CatchAllConfig>
  private country?: CountryCode
  private missingFieldPolicy?: MissingFieldPolicy

  /**
   * Adds a block-key definition. A record gets the key only when every part
   * yields a value.
   */
  blockOn(name: string, parts: BlockKeyPart | BlockKeyPart[]): this {
    this.keys.push({ name, parts: Array.isArray(parts) ? parts : [parts] })
    return this
  }

  /**
   * Scores a field with a metric. Weights across all fields must sum to 1.
   */
  field(field: FieldName, metric: SimilarityMetric, weight: number): this {
    this.fields.push({ field, metric, weight })
    return this
  }

  /**
   * @param low - Minimum pair score that becomes an edge
   * @param cluster - Minimum edge score used for partitioning
   */
  thresholds(low: number, cluster: number): this {
    this.lowThreshold = low
    this.clusterThreshold = cluster
    return this
  }

  mode(mode: ResolutionMode): this {
    this.resolutionMode = mode
    return this
  }

  clustering(options: ClusteringOptions): this {
    this.clusteringOptions = options
    return this
  }

  promoteSingletons(enabled = true): this {
    this.promote = enabled
    return this
  }

  catchAll(config: Partial<CatchAllConfig>): this {
    this.catchAllConfig = config
    return this
  }

  phoneCountry(country: CountryCode): this {
    this.country = country
    return this
  }

  missingFields(policy: MissingFieldPolicy): this {
    this.missingFieldPolicy = policy
    return this
  }

  canonicalPolicy(field: FieldName, policy: CanonicalPolicy): this {
    this.policies[field] = policy
    return this
  }

  /**
   * @throws {ConfigurationError} If the configuration is incomplete or invalid
   */
  build(): ResolutionConfig {
    return validateConfig({
      normalization: this.country ? { phoneCountry: this.country } : {},
      blocking: { keys: this.keys, catchAll: this.catchAllConfig },
      scoring: { fields: this.fields, missingFields: this.missingFieldPolicy },
      thresholds: { low: this.lowThreshold, cluster: this.clusterThreshold },
      mode: this.resolutionMode,
      clustering: this.clusteringOptions,
      promoteSingletons: this.promote,
      canonicalPolicies: this.policies,
    })
  }
}
