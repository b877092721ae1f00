import { isSupportedCountry } from 'libphonenumber-js'
import type {
  BlockKeyDefinition,
  BlockKeyPart,
  BlockingConfig,
  CanonicalPolicy,
  CatchAllConfig,
  CatchAllPolicy,
  ClusteringConfig,
  FieldScoringConfig,
  MissingFieldPolicy,
  NormalizationConfig,
  ResolutionConfig,
  ResolutionMode,
  ScoringConfig,
  ThresholdConfig,
} from '../types/config'
import { BLOCK_TRANSFORMS, SIMILARITY_METRICS } from '../types/config'
import type { FieldName } from '../types/record'
import { isFieldName } from '../types/record'
import {
  ConfigurationError,
  InvalidParameterError,
  MissingParameterError,
  isPlainObject,
  requireInRange,
  requireNonEmptyString,
  requireOneOf,
  requirePlainObject,
  requirePositive,
} from '../utils/errors'
import { MAX_SEED } from '../utils/random'

/** Allowed deviation of the scoring weight sum from 1 */
export const WEIGHT_SUM_TOLERANCE = 1e-6

export const DEFAULT_CATCH_ALL: CatchAllConfig = {
  ceiling: 1000,
  policy: 'proceed',
  sampleSize: 1000,
}

/**
 * Louvain resolution used when the configuration sets none. Below 1 so that
 * a chain of moderately similar records stays one community.
 */
export const DEFAULT_LOUVAIN_RESOLUTION = 0.3

const MODES: readonly ResolutionMode[] = ['merge', 'link']
const CATCH_ALL_POLICIES: readonly CatchAllPolicy[] = ['proceed', 'sample', 'skip']
const MISSING_FIELD_POLICIES: readonly MissingFieldPolicy[] = ['renormalize', 'zero']
const CANONICAL_POLICIES: readonly CanonicalPolicy[] = ['plurality', 'plurality-or-most-complete']

/**
 * Validates a configuration given as a plain object (for example parsed JSON)
 * and returns a frozen `ResolutionConfig`.
 *
 * Optional sections take their defaults: normalization `{}`, catch-all
 * ceiling 1000 with policy `proceed`, missing fields `renormalize`, algorithm
 * `louvain` with resolution `DEFAULT_LOUVAIN_RESOLUTION`, no singleton
 * promotion.
 *
 * @throws {ConfigurationError} On the first invalid setting
 *
 * @example
 * ```typescript
 * const config = validateConfig(JSON.parse(fs.readFileSync('resolution.json', 'utf8')))
 * ```
 */
export function validateConfig(input: unknown): ResolutionConfig {
  try {
    const root = requirePlainObject(input, 'config')

    const config: ResolutionConfig = {
      normalization: validateNormalization(root.normalization),
      blocking: validateBlocking(root.blocking),
      scoring: validateScoring(root.scoring),
      thresholds: validateThresholds(root.thresholds),
      mode: validateMode(root.mode),
      clustering: validateClustering(root.clustering),
      promoteSingletons: validateBoolean(root.promoteSingletons ?? false, 'promoteSingletons'),
      canonicalPolicies: validateCanonicalPolicies(root.canonicalPolicies),
    }

    return deepFreeze(config)
  } catch (error) {
    if (error instanceof InvalidParameterError || error instanceof MissingParameterError) {
      throw new ConfigurationError(error.message, error.parameterName, error.context)
    }
    throw error
  }
}

function validateNormalization(input: unknown): NormalizationConfig {
  if (input === undefined) return {}
  const section = requirePlainObject(input, 'normalization')
  if (section.phoneCountry === undefined) return {}

  const code = requireNonEmptyString(section.phoneCountry, 'normalization.phoneCountry')
  if (!isSupportedCountry(code)) {
    throw new ConfigurationError(
      `Unsupported phone country '${code}'`,
      'normalization.phoneCountry'
    )
  }
  return { phoneCountry: code }
}

function validateBlocking(input: unknown): BlockingConfig {
  const section = requirePlainObject(input, 'blocking')
  if (!Array.isArray(section.keys)) {
    throw new ConfigurationError('blocking.keys must be an array', 'blocking.keys')
  }

  const names = new Set<string>()
  const keys = section.keys.map((definition: unknown, i: number) => {
    const validated = validateKeyDefinition(definition, `blocking.keys[${i}]`)
    if (names.has(validated.name)) {
      throw new ConfigurationError(
        `Duplicate block key name '${validated.name}'`,
        `blocking.keys[${i}].name`
      )
    }
    names.add(validated.name)
    return validated
  })

  return { keys, catchAll: validateCatchAll(section.catchAll) }
}

function validateKeyDefinition(input: unknown, path: string): BlockKeyDefinition {
  const definition = requirePlainObject(input, path)
  const name = requireNonEmptyString(definition.name, `${path}.name`)
  if (!Array.isArray(definition.parts) || definition.parts.length === 0) {
    throw new ConfigurationError(`${path}.parts must be a non-empty array`, `${path}.parts`)
  }

  const parts = definition.parts.map((part: unknown, i: number) =>
    validateKeyPart(part, `${path}.parts[${i}]`)
  )
  return { name, parts }
}

function validateKeyPart(input: unknown, path: string): BlockKeyPart {
  const part = requirePlainObject(input, path)
  const field = validateFieldName(part.field, `${path}.field`)

  const transform = requireKnown(part.transform, BLOCK_TRANSFORMS, `${path}.transform`, 'block transform')

  if (transform === 'firstN' || transform === 'lastN') {
    const length = validateInteger(part.length, `${path}.length`, 1)
    return { field, transform, length }
  }
  return { field, transform }
}

function validateCatchAll(input: unknown): CatchAllConfig {
  if (input === undefined) return { ...DEFAULT_CATCH_ALL }
  const section = requirePlainObject(input, 'blocking.catchAll')

  return {
    ceiling:
      section.ceiling === undefined
        ? DEFAULT_CATCH_ALL.ceiling
        : validateInteger(section.ceiling, 'blocking.catchAll.ceiling', 0),
    policy:
      section.policy === undefined
        ? DEFAULT_CATCH_ALL.policy
        : requireOneOf(section.policy, CATCH_ALL_POLICIES, 'blocking.catchAll.policy'),
    sampleSize:
      section.sampleSize === undefined
        ? DEFAULT_CATCH_ALL.sampleSize
        : validateInteger(section.sampleSize, 'blocking.catchAll.sampleSize', 1),
  }
}

function validateScoring(input: unknown): ScoringConfig {
  const section = requirePlainObject(input, 'scoring')
  if (!Array.isArray(section.fields) || section.fields.length === 0) {
    throw new ConfigurationError('scoring.fields must be a non-empty array', 'scoring.fields')
  }

  const seen = new Set<FieldName>()
  const fields = section.fields.map((entry: unknown, i: number) => {
    const validated = validateFieldScoring(entry, `scoring.fields[${i}]`)
    if (seen.has(validated.field)) {
      throw new ConfigurationError(
        `Field '${validated.field}' is scored more than once`,
        `scoring.fields[${i}].field`
      )
    }
    seen.add(validated.field)
    return validated
  })

  const sum = fields.reduce((total, field) => total + field.weight, 0)
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigurationError(
      `Scoring weights must sum to 1 (got ${sum})`,
      'scoring.fields',
      { sum }
    )
  }

  const missingFields =
    section.missingFields === undefined
      ? 'renormalize'
      : requireOneOf(section.missingFields, MISSING_FIELD_POLICIES, 'scoring.missingFields')

  return { fields, missingFields }
}

function validateFieldScoring(input: unknown, path: string): FieldScoringConfig {
  const entry = requirePlainObject(input, path)
  const field = validateFieldName(entry.field, `${path}.field`)

  const metric = requireKnown(entry.metric, SIMILARITY_METRICS, `${path}.metric`, 'similarity metric')
  const weight = validateUnitInterval(entry.weight, `${path}.weight`)

  return { field, metric, weight }
}

function validateThresholds(input: unknown): ThresholdConfig {
  const section = requirePlainObject(input, 'thresholds')
  const low = validateUnitInterval(section.low, 'thresholds.low')
  const cluster = validateUnitInterval(section.cluster, 'thresholds.cluster')

  if (low > cluster) {
    throw new ConfigurationError(
      `thresholds.low (${low}) must not exceed thresholds.cluster (${cluster})`,
      'thresholds',
      { low, cluster }
    )
  }
  return { low, cluster }
}

function validateMode(input: unknown): ResolutionMode {
  if (input === undefined || input === null) {
    throw new ConfigurationError("Resolution mode must be set to 'merge' or 'link'", 'mode')
  }
  return requireOneOf(input, MODES, 'mode')
}

function validateClustering(input: unknown): ClusteringConfig {
  const section = requirePlainObject(input, 'clustering')
  const algorithm =
    section.algorithm === undefined
      ? 'louvain'
      : requireNonEmptyString(section.algorithm, 'clustering.algorithm')
  const seed = validateInteger(section.seed, 'clustering.seed', 0)
  if (seed > MAX_SEED) {
    throw new InvalidParameterError('clustering.seed', seed, `must be <= ${MAX_SEED}`)
  }
  const resolution =
    section.resolution === undefined
      ? DEFAULT_LOUVAIN_RESOLUTION
      : requirePositive(
          validateNumber(section.resolution, 'clustering.resolution'),
          'clustering.resolution'
        )

  return { algorithm, seed, resolution }
}

function validateCanonicalPolicies(input: unknown): Partial<Record<FieldName, CanonicalPolicy>> {
  if (input === undefined) return {}
  const section = requirePlainObject(input, 'canonicalPolicies')

  const policies: Partial<Record<FieldName, CanonicalPolicy>> = {}
  for (const [key, value] of Object.entries(section)) {
    const field = validateFieldName(key, `canonicalPolicies.${key}`)
    policies[field] = requireOneOf(value, CANONICAL_POLICIES, `canonicalPolicies.${key}`)
  }
  return policies
}

function validateFieldName(input: unknown, path: string): FieldName {
  const field = requireNonEmptyString(input, path)
  if (!isFieldName(field)) {
    throw new ConfigurationError(
      `Unknown field '${field}'; use a core field or 'attributes.<key>'`,
      path
    )
  }
  return field
}

function requireKnown<T>(input: unknown, allowed: readonly T[], path: string, label: string): T {
  const match = allowed.find((candidate) => candidate === input)
  if (match === undefined) {
    throw new ConfigurationError(
      `Unknown ${label} '${String(input)}'; expected one of: ${allowed.join(', ')}`,
      path
    )
  }
  return match
}

function validateNumber(input: unknown, path: string): number {
  if (input === undefined || input === null) {
    throw new MissingParameterError(path)
  }
  if (typeof input !== 'number' || !Number.isFinite(input)) {
    throw new InvalidParameterError(path, input, 'must be a finite number')
  }
  return input
}

function validateUnitInterval(input: unknown, path: string): number {
  return requireInRange(validateNumber(input, path), 0, 1, path)
}

function validateInteger(input: unknown, path: string, min: number): number {
  const value = validateNumber(input, path)
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidParameterError(path, value, `must be an integer >= ${min}`)
  }
  return value
}

function validateBoolean(input: unknown, path: string): boolean {
  if (typeof input !== 'boolean') {
    throw new InvalidParameterError(path, input, 'must be a boolean')
  }
  return input
}

function deepFreeze<T>(value: T): T {
  if (Array.isArray(value)) {
    value.forEach((item: unknown) => deepFreeze(item))
  } else if (isPlainObject(value)) {
    Object.values(value).forEach((item) => deepFreeze(item))
  }
  Object.freeze(value)
  return value
}
