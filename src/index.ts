// Main entry point
export { Resolver } from './core/resolver'
export type { ResolverOptions } from './core/resolver'

// Configuration
export { ResolutionBuilder } from './builder/resolution-builder'
export type { ClusteringOptions } from './builder/resolution-builder'
export {
  validateConfig,
  DEFAULT_CATCH_ALL,
  DEFAULT_LOUVAIN_RESOLUTION,
  WEIGHT_SUM_TOLERANCE,
} from './builder/config-validator'

// Comparators
export {
  exactMatch,
  levenshtein,
  jaroWinkler,
  type JaroWinklerOptions,
  tokenOverlap,
  soundexEncode,
} from './core/comparators'

// Pipeline stages
export * from './core/normalizers'
export * from './core/blocking'
export * from './core/scoring'
export * from './core/graph'
export * from './core/clustering'
export * from './core/resolution'
export { validateRecord, validateRecords } from './core/record-validation'
export type { RecordValidationResult } from './core/record-validation'

// Sources and sinks
export * from './adapters'

// Visualization export
export * from './export'

// Types
export * from './types'

// Errors
export {
  GraphDedupeError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  MalformedRecordError,
  ClusteringNondeterminismError,
  GraphMutationError,
  PersistenceError,
  isGraphDedupeError,
} from './utils/errors'

// Logging
export type { Logger } from './utils/logger'
export { defaultLogger, createSilentLogger, createPrefixedLogger } from './utils/logger'
