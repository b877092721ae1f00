export type {
  RecordId,
  CoreField,
  AttributeField,
  FieldName,
  FieldType,
  RawRecord,
  NormalizedFields,
  NormalizedRecord,
} from './record'
export {
  CORE_FIELDS,
  isAttributeField,
  isFieldName,
  fieldTypeOf,
  getRawValue,
  presentFields,
  compareRecordIds,
} from './record'

export type {
  SimilarityMetric,
  FieldScoringConfig,
  MissingFieldPolicy,
  ScoringConfig,
  BlockTransform,
  BlockKeyPart,
  BlockKeyDefinition,
  CatchAllPolicy,
  CatchAllConfig,
  BlockingConfig,
  ThresholdConfig,
  ResolutionMode,
  ClusteringConfig,
  CanonicalPolicy,
  NormalizationConfig,
  ResolutionConfig,
} from './config'
export { SIMILARITY_METRICS, BLOCK_TRANSFORMS } from './config'

export type {
  BlockKey,
  FieldScores,
  PairScore,
  SimilarityEdge,
  ClusterId,
  Cluster,
  MasterEntity,
  SameAsLink,
  ResolvedRecord,
  RecordRejection,
  BlockingExhaustionWarning,
  AlgorithmFallbackWarning,
  ResolutionWarning,
  BlockingStats,
  ResolutionStats,
  ResolutionResult,
} from './resolution'
