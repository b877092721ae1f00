import type { MalformedRecordError } from '../utils/errors'
import type { CatchAllPolicy, ResolutionMode } from './config'
import type { FieldName, NormalizedFields, NormalizedRecord, RecordId } from './record'

/**
 * A string identifier for a block.
 * Records sharing a block key are compared against each other.
 */
export type BlockKey = string

/**
 * Per-field similarity scores in [0, 1] for one record pair.
 */
export type FieldScores = Partial<Record<FieldName, number>>

/**
 * Scores for a compared pair before thresholding.
 */
export interface PairScore {
  fieldScores: FieldScores
  /** Weighted aggregate in [0, 1] */
  score: number
}

/**
 * An undirected, weighted edge of the similarity graph.
 * `source < target` under ordinal comparison.
 */
export interface SimilarityEdge extends PairScore {
  source: RecordId
  target: RecordId
  /** Blocks in which the pair was compared */
  blockKeys: BlockKey[]
}

export type ClusterId = string

/**
 * A community of likely-duplicate records. Members are sorted.
 */
export interface Cluster {
  id: ClusterId
  members: RecordId[]
}

/**
 * Canonical representation of one resolved entity.
 */
export interface MasterEntity {
  id: string
  /** Null for a promoted singleton */
  clusterId: ClusterId | null
  attributes: NormalizedFields
  /** Sorted ids of the records assigned to this entity */
  memberIds: RecordId[]
}

/**
 * Non-destructive assertion that two records denote the same entity.
 */
export interface SameAsLink {
  source: RecordId
  target: RecordId
  clusterId: ClusterId
}

/**
 * A record in the post-resolution output model.
 * Link mode keeps every original; merge mode replaces each cluster with one merged record.
 */
export interface ResolvedRecord {
  id: string
  kind: 'original' | 'merged'
  fields: NormalizedFields
  sourceRecordIds: RecordId[]
}

/**
 * A record rejected by structural validation.
 */
export interface RecordRejection {
  index: number
  recordId?: RecordId
  error: MalformedRecordError
}

/**
 * Raised when the catch-all block grows past its configured ceiling.
 */
export interface BlockingExhaustionWarning {
  code: 'BLOCKING_EXHAUSTION'
  blockKey: BlockKey
  blockSize: number
  ceiling: number
  policy: CatchAllPolicy
  /** Records actually compared in the block after the policy was applied */
  comparedRecords: number
}

/**
 * Raised when the configured community detection algorithm is unavailable.
 */
export interface AlgorithmFallbackWarning {
  code: 'ALGORITHM_FALLBACK'
  requested: string
  used: string
}

export type ResolutionWarning = BlockingExhaustionWarning | AlgorithmFallbackWarning

/**
 * Statistics about the blocking operation.
 */
export interface BlockingStats {
  /** Number of unique blocks created */
  totalBlocks: number
  /** Largest block size */
  maxBlockSize: number
  /** Records that only landed in the catch-all block */
  catchAllRecords: number
  /** Distinct candidate pairs after blocking */
  candidatePairs: number
  /** n*(n-1)/2 */
  comparisonsWithoutBlocking: number
  /** Percentage of comparisons avoided */
  reductionPercentage: number
}

export interface ResolutionStats {
  inputRecords: number
  acceptedRecords: number
  rejectedRecords: number
  blocking: BlockingStats
  comparisonsMade: number
  edges: number
  edgesAboveClusterThreshold: number
  clusters: number
  singletons: number
  masterEntities: number
  resolvedRecords: number
}

/**
 * Everything a run produces. Nothing in here has been persisted yet.
 */
export interface ResolutionResult {
  mode: ResolutionMode
  records: NormalizedRecord[]
  edges: SimilarityEdge[]
  clusters: Cluster[]
  clusterAssignments: Map<RecordId, ClusterId>
  /** Records with no edge at or above the cluster threshold */
  singletons: RecordId[]
  masterEntities: MasterEntity[]
  /** record id → master entity id */
  assignments: Map<RecordId, string>
  /** Populated in link mode */
  sameAsLinks: SameAsLink[]
  resolvedRecords: ResolvedRecord[]
  rejections: RecordRejection[]
  warnings: ResolutionWarning[]
  stats: ResolutionStats
}
