import type { RecordId } from '../../types/record'
import type { SimilarityGraph } from '../graph/similarity-graph'

/**
 * Community label per node. Labels are only meaningful for equality.
 */
export type Partition = Map<RecordId, number>

/**
 * A community detection algorithm.
 * Implementations must return the same partition for the same graph and seed.
 */
export interface CommunityDetectionAlgorithm {
  readonly name: string
  partition(graph: SimilarityGraph, seed: number): Partition
}
