import type { NormalizedRecord } from '../../types/record'
import type { BlockKey, SimilarityEdge } from '../../types/resolution'
import type { BlockSet } from '../blocking/types'

/**
 * Pure scoring function for a single block.
 */
export type BlockScoringTask = (
  blockKey: BlockKey,
  records: readonly NormalizedRecord[]
) => SimilarityEdge[]

/**
 * Runs block scoring tasks and returns one edge list per block.
 *
 * Blocks are independent, so an implementation may score them in any order
 * or in parallel, but must return the lists in block-key order.
 */
export interface BlockScoringExecutor {
  scoreBlocks(blocks: BlockSet, task: BlockScoringTask): SimilarityEdge[][]
}

/**
 * Scores blocks one after another in the calling thread.
 */
export class InProcessExecutor implements BlockScoringExecutor {
  scoreBlocks(blocks: BlockSet, task: BlockScoringTask): SimilarityEdge[][] {
    const results: SimilarityEdge[][] = []
    for (const [blockKey, records] of blocks) {
      results.push(task(blockKey, records))
    }
    return results
  }
}
