import type { BlockKey } from '../../types/resolution'
import type { NormalizedRecord } from '../../types/record'

/**
 * Reserved key for records from which no configured key can be derived.
 */
export const CATCH_ALL_BLOCK_KEY: BlockKey = '__catch_all__'

/**
 * A map of block keys to the records within that block.
 * Keys iterate in ascending order; records within a block are sorted by id.
 */
export type BlockSet = Map<BlockKey, NormalizedRecord[]>

/**
 * A distinct candidate pair together with every block that produced it.
 */
export interface CandidatePair {
  left: NormalizedRecord
  right: NormalizedRecord
  blockKeys: BlockKey[]
}
