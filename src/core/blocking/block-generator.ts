import type { CatchAllConfig } from '../../types/config'
import type { NormalizedRecord } from '../../types/record'
import { compareRecordIds } from '../../types/record'
import type {
  BlockKey,
  BlockingExhaustionWarning,
  BlockingStats,
} from '../../types/resolution'
import type { Logger } from '../../utils/logger'
import { createSilentLogger } from '../../utils/logger'
import { seededRandom, seededShuffle } from '../../utils/random'
import type { Blocker } from './blocker'
import type { BlockSet, CandidatePair } from './types'
import { CATCH_ALL_BLOCK_KEY } from './types'

export interface BlockGeneratorOptions {
  catchAll: CatchAllConfig
  /** Seed for catch-all sampling */
  seed: number
  logger?: Logger
}

/**
 * Blocks after the catch-all policy has been applied.
 */
export interface BlockingOutcome {
  blocks: BlockSet
  warnings: BlockingExhaustionWarning[]
  stats: BlockingStats
}

/**
 * Groups records into blocks, enforces the catch-all ceiling and reports
 * statistics about the reduction in comparisons.
 */
export class BlockGenerator {
  private readonly logger: Logger

  constructor(
    private readonly blocker: Blocker,
    private readonly options: BlockGeneratorOptions
  ) {
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Runs blocking end to end.
   */
  generate(records: readonly NormalizedRecord[]): BlockingOutcome {
    const blocks = this.generateBlocks(records)
    const catchAllRecords = blocks.get(CATCH_ALL_BLOCK_KEY)?.length ?? 0

    const warnings: BlockingExhaustionWarning[] = []
    const warning = this.applyCatchAllPolicy(blocks)
    if (warning) {
      warnings.push(warning)
      this.logger.warn(
        `Catch-all block holds ${warning.blockSize} records (ceiling ${warning.ceiling}); policy '${warning.policy}'`,
        { ...warning }
      )
    }

    const stats = this.calculateStats(blocks, records.length, catchAllRecords)
    this.logger.debug('Blocking complete', { ...stats })

    return { blocks, warnings, stats }
  }

  /**
   * Groups records by every key they carry.
   * Keys are inserted in ascending order and records are sorted by id.
   */
  generateBlocks(records: readonly NormalizedRecord[]): BlockSet {
    const grouped = new Map<BlockKey, NormalizedRecord[]>()
    const sorted = records.slice().sort((a, b) => compareRecordIds(a.id, b.id))

    for (const record of sorted) {
      for (const key of this.blocker.keysFor(record)) {
        const block = grouped.get(key)
        if (block) {
          block.push(record)
        } else {
          grouped.set(key, [record])
        }
      }
    }

    const blocks: BlockSet = new Map()
    for (const key of Array.from(grouped.keys()).sort(compareRecordIds)) {
      const block = grouped.get(key)
      if (block) blocks.set(key, block)
    }
    return blocks
  }

  /**
   * Applies the catch-all policy in place when the catch-all block exceeds
   * its ceiling.
   *
   * @returns The exhaustion warning, or null when the block is within bounds
   */
  applyCatchAllPolicy(blocks: BlockSet): BlockingExhaustionWarning | null {
    const block = blocks.get(CATCH_ALL_BLOCK_KEY)
    const { ceiling, policy, sampleSize } = this.options.catchAll
    if (!block || block.length <= ceiling) {
      return null
    }

    let comparedRecords: number
    switch (policy) {
      case 'proceed':
        comparedRecords = block.length
        break

      case 'sample': {
        const sample = seededShuffle(block, seededRandom(this.options.seed))
          .slice(0, sampleSize)
          .sort((a, b) => compareRecordIds(a.id, b.id))
        blocks.set(CATCH_ALL_BLOCK_KEY, sample)
        comparedRecords = sample.length
        break
      }

      case 'skip':
        blocks.delete(CATCH_ALL_BLOCK_KEY)
        comparedRecords = 0
        break

      default: {
        const _exhaustive: never = policy
        throw new Error(`Unknown catch-all policy: ${String(_exhaustive)}`)
      }
    }

    return {
      code: 'BLOCKING_EXHAUSTION',
      blockKey: CATCH_ALL_BLOCK_KEY,
      blockSize: block.length,
      ceiling,
      policy,
      comparedRecords,
    }
  }

  /**
   * Calculates statistics about the blocking operation.
   *
   * @param blocks - Blocks after the catch-all policy
   * @param recordCount - Number of records that were blocked
   * @param catchAllRecords - Size of the catch-all block before the policy
   */
  calculateStats(
    blocks: BlockSet,
    recordCount: number,
    catchAllRecords: number
  ): BlockingStats {
    let maxBlockSize = 0
    for (const block of blocks.values()) {
      if (block.length > maxBlockSize) maxBlockSize = block.length
    }

    const candidatePairs = this.generatePairs(blocks).length
    const comparisonsWithoutBlocking =
      recordCount > 1 ? (recordCount * (recordCount - 1)) / 2 : 0
    const reductionPercentage =
      comparisonsWithoutBlocking > 0
        ? ((comparisonsWithoutBlocking - candidatePairs) / comparisonsWithoutBlocking) * 100
        : 0

    return {
      totalBlocks: blocks.size,
      maxBlockSize,
      catchAllRecords,
      candidatePairs,
      comparisonsWithoutBlocking,
      reductionPercentage,
    }
  }

  /**
   * Generates all distinct pairs from a block set.
   * A pair found in several blocks appears once with all of its block keys.
   */
  generatePairs(blocks: BlockSet): CandidatePair[] {
    const pairs = new Map<string, CandidatePair>()

    for (const [blockKey, block] of blocks) {
      for (let i = 0; i < block.length; i++) {
        for (let j = i + 1; j < block.length; j++) {
          // Blocks are sorted by id, so block[i] is always the lower id
          const pairKey = `${block[i].id}\u0000${block[j].id}`
          const existing = pairs.get(pairKey)
          if (existing) {
            existing.blockKeys.push(blockKey)
          } else {
            pairs.set(pairKey, { left: block[i], right: block[j], blockKeys: [blockKey] })
          }
        }
      }
    }

    return Array.from(pairs.values())
  }
}
