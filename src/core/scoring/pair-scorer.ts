import type { FieldScoringConfig, ScoringConfig, SimilarityMetric } from '../../types/config'
import type { NormalizedRecord } from '../../types/record'
import { compareRecordIds } from '../../types/record'
import type { BlockKey, FieldScores, PairScore, SimilarityEdge } from '../../types/resolution'
import { exactMatch, jaroWinkler, levenshtein, tokenOverlap } from '../comparators'

const METRICS: Record<SimilarityMetric, (a: string, b: string) => number> = {
  'jaro-winkler': (a, b) => jaroWinkler(a, b),
  levenshtein,
  exact: exactMatch,
  'token-overlap': tokenOverlap,
}

/**
 * Compares two normalized values with a metric.
 * Arguments are put in ordinal order first, so the result never depends on
 * which record came first.
 */
export function compareWith(metric: SimilarityMetric, a: string, b: string): number {
  return a <= b ? METRICS[metric](a, b) : METRICS[metric](b, a)
}

/**
 * Computes per-field and aggregated similarity for record pairs.
 *
 * The aggregate is the weighted average of the configured fields. Under the
 * `renormalize` policy a field missing on either side is left out and the
 * remaining weights are rescaled; under `zero` it contributes 0.
 *
 * @example
 * ```typescript
 * const scorer = new PairScorer({
 *   fields: [
 *     { field: 'name', metric: 'jaro-winkler', weight: 0.6 },
 *     { field: 'phone', metric: 'exact', weight: 0.4 },
 *   ],
 *   missingFields: 'renormalize',
 * })
 * scorer.score(a, b).score
 * ```
 */
export class PairScorer {
  constructor(private readonly config: ScoringConfig) {}

  /**
   * Scores a pair of records.
   */
  score(a: NormalizedRecord, b: NormalizedRecord): PairScore {
    const fieldScores: FieldScores = {}
    let weighted = 0
    let totalWeight = 0

    for (const comparison of this.config.fields) {
      const similarity = this.compareField(a, b, comparison)

      if (similarity === null) {
        if (this.config.missingFields === 'zero') {
          totalWeight += comparison.weight
        }
        continue
      }

      fieldScores[comparison.field] = similarity
      weighted += similarity * comparison.weight
      totalWeight += comparison.weight
    }

    const score = totalWeight > 0 ? weighted / totalWeight : 0
    return { fieldScores, score: clamp(score) }
  }

  /**
   * Scores every pair in one block and returns the pairs at or above
   * `lowThreshold` as edges. Pure: reads the records, mutates nothing.
   */
  scoreBlock(
    blockKey: BlockKey,
    records: readonly NormalizedRecord[],
    lowThreshold: number
  ): SimilarityEdge[] {
    const edges: SimilarityEdge[] = []

    for (let i = 0; i < records.length; i++) {
      for (let j = i + 1; j < records.length; j++) {
        const [left, right] =
          compareRecordIds(records[i].id, records[j].id) <= 0
            ? [records[i], records[j]]
            : [records[j], records[i]]

        const { fieldScores, score } = this.score(left, right)
        if (score >= lowThreshold) {
          edges.push({
            source: left.id,
            target: right.id,
            fieldScores,
            score,
            blockKeys: [blockKey],
          })
        }
      }
    }

    return edges
  }

  /**
   * @returns The field similarity, or null when the field is missing on either side
   */
  private compareField(
    a: NormalizedRecord,
    b: NormalizedRecord,
    comparison: FieldScoringConfig
  ): number | null {
    const left = a.fields[comparison.field]
    const right = b.fields[comparison.field]
    if (left === undefined || right === undefined) {
      return null
    }
    return compareWith(comparison.metric, left, right)
  }
}

// Floating point sums can land a hair outside [0, 1]
function clamp(value: number): number {
  return Math.min(1, Math.max(0, value))
}
