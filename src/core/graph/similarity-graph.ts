import type { RecordId } from '../../types/record'
import { compareRecordIds } from '../../types/record'
import type { SimilarityEdge } from '../../types/resolution'
import { GraphMutationError } from '../../utils/errors'

/**
 * Undirected weighted graph with at most one edge per record pair.
 *
 * The graph is mutated only while edges are aggregated, then frozen before
 * cluster extraction. Any mutation after `freeze()` throws.
 *
 * @example
 * ```typescript
 * const graph = new SimilarityGraph(['a', 'b', 'c'])
 * graph.addEdge({ source: 'a', target: 'b', score: 0.9, fieldScores: {}, blockKeys: ['postal=20500'] })
 * graph.freeze()
 * [...graph.neighbors('a')] // ['b']
 * ```
 */
export class SimilarityGraph {
  private readonly nodeIds = new Set<RecordId>()
  private readonly adjacency = new Map<RecordId, Map<RecordId, SimilarityEdge>>()
  private frozen = false
  private edgeCount = 0

  constructor(nodes: Iterable<RecordId> = []) {
    for (const id of nodes) {
      this.addNode(id)
    }
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  get nodeCount(): number {
    return this.nodeIds.size
  }

  get size(): number {
    return this.edgeCount
  }

  addNode(id: RecordId): void {
    this.assertMutable('addNode')
    if (this.nodeIds.has(id)) return
    this.nodeIds.add(id)
    this.adjacency.set(id, new Map())
  }

  /**
   * Upserts an edge, keeping the higher aggregate score.
   *
   * On equal scores the existing edge stays and the block keys are unioned.
   * Endpoints are added as nodes when missing and stored in ordinal order.
   *
   * @returns The edge now stored for the pair
   * @throws {GraphMutationError} On a self-loop or a frozen graph
   */
  addEdge(edge: SimilarityEdge): SimilarityEdge {
    this.assertMutable('addEdge')
    if (edge.source === edge.target) {
      throw new GraphMutationError(`Self-loop on '${edge.source}' is not allowed`, {
        recordId: edge.source,
      })
    }

    const [source, target] =
      compareRecordIds(edge.source, edge.target) < 0
        ? [edge.source, edge.target]
        : [edge.target, edge.source]

    this.addNode(source)
    this.addNode(target)

    const existing = this.getEdge(source, target)
    let stored: SimilarityEdge

    if (!existing) {
      stored = { ...edge, source, target, blockKeys: uniqueSorted(edge.blockKeys) }
      this.edgeCount++
    } else if (edge.score > existing.score) {
      stored = {
        ...edge,
        source,
        target,
        blockKeys: uniqueSorted([...existing.blockKeys, ...edge.blockKeys]),
      }
    } else {
      stored = {
        ...existing,
        blockKeys: uniqueSorted([...existing.blockKeys, ...edge.blockKeys]),
      }
    }

    this.adjacency.get(source)?.set(target, stored)
    this.adjacency.get(target)?.set(source, stored)
    return stored
  }

  /**
   * Makes the graph read-only. Idempotent.
   */
  freeze(): this {
    this.frozen = true
    return this
  }

  hasNode(id: RecordId): boolean {
    return this.nodeIds.has(id)
  }

  hasEdge(a: RecordId, b: RecordId): boolean {
    return this.adjacency.get(a)?.has(b) ?? false
  }

  getEdge(a: RecordId, b: RecordId): SimilarityEdge | undefined {
    return this.adjacency.get(a)?.get(b)
  }

  degree(id: RecordId): number {
    return this.adjacency.get(id)?.size ?? 0
  }

  /**
   * Node ids in ordinal order.
   */
  nodes(): RecordId[] {
    return Array.from(this.nodeIds).sort(compareRecordIds)
  }

  /**
   * Lazily yields the ids adjacent to `id`, in ordinal order.
   */
  *neighbors(id: RecordId): Generator<RecordId> {
    const adjacent = this.adjacency.get(id)
    if (!adjacent) return
    yield* Array.from(adjacent.keys()).sort(compareRecordIds)
  }

  /**
   * Every edge, sorted by source then target.
   */
  allEdges(): SimilarityEdge[] {
    const edges: SimilarityEdge[] = []
    for (const [source, adjacent] of this.adjacency) {
      for (const [target, edge] of adjacent) {
        if (compareRecordIds(source, target) < 0) edges.push(edge)
      }
    }
    return edges.sort(
      (a, b) => compareRecordIds(a.source, b.source) || compareRecordIds(a.target, b.target)
    )
  }

  /**
   * Edges with score at or above `threshold`, in `allEdges()` order.
   */
  edgesAtOrAbove(threshold: number): SimilarityEdge[] {
    return this.allEdges().filter((edge) => edge.score >= threshold)
  }

  private assertMutable(operation: string): void {
    if (this.frozen) {
      throw new GraphMutationError(`Cannot ${operation} on a frozen similarity graph`, {
        operation,
      })
    }
  }
}

function uniqueSorted(values: readonly string[]): string[] {
  return Array.from(new Set(values)).sort(compareRecordIds)
}

/**
 * Merges per-block edge lists into a graph. The only step that mutates it.
 */
export function aggregateEdges(
  graph: SimilarityGraph,
  edgeLists: readonly SimilarityEdge[][]
): SimilarityGraph {
  for (const edges of edgeLists) {
    for (const edge of edges) {
      graph.addEdge(edge)
    }
  }
  return graph
}
