import type { SimilarityGraph } from '../graph/similarity-graph'
import { seededRandom, seededShuffle } from '../../utils/random'
import type { CommunityDetectionAlgorithm, Partition } from './types'

export interface LouvainOptions {
  /** Resolution (gamma). Values below 1 favour larger communities. Default 1 */
  resolution?: number
  /** Cap on local-move sweeps per level. Default 100 */
  maxSweeps?: number
}

/**
 * Weighted graph over dense node indices, as used inside one Louvain level.
 */
interface LevelGraph {
  adjacency: Array<Map<number, number>>
  /** Weight of edges folded into each node by aggregation */
  selfLoops: number[]
  /** Weighted degree, self-loops counted twice */
  degrees: number[]
  /** Sum of all degrees (2m) */
  totalDegree: number
}

// Gains this close to zero are treated as no gain
const EPSILON = 1e-12

/**
 * Louvain modularity optimisation.
 *
 * Each level moves nodes between neighbouring communities while modularity
 * improves, then collapses every community into a single node and repeats.
 * Nodes are visited in a seeded shuffled order and candidate communities are
 * tried in ascending label order, so a fixed seed always yields the same
 * partition.
 *
 * Edge scores are used as weights.
 *
 * @example
 * ```typescript
 * const louvain = new Louvain({ resolution: 1 })
 * const labels = louvain.partition(frozenGraph, 42)
 * ```
 */
export class Louvain implements CommunityDetectionAlgorithm {
  readonly name = 'louvain'
  private readonly resolution: number
  private readonly maxSweeps: number

  constructor(options: LouvainOptions = {}) {
    this.resolution = options.resolution ?? 1
    this.maxSweeps = options.maxSweeps ?? 100
  }

  partition(graph: SimilarityGraph, seed: number): Partition {
    const ids = graph.nodes()
    const index = new Map(ids.map((id, i): [string, number] => [id, i]))

    let level = buildLevelGraph(ids.length)
    for (const edge of graph.allEdges()) {
      const a = index.get(edge.source)
      const b = index.get(edge.target)
      if (a === undefined || b === undefined) continue
      addWeight(level, a, b, edge.score)
    }
    finishDegrees(level)

    // membership[original node] = node index at the current level
    let membership = ids.map((_, i) => i)
    const rng = seededRandom(seed)

    while (level.totalDegree > 0) {
      const communities = this.moveNodes(level, rng)
      const { relabelled, count } = relabel(communities)
      if (count === level.adjacency.length) break

      membership = membership.map((node) => relabelled[node])
      level = aggregate(level, relabelled, count)
    }

    const partition: Partition = new Map()
    ids.forEach((id, i) => partition.set(id, membership[i]))
    return partition
  }

  /**
   * Local-move phase for one level.
   *
   * @returns Community index per node
   */
  private moveNodes(level: LevelGraph, rng: () => number): number[] {
    const n = level.adjacency.length
    const community = Array.from({ length: n }, (_, i) => i)
    const totals = level.degrees.slice()
    const order = seededShuffle(community, rng)
    const m2 = level.totalDegree

    for (let sweep = 0; sweep < this.maxSweeps; sweep++) {
      let moved = false

      for (const node of order) {
        const current = community[node]
        const degree = level.degrees[node]

        const linkWeights = new Map<number, number>()
        for (const [neighbor, weight] of level.adjacency[node]) {
          const c = community[neighbor]
          linkWeights.set(c, (linkWeights.get(c) ?? 0) + weight)
        }

        totals[current] -= degree

        let best = current
        let bestGain =
          (linkWeights.get(current) ?? 0) - (this.resolution * totals[current] * degree) / m2

        const candidates = Array.from(linkWeights.keys()).sort((a, b) => a - b)
        for (const c of candidates) {
          if (c === current) continue
          const gain = (linkWeights.get(c) ?? 0) - (this.resolution * totals[c] * degree) / m2
          if (gain > bestGain + EPSILON) {
            best = c
            bestGain = gain
          }
        }

        totals[best] += degree
        if (best !== current) {
          community[node] = best
          moved = true
        }
      }

      if (!moved) break
    }

    return community
  }
}

function buildLevelGraph(n: number): LevelGraph {
  return {
    adjacency: Array.from({ length: n }, () => new Map<number, number>()),
    selfLoops: new Array<number>(n).fill(0),
    degrees: new Array<number>(n).fill(0),
    totalDegree: 0,
  }
}

function addWeight(level: LevelGraph, a: number, b: number, weight: number): void {
  if (a === b) {
    level.selfLoops[a] += weight
    return
  }
  level.adjacency[a].set(b, (level.adjacency[a].get(b) ?? 0) + weight)
  level.adjacency[b].set(a, (level.adjacency[b].get(a) ?? 0) + weight)
}

function finishDegrees(level: LevelGraph): void {
  let total = 0
  for (let i = 0; i < level.adjacency.length; i++) {
    let degree = 2 * level.selfLoops[i]
    for (const weight of level.adjacency[i].values()) degree += weight
    level.degrees[i] = degree
    total += degree
  }
  level.totalDegree = total
}

/**
 * Renumbers communities densely in order of first appearance.
 */
function relabel(communities: number[]): { relabelled: number[]; count: number } {
  const mapping = new Map<number, number>()
  const relabelled = communities.map((c) => {
    let label = mapping.get(c)
    if (label === undefined) {
      label = mapping.size
      mapping.set(c, label)
    }
    return label
  })
  return { relabelled, count: mapping.size }
}

/**
 * Collapses each community into one node of the next level.
 */
function aggregate(level: LevelGraph, communities: number[], count: number): LevelGraph {
  const next = buildLevelGraph(count)

  for (let node = 0; node < level.adjacency.length; node++) {
    const c = communities[node]
    next.selfLoops[c] += level.selfLoops[node]
    for (const [neighbor, weight] of level.adjacency[node]) {
      // Each undirected edge is visited from both ends
      if (neighbor < node) continue
      addWeight(next, c, communities[neighbor], weight)
    }
  }

  finishDegrees(next)
  return next
}
