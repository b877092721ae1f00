import type { RecordId } from '../../types/record'
import type { SimilarityGraph } from '../graph/similarity-graph'
import type { CommunityDetectionAlgorithm, Partition } from './types'

/**
 * Labels every connected component of the graph as one community.
 * The seed is ignored; the result depends only on the edges.
 */
export class ConnectedComponents implements CommunityDetectionAlgorithm {
  readonly name = 'connected-components'

  partition(graph: SimilarityGraph, _seed: number): Partition {
    const nodes = graph.nodes()

    // Union-Find with path compression and rank
    const parent = new Map<RecordId, RecordId>()
    const rank = new Map<RecordId, number>()
    for (const id of nodes) {
      parent.set(id, id)
      rank.set(id, 0)
    }

    const find = (x: RecordId): RecordId => {
      let root = x
      let next = parent.get(root)
      while (next !== undefined && next !== root) {
        root = next
        next = parent.get(root)
      }
      // Path compression
      let current = x
      while (current !== root) {
        const up = parent.get(current) ?? root
        parent.set(current, root)
        current = up
      }
      return root
    }

    const union = (x: RecordId, y: RecordId): void => {
      const px = find(x)
      const py = find(y)
      if (px === py) return

      const rx = rank.get(px) ?? 0
      const ry = rank.get(py) ?? 0
      if (rx < ry) {
        parent.set(px, py)
      } else if (rx > ry) {
        parent.set(py, px)
      } else {
        parent.set(py, px)
        rank.set(px, rx + 1)
      }
    }

    for (const edge of graph.allEdges()) {
      union(edge.source, edge.target)
    }

    // Label components in order of their smallest member
    const labels = new Map<RecordId, number>()
    const partition: Partition = new Map()
    for (const id of nodes) {
      const root = find(id)
      let label = labels.get(root)
      if (label === undefined) {
        label = labels.size
        labels.set(root, label)
      }
      partition.set(id, label)
    }
    return partition
  }
}
