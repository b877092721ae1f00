import type { RecordId } from '../../types/record'
import { compareRecordIds } from '../../types/record'
import type { AlgorithmFallbackWarning, Cluster, ClusterId } from '../../types/resolution'
import { ClusteringNondeterminismError, GraphMutationError } from '../../utils/errors'
import type { Logger } from '../../utils/logger'
import { createSilentLogger } from '../../utils/logger'
import { SimilarityGraph } from '../graph/similarity-graph'
import { ConnectedComponents } from './connected-components'
import { Louvain } from './louvain'
import { CommunityAlgorithmRegistry } from './registry'
import type { CommunityDetectionAlgorithm, Partition } from './types'

export interface ClusterExtractorOptions {
  /** Registered algorithm name; unknown names fall back to connected components */
  algorithm: string
  seed: number
  /** Edges scoring below this are dropped before partitioning */
  clusterThreshold: number
  /** Resolution of the built-in Louvain, also when a registry is given */
  resolution?: number
  /**
   * Extra algorithms. Copied on construction; a built-in `Louvain` in it is
   * replaced by one with `resolution`.
   */
  registry?: CommunityAlgorithmRegistry
  logger?: Logger
}

export interface ClusterExtraction {
  clusters: Cluster[]
  assignments: Map<RecordId, ClusterId>
  /** Nodes without an edge at or above the cluster threshold, sorted */
  singletons: RecordId[]
  /** Name of the algorithm that actually ran */
  algorithm: string
  warnings: AlgorithmFallbackWarning[]
}

/**
 * Partitions a frozen similarity graph into clusters of likely duplicates.
 *
 * Cluster ids are `cluster-1`, `cluster-2`, ... in order of each cluster's
 * smallest member id, so they are stable for a given partition.
 */
export class ClusterExtractor {
  private readonly registry: CommunityAlgorithmRegistry
  private readonly logger: Logger

  constructor(private readonly options: ClusterExtractorOptions) {
    this.registry = new CommunityAlgorithmRegistry({ resolution: options.resolution })
    for (const algorithm of options.registry?.all() ?? []) {
      if (!(algorithm instanceof Louvain)) {
        this.registry.register(algorithm)
      }
    }
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Extracts clusters and singletons from the graph.
   *
   * @throws {GraphMutationError} If the graph has not been frozen
   */
  extract(graph: SimilarityGraph): ClusterExtraction {
    const { algorithm, warnings } = this.resolveAlgorithm()
    const surviving = this.thresholdGraph(graph)
    const partition = algorithm.partition(surviving, this.options.seed)
    const clusters = toClusters(partition)

    const assignments = new Map<RecordId, ClusterId>()
    for (const cluster of clusters) {
      for (const member of cluster.members) {
        assignments.set(member, cluster.id)
      }
    }

    const singletons = graph.nodes().filter((id) => !surviving.hasNode(id))

    this.logger.debug('Cluster extraction complete', {
      algorithm: algorithm.name,
      clusters: clusters.length,
      singletons: singletons.length,
    })

    return { clusters, assignments, singletons, algorithm: algorithm.name, warnings }
  }

  /**
   * Partitions the thresholded graph `runs` times with the configured seed.
   *
   * @throws {ClusteringNondeterminismError} If any run differs from the first
   */
  verifyDeterminism(graph: SimilarityGraph, runs = 3): void {
    const { algorithm } = this.resolveAlgorithm()
    const surviving = this.thresholdGraph(graph)
    const fingerprint = (partition: Partition): string =>
      JSON.stringify(toClusters(partition).map((cluster) => cluster.members))

    const first = fingerprint(algorithm.partition(surviving, this.options.seed))
    for (let run = 2; run <= runs; run++) {
      if (fingerprint(algorithm.partition(surviving, this.options.seed)) !== first) {
        throw new ClusteringNondeterminismError(algorithm.name, this.options.seed, runs, run)
      }
    }
  }

  /**
   * Builds a frozen copy holding only edges at or above the cluster
   * threshold and the nodes they touch.
   */
  thresholdGraph(graph: SimilarityGraph): SimilarityGraph {
    if (!graph.isFrozen) {
      throw new GraphMutationError('Cluster extraction requires a frozen similarity graph')
    }

    const surviving = new SimilarityGraph()
    for (const edge of graph.edgesAtOrAbove(this.options.clusterThreshold)) {
      surviving.addEdge(edge)
    }
    return surviving.freeze()
  }

  private resolveAlgorithm(): {
    algorithm: CommunityDetectionAlgorithm
    warnings: AlgorithmFallbackWarning[]
  } {
    const requested = this.options.algorithm
    const algorithm = this.registry.get(requested)
    if (algorithm) {
      return { algorithm, warnings: [] }
    }

    const fallback = this.registry.get('connected-components') ?? new ConnectedComponents()
    this.logger.warn(
      `Community detection algorithm '${requested}' is not available; using '${fallback.name}'`,
      { available: this.registry.list() }
    )
    return {
      algorithm: fallback,
      warnings: [{ code: 'ALGORITHM_FALLBACK', requested, used: fallback.name }],
    }
  }
}

/**
 * Groups a partition into clusters with sorted members and deterministic ids.
 */
export function toClusters(partition: Partition): Cluster[] {
  const groups = new Map<number, RecordId[]>()
  for (const [id, label] of partition) {
    const group = groups.get(label)
    if (group) {
      group.push(id)
    } else {
      groups.set(label, [id])
    }
  }

  return Array.from(groups.values())
    .map((members) => members.sort(compareRecordIds))
    .sort((a, b) => compareRecordIds(a[0], b[0]))
    .map((members, i) => ({ id: `cluster-${i + 1}`, members }))
}
