import { persistResult } from '../adapters/persist'
import type { RecordSource, ResolutionSink } from '../adapters/types'
import { validateConfig } from '../builder/config-validator'
import type { ResolutionConfig } from '../types/config'
import type { NormalizedRecord, RecordId } from '../types/record'
import type { ResolutionResult, ResolutionStats, ResolutionWarning } from '../types/resolution'
import type { Logger } from '../utils/logger'
import { createPrefixedLogger, createSilentLogger } from '../utils/logger'
import { BlockGenerator } from './blocking/block-generator'
import { Blocker } from './blocking/blocker'
import { ClusterExtractor } from './clustering/cluster-extractor'
import type { CommunityAlgorithmRegistry } from './clustering/registry'
import { SimilarityGraph, aggregateEdges } from './graph/similarity-graph'
import { normalizeRecord } from './normalizers/record-normalizer'
import { NormalizerRegistry } from './normalizers/registry'
import { validateRecords } from './record-validation'
import type { MasterIdGenerator } from './resolution/master-entity-builder'
import { MasterEntityBuilder } from './resolution/master-entity-builder'
import { createResolutionStrategy } from './resolution/resolution-strategy'
import type { BlockScoringExecutor } from './scoring/executor'
import { InProcessExecutor } from './scoring/executor'
import { PairScorer } from './scoring/pair-scorer'

export interface ResolverOptions {
  /** Defaults to a silent logger */
  logger?: Logger
  /** Custom normalizers; defaults to the built-ins */
  normalizers?: NormalizerRegistry
  /** Defaults to in-process, block by block */
  executor?: BlockScoringExecutor
  /** Extra community detection algorithms */
  algorithms?: CommunityAlgorithmRegistry
  /** Replaces content-derived master ids */
  idGenerator?: MasterIdGenerator
  /**
   * When set, every run partitions the graph this many times first and
   * throws `ClusteringNondeterminismError` if the partitions differ.
   */
  verifyDeterminismRuns?: number
}

/**
 * Runs entity resolution over a batch of records.
 *
 * `run` is synchronous and performs no I/O. `resolveFromSource` and
 * `persist` are the async wrappers around the external boundary.
 *
 * @example
 * ```typescript
 * const resolver = new Resolver(config, { logger: defaultLogger })
 * const result = resolver.run(records)
 * await resolver.persist(result, new InMemorySink())
 * ```
 */
export class Resolver {
  readonly config: ResolutionConfig
  private readonly logger: Logger
  private readonly normalizers: NormalizerRegistry
  private readonly executor: BlockScoringExecutor
  private readonly blockGenerator: BlockGenerator
  private readonly scorer: PairScorer
  private readonly extractor: ClusterExtractor
  private readonly masterBuilder: MasterEntityBuilder

  /**
   * @throws {ConfigurationError} If the configuration is invalid
   */
  constructor(config: ResolutionConfig, private readonly options: ResolverOptions = {}) {
    this.config = validateConfig(config)
    this.logger = options.logger ?? createSilentLogger()
    this.normalizers = options.normalizers ?? new NormalizerRegistry(this.logger)
    this.executor = options.executor ?? new InProcessExecutor()

    this.blockGenerator = new BlockGenerator(new Blocker(this.config.blocking.keys), {
      catchAll: this.config.blocking.catchAll,
      seed: this.config.clustering.seed,
      logger: createPrefixedLogger('blocking', this.logger),
    })
    this.scorer = new PairScorer(this.config.scoring)
    this.extractor = new ClusterExtractor({
      algorithm: this.config.clustering.algorithm,
      seed: this.config.clustering.seed,
      resolution: this.config.clustering.resolution,
      clusterThreshold: this.config.thresholds.cluster,
      registry: options.algorithms,
      logger: createPrefixedLogger('clustering', this.logger),
    })
    this.masterBuilder = new MasterEntityBuilder({
      canonicalPolicies: this.config.canonicalPolicies,
      idGenerator: options.idGenerator,
    })
  }

  /**
   * Resolves one batch.
   * Malformed records are returned as rejections; the rest of the batch
   * is still resolved.
   */
  run(inputs: readonly unknown[]): ResolutionResult {
    const { accepted, rejections } = validateRecords(inputs)
    for (const rejection of rejections) {
      this.logger.warn(rejection.error.message, { index: rejection.index })
    }

    const normalizerOptions = { phoneCountry: this.config.normalization.phoneCountry }
    const records = accepted.map((record) =>
      normalizeRecord(record, this.normalizers, normalizerOptions)
    )
    const byId = new Map(records.map((r): [RecordId, NormalizedRecord] => [r.id, r]))

    const blocking = this.blockGenerator.generate(records)

    const lowThreshold = this.config.thresholds.low
    let comparisonsMade = 0
    for (const block of blocking.blocks.values()) {
      comparisonsMade += (block.length * (block.length - 1)) / 2
    }
    const edgeLists = this.executor.scoreBlocks(blocking.blocks, (blockKey, blockRecords) =>
      this.scorer.scoreBlock(blockKey, blockRecords, lowThreshold)
    )

    const graph = aggregateEdges(new SimilarityGraph(byId.keys()), edgeLists).freeze()
    this.logger.debug('Similarity graph built', {
      nodes: graph.nodeCount,
      edges: graph.size,
      comparisonsMade,
    })

    if (this.options.verifyDeterminismRuns !== undefined) {
      this.extractor.verifyDeterminism(graph, this.options.verifyDeterminismRuns)
    }
    const extraction = this.extractor.extract(graph)

    const { masterEntities, assignments } = this.masterBuilder.build(
      extraction.clusters,
      extraction.singletons,
      byId,
      this.config.promoteSingletons
    )

    const { resolvedRecords, sameAsLinks } = createResolutionStrategy(this.config.mode).resolve({
      records,
      clusters: extraction.clusters,
      clusterAssignments: extraction.assignments,
      masterEntities,
    })

    const edges = graph.allEdges()
    const warnings: ResolutionWarning[] = [...blocking.warnings, ...extraction.warnings]
    const stats: ResolutionStats = {
      inputRecords: inputs.length,
      acceptedRecords: records.length,
      rejectedRecords: rejections.length,
      blocking: blocking.stats,
      comparisonsMade,
      edges: edges.length,
      edgesAboveClusterThreshold: graph.edgesAtOrAbove(this.config.thresholds.cluster).length,
      clusters: extraction.clusters.length,
      singletons: extraction.singletons.length,
      masterEntities: masterEntities.length,
      resolvedRecords: resolvedRecords.length,
    }
    this.logger.debug('Resolution complete', {
      clusters: stats.clusters,
      singletons: stats.singletons,
      masterEntities: stats.masterEntities,
      resolvedRecords: stats.resolvedRecords,
    })

    return {
      mode: this.config.mode,
      records,
      edges,
      clusters: extraction.clusters,
      clusterAssignments: extraction.assignments,
      singletons: extraction.singletons,
      masterEntities,
      assignments,
      sameAsLinks,
      resolvedRecords,
      rejections,
      warnings,
      stats,
    }
  }

  /**
   * Loads a batch from a source, resolves it and, when a sink is given,
   * persists the result.
   */
  async resolveFromSource(source: RecordSource, sink?: ResolutionSink): Promise<ResolutionResult> {
    const inputs = await source.loadRecords()
    const result = this.run(inputs)
    if (sink) {
      await this.persist(result, sink)
    }
    return result
  }

  /**
   * @throws {PersistenceError} If the sink fails
   */
  async persist(result: ResolutionResult, sink: ResolutionSink): Promise<void> {
    await persistResult(result, sink)
    this.logger.info('Result persisted', {
      edges: result.edges.length,
      masterEntities: result.masterEntities.length,
    })
  }
}
