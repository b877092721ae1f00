import type { FieldName, RecordId } from '../../types/record'
import type { ClusterId, MasterEntity, SameAsLink, SimilarityEdge } from '../../types/resolution'
import { PersistenceError } from '../../utils/errors'
import type { ResolutionSink } from '../types'

/**
 * The part of a Drizzle database (or transaction) the sink uses.
 */
export type DrizzleDatabase = {
  insert: (table: unknown) => {
    values: (rows: unknown) => PromiseLike<unknown>
  }
  transaction: <R>(callback: (tx: DrizzleDatabase) => Promise<R>) => Promise<R>
}

/**
 * Drizzle table objects to write into. Collections without a table are not
 * written.
 */
export interface DrizzleSinkTables {
  /** Columns: recordId, field, value */
  normalizedValues?: unknown
  /** Columns: source, target, score, fieldScores (json), blockKeys (json) */
  edges: unknown
  /** Columns: recordId, clusterId */
  clusterAssignments: unknown
  /** Columns: id, clusterId, attributes (json), memberIds (json) */
  masterEntities: unknown
  /** Columns: recordId, masterId */
  assignments: unknown
  /** Columns: source, target, clusterId */
  sameAsLinks?: unknown
}

/**
 * Writes a resolution result into SQL tables through Drizzle.
 *
 * Each collection is written with one `insert(table).values(rows)`. Use
 * `transaction()` (as `persistResult` does) to make all writes atomic.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres'
 * const sink = new DrizzleSink(drizzle(pool), {
 *   edges: similarityEdges,
 *   clusterAssignments,
 *   masterEntities,
 *   assignments: masterAssignments,
 * })
 * await resolver.persist(result, sink)
 * ```
 */
export class DrizzleSink implements ResolutionSink {
  constructor(
    private readonly db: DrizzleDatabase,
    private readonly tables: DrizzleSinkTables
  ) {}

  async writeNormalized(recordId: RecordId, field: FieldName, value: string): Promise<void> {
    if (this.tables.normalizedValues === undefined) return
    await this.insert('writeNormalized', this.tables.normalizedValues, [{ recordId, field, value }])
  }

  async writeEdges(edges: readonly SimilarityEdge[]): Promise<void> {
    await this.insert(
      'writeEdges',
      this.tables.edges,
      edges.map((edge) => ({
        source: edge.source,
        target: edge.target,
        score: edge.score,
        fieldScores: edge.fieldScores,
        blockKeys: edge.blockKeys,
      }))
    )
  }

  async writeClusters(clusters: ReadonlyMap<RecordId, ClusterId>): Promise<void> {
    await this.insert(
      'writeClusters',
      this.tables.clusterAssignments,
      Array.from(clusters, ([recordId, clusterId]) => ({ recordId, clusterId }))
    )
  }

  async writeMasterEntities(masters: readonly MasterEntity[]): Promise<void> {
    await this.insert(
      'writeMasterEntities',
      this.tables.masterEntities,
      masters.map((master) => ({
        id: master.id,
        clusterId: master.clusterId,
        attributes: master.attributes,
        memberIds: master.memberIds,
      }))
    )
  }

  async writeAssignments(assignments: ReadonlyMap<RecordId, string>): Promise<void> {
    await this.insert(
      'writeAssignments',
      this.tables.assignments,
      Array.from(assignments, ([recordId, masterId]) => ({ recordId, masterId }))
    )
  }

  async writeSameAsLinks(links: readonly SameAsLink[]): Promise<void> {
    if (this.tables.sameAsLinks === undefined) return
    await this.insert(
      'writeSameAsLinks',
      this.tables.sameAsLinks,
      links.map((link) => ({ ...link }))
    )
  }

  async transaction<R>(callback: (sink: ResolutionSink) => Promise<R>): Promise<R> {
    try {
      return await this.db.transaction(async (tx: DrizzleDatabase) =>
        callback(new DrizzleSink(tx, this.tables))
      )
    } catch (error) {
      if (error instanceof PersistenceError) throw error
      throw new PersistenceError('transaction', errorMessage(error))
    }
  }

  private async insert(operation: string, table: unknown, rows: unknown[]): Promise<void> {
    // Drizzle rejects an empty values() call
    if (rows.length === 0) return
    try {
      await this.db.insert(table).values(rows)
    } catch (error) {
      throw new PersistenceError(operation, errorMessage(error), { rows: rows.length })
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
