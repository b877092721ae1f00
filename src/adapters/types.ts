import type { FieldName, RecordId } from '../types/record'
import type { ClusterId, MasterEntity, SameAsLink, SimilarityEdge } from '../types/resolution'

/**
 * Supplies the raw records of one batch. Records are validated by the
 * resolver, so a source may return anything it read.
 */
export interface RecordSource {
  loadRecords(): Promise<unknown[]> | unknown[]
}

/**
 * Receives the output of a run. Every method may be synchronous or async.
 */
export interface ResolutionSink {
  /** Write-back of one normalized value; skipped when not implemented */
  writeNormalized?(recordId: RecordId, field: FieldName, value: string): Promise<void> | void
  writeEdges(edges: readonly SimilarityEdge[]): Promise<void> | void
  /** record id → cluster id */
  writeClusters(clusters: ReadonlyMap<RecordId, ClusterId>): Promise<void> | void
  writeMasterEntities(masters: readonly MasterEntity[]): Promise<void> | void
  /** record id → master entity id */
  writeAssignments(assignments: ReadonlyMap<RecordId, string>): Promise<void> | void
  /** Link mode only; skipped when not implemented */
  writeSameAsLinks?(links: readonly SameAsLink[]): Promise<void> | void
  /**
   * Runs every write of one result atomically. When absent, writes are
   * issued directly.
   */
  transaction?<R>(callback: (sink: ResolutionSink) => Promise<R>): Promise<R>
}
