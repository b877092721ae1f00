import type { FieldName, RecordId } from '../types/record'
import type { ClusterId, MasterEntity, SameAsLink, SimilarityEdge } from '../types/resolution'
import type { RecordSource, ResolutionSink } from './types'

export interface NormalizedValueRow {
  recordId: RecordId
  field: FieldName
  value: string
}

/**
 * Serves a fixed array of records.
 */
export class InMemorySource implements RecordSource {
  constructor(private readonly records: readonly unknown[]) {}

  loadRecords(): unknown[] {
    return this.records.slice()
  }
}

/**
 * Keeps everything written to it. Each write replaces the previous content
 * of its collection, except normalized values, which accumulate.
 *
 * @example
 * ```typescript
 * const sink = new InMemorySink()
 * await resolver.persist(result, sink)
 * sink.masterEntities.length
 * ```
 */
export class InMemorySink implements ResolutionSink {
  normalizedValues: NormalizedValueRow[] = []
  edges: SimilarityEdge[] = []
  clusters = new Map<RecordId, ClusterId>()
  masterEntities: MasterEntity[] = []
  assignments = new Map<RecordId, string>()
  sameAsLinks: SameAsLink[] = []

  writeNormalized(recordId: RecordId, field: FieldName, value: string): void {
    this.normalizedValues.push({ recordId, field, value })
  }

  writeEdges(edges: readonly SimilarityEdge[]): void {
    this.edges = edges.slice()
  }

  writeClusters(clusters: ReadonlyMap<RecordId, ClusterId>): void {
    this.clusters = new Map(clusters)
  }

  writeMasterEntities(masters: readonly MasterEntity[]): void {
    this.masterEntities = masters.slice()
  }

  writeAssignments(assignments: ReadonlyMap<RecordId, string>): void {
    this.assignments = new Map(assignments)
  }

  writeSameAsLinks(links: readonly SameAsLink[]): void {
    this.sameAsLinks = links.slice()
  }

  clear(): void {
    this.normalizedValues = []
    this.edges = []
    this.clusters = new Map()
    this.masterEntities = []
    this.assignments = new Map()
    this.sameAsLinks = []
  }
}
