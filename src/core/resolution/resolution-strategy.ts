import type { ResolutionMode } from '../../types/config'
import type { NormalizedRecord, RecordId } from '../../types/record'
import { compareRecordIds } from '../../types/record'
import type {
  Cluster,
  ClusterId,
  MasterEntity,
  ResolvedRecord,
  SameAsLink,
} from '../../types/resolution'

/**
 * Everything a strategy needs from the earlier stages.
 */
export interface ResolutionInput {
  records: readonly NormalizedRecord[]
  clusters: readonly Cluster[]
  clusterAssignments: ReadonlyMap<RecordId, ClusterId>
  masterEntities: readonly MasterEntity[]
}

export interface ResolutionOutcome {
  resolvedRecords: ResolvedRecord[]
  sameAsLinks: SameAsLink[]
}

/**
 * Turns clusters into the post-resolution record model.
 */
export interface ResolutionStrategy {
  readonly mode: ResolutionMode
  resolve(input: ResolutionInput): ResolutionOutcome
}

function original(record: NormalizedRecord): ResolvedRecord {
  return { id: record.id, kind: 'original', fields: record.fields, sourceRecordIds: [record.id] }
}

/**
 * Replaces each cluster with one merged record built from its master entity.
 * Records outside every cluster are kept as they are.
 *
 * Output is ordered by the smallest id each output record stands for.
 */
export class MergeStrategy implements ResolutionStrategy {
  readonly mode = 'merge'

  resolve(input: ResolutionInput): ResolutionOutcome {
    const masterByCluster = new Map<ClusterId, MasterEntity>()
    for (const master of input.masterEntities) {
      if (master.clusterId !== null) masterByCluster.set(master.clusterId, master)
    }

    const resolvedRecords: ResolvedRecord[] = []
    const emitted = new Set<ClusterId>()
    const sorted = input.records.slice().sort((a, b) => compareRecordIds(a.id, b.id))

    for (const record of sorted) {
      const clusterId = input.clusterAssignments.get(record.id)
      if (clusterId === undefined) {
        resolvedRecords.push(original(record))
        continue
      }
      if (emitted.has(clusterId)) continue
      emitted.add(clusterId)

      const master = masterByCluster.get(clusterId)
      if (master) {
        resolvedRecords.push({
          id: master.id,
          kind: 'merged',
          fields: master.attributes,
          sourceRecordIds: master.memberIds,
        })
      }
    }

    return { resolvedRecords, sameAsLinks: [] }
  }
}

/**
 * Keeps every record and links each pair inside a cluster.
 */
export class LinkStrategy implements ResolutionStrategy {
  readonly mode = 'link'

  resolve(input: ResolutionInput): ResolutionOutcome {
    const resolvedRecords = input.records
      .slice()
      .sort((a, b) => compareRecordIds(a.id, b.id))
      .map(original)

    const sameAsLinks: SameAsLink[] = []
    for (const cluster of input.clusters) {
      const { members } = cluster
      for (let i = 0; i < members.length; i++) {
        for (let j = i + 1; j < members.length; j++) {
          sameAsLinks.push({ source: members[i], target: members[j], clusterId: cluster.id })
        }
      }
    }

    return { resolvedRecords, sameAsLinks }
  }
}

export function createResolutionStrategy(mode: ResolutionMode): ResolutionStrategy {
  switch (mode) {
    case 'merge':
      return new MergeStrategy()
    case 'link':
      return new LinkStrategy()
    default: {
      const _exhaustive: never = mode
      throw new Error(`Unknown resolution mode: ${String(_exhaustive)}`)
    }
  }
}
