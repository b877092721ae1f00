import { createHash } from 'node:crypto'
import type { CanonicalPolicy } from '../../types/config'
import type { FieldName, NormalizedFields, NormalizedRecord, RecordId } from '../../types/record'
import { CORE_FIELDS, compareRecordIds, isAttributeField } from '../../types/record'
import type { Cluster, ClusterId, MasterEntity } from '../../types/resolution'
import { MissingParameterError } from '../../utils/errors'
import type { CandidateValue } from './canonical-policies'
import { CANONICAL_POLICIES, defaultPolicyFor } from './canonical-policies'

/**
 * Produces a master entity id from its sorted member ids.
 */
export type MasterIdGenerator = (memberIds: readonly RecordId[], clusterId: ClusterId | null) => string

export interface MasterEntityBuilderOptions {
  /** Per-field overrides of the default canonical policy */
  canonicalPolicies?: Partial<Record<FieldName, CanonicalPolicy>>
  /** Replaces the content-derived default ids */
  idGenerator?: MasterIdGenerator
}

export interface MasterEntityBuild {
  masterEntities: MasterEntity[]
  /** record id → master entity id */
  assignments: Map<RecordId, string>
}

/**
 * `master-` followed by the first 16 hex digits of the SHA-256 of the sorted
 * member ids.
 */
export const contentMasterId: MasterIdGenerator = (memberIds) => {
  const digest = createHash('sha256').update(memberIds.join('\n')).digest('hex')
  return `master-${digest.slice(0, 16)}`
}

/**
 * Builds one master entity per cluster with canonical attribute values.
 *
 * @example
 * ```typescript
 * const builder = new MasterEntityBuilder({ canonicalPolicies: { address: 'plurality-or-most-complete' } })
 * const { masterEntities, assignments } = builder.build(clusters, singletons, recordsById, false)
 * ```
 */
export class MasterEntityBuilder {
  private readonly idGenerator: MasterIdGenerator

  constructor(private readonly options: MasterEntityBuilderOptions = {}) {
    this.idGenerator = options.idGenerator ?? contentMasterId
  }

  /**
   * Builds masters for every cluster, plus every singleton when
   * `promoteSingletons` is set, and assigns each member to its master.
   */
  build(
    clusters: readonly Cluster[],
    singletons: readonly RecordId[],
    records: ReadonlyMap<RecordId, NormalizedRecord>,
    promoteSingletons: boolean
  ): MasterEntityBuild {
    const masterEntities: MasterEntity[] = []
    const assignments = new Map<RecordId, string>()

    const add = (master: MasterEntity): void => {
      masterEntities.push(master)
      for (const memberId of master.memberIds) {
        assignments.set(memberId, master.id)
      }
    }

    for (const cluster of clusters) {
      add(this.buildMaster(cluster.members.map((id) => lookup(records, id)), cluster.id))
    }

    if (promoteSingletons) {
      for (const id of singletons) {
        add(this.buildMaster([lookup(records, id)], null))
      }
    }

    return { masterEntities, assignments }
  }

  buildMaster(members: readonly NormalizedRecord[], clusterId: ClusterId | null): MasterEntity {
    const memberIds = members.map((member) => member.id).sort(compareRecordIds)
    return {
      id: this.idGenerator(memberIds, clusterId),
      clusterId,
      attributes: this.canonicalAttributes(members),
      memberIds,
    }
  }

  /**
   * Canonical value for every field present on any member.
   * A single member yields exactly its own normalized fields.
   */
  canonicalAttributes(members: readonly NormalizedRecord[]): NormalizedFields {
    const sorted = members.slice().sort((a, b) => compareRecordIds(a.id, b.id))
    const attributes: NormalizedFields = {}

    for (const field of fieldsOf(sorted)) {
      const candidates: CandidateValue[] = []
      for (const member of sorted) {
        const value = member.fields[field]
        if (value !== undefined && value !== '') {
          candidates.push({ recordId: member.id, value })
        }
      }

      const value = CANONICAL_POLICIES[this.policyFor(field)](candidates)
      if (value !== undefined) {
        attributes[field] = value
      }
    }

    return attributes
  }

  policyFor(field: FieldName): CanonicalPolicy {
    return this.options.canonicalPolicies?.[field] ?? defaultPolicyFor(field)
  }
}

function lookup(records: ReadonlyMap<RecordId, NormalizedRecord>, id: RecordId): NormalizedRecord {
  const record = records.get(id)
  if (!record) {
    throw new MissingParameterError(`records['${id}']`)
  }
  return record
}

/**
 * Core fields in fixed order, then attribute fields sorted.
 */
function fieldsOf(members: readonly NormalizedRecord[]): FieldName[] {
  const present = new Set<FieldName>()
  for (const member of members) {
    for (const field of Object.keys(member.fields)) {
      if (isAttributeField(field)) present.add(field)
    }
  }

  const core = CORE_FIELDS.filter((field) =>
    members.some((member) => member.fields[field] !== undefined)
  )
  return [...core, ...Array.from(present).sort(compareRecordIds)]
}
