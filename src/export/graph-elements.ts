import type { NormalizedFields, RecordId } from '../types/record'
import type { FieldScores, ResolutionResult } from '../types/resolution'

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export const RECORD_NODE_LABEL = 'Record'
export const MASTER_NODE_LABEL = 'MasterEntity'
export const DEFAULT_NODE_LABEL = 'Node'
export const DEFAULT_EDGE_LABEL = 'RELATED'

/** Relation types emitted by `toGraphElements` */
export type RelationType = 'SIMILAR_TO' | 'SAME_AS' | 'ASSIGNED_TO'

export interface NodeData {
  id: string
  label: string
  /** Display caption */
  name: string
  [property: string]: JsonValue
}

export interface EdgeData {
  id: string
  source: string
  target: string
  label: string
  [property: string]: JsonValue
}

export interface GraphElements {
  nodes: Array<{ data: NodeData }>
  edges: Array<{ data: EdgeData }>
}

export interface NodeStyle {
  label: string
  color: string
  /** Data property shown as the caption */
  caption: string
  shape: 'circle'
}

export interface EdgeStyle {
  label: string
  directed: boolean
}

export interface GraphStyles {
  nodeStyles: NodeStyle[]
  edgeStyles: EdgeStyle[]
}

export const NODE_COLORS = ['#2A629A', '#FF7F3E', '#C0C0C0', '#008000', '#800080'] as const

function fieldProperties(fields: NormalizedFields): Record<string, JsonValue> {
  const properties: Record<string, JsonValue> = {}
  for (const [field, value] of Object.entries(fields)) {
    if (value !== undefined) properties[field] = value
  }
  return properties
}

/**
 * Converts a result into graph elements for a network view.
 *
 * Nodes are the records (`Record`) and master entities (`MasterEntity`).
 * Edges are similarity edges (`SIMILAR_TO`), same-as links (`SAME_AS`) and
 * record-to-master assignments (`ASSIGNED_TO`). Each element is a
 * `{ data }` object holding only JSON values, ready to hand to a graph
 * widget.
 *
 * @example
 * ```typescript
 * const elements = toGraphElements(result)
 * const { nodeStyles, edgeStyles } = createGraphStyles(elements)
 * ```
 */
export function toGraphElements(result: ResolutionResult): GraphElements {
  const nodes: GraphElements['nodes'] = []
  const edges: GraphElements['edges'] = []

  for (const record of result.records) {
    const clusterId = result.clusterAssignments.get(record.id)
    const masterId = result.assignments.get(record.id)
    nodes.push({
      data: {
        ...fieldProperties(record.fields),
        id: record.id,
        label: RECORD_NODE_LABEL,
        name: record.fields.name ?? record.id,
        clusterId: clusterId ?? null,
        masterId: masterId ?? null,
      },
    })
  }

  for (const master of result.masterEntities) {
    nodes.push({
      data: {
        ...fieldProperties(master.attributes),
        id: master.id,
        label: MASTER_NODE_LABEL,
        name: master.attributes.name ?? master.id,
        clusterId: master.clusterId,
        memberCount: master.memberIds.length,
      },
    })
  }

  const edge = (
    relation: RelationType,
    source: RecordId,
    target: string,
    properties: Record<string, JsonValue> = {}
  ): void => {
    edges.push({
      data: { ...properties, id: `${relation}:${source}:${target}`, source, target, label: relation },
    })
  }

  for (const similarity of result.edges) {
    edge('SIMILAR_TO', similarity.source, similarity.target, {
      score: similarity.score,
      blockKeys: similarity.blockKeys,
      fieldScores: fieldScoreProperties(similarity.fieldScores),
    })
  }

  for (const link of result.sameAsLinks) {
    edge('SAME_AS', link.source, link.target, { clusterId: link.clusterId })
  }

  for (const [recordId, masterId] of result.assignments) {
    edge('ASSIGNED_TO', recordId, masterId)
  }

  return { nodes, edges }
}

function fieldScoreProperties(scores: FieldScores): Record<string, JsonValue> {
  const properties: Record<string, JsonValue> = {}
  for (const [field, score] of Object.entries(scores)) {
    if (score !== undefined) properties[field] = score
  }
  return properties
}

/**
 * One node style per node label, colours cycled from `NODE_COLORS` over the
 * sorted labels, and one directed edge style per relation type.
 */
export function createGraphStyles(elements: GraphElements): GraphStyles {
  const nodeLabels = new Set<string>()
  const relationTypes = new Set<string>()

  for (const node of elements.nodes) {
    nodeLabels.add(node.data.label || DEFAULT_NODE_LABEL)
  }
  for (const edge of elements.edges) {
    relationTypes.add(edge.data.label || DEFAULT_EDGE_LABEL)
  }

  const nodeStyles = Array.from(nodeLabels)
    .sort()
    .map((label, i) => ({
      label,
      color: NODE_COLORS[i % NODE_COLORS.length],
      caption: 'name',
      shape: 'circle' as const,
    }))

  const edgeStyles = Array.from(relationTypes)
    .sort()
    .map((label) => ({ label, directed: true }))

  return { nodeStyles, edgeStyles }
}
