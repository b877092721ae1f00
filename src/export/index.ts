export {
  toGraphElements,
  createGraphStyles,
  NODE_COLORS,
  RECORD_NODE_LABEL,
  MASTER_NODE_LABEL,
  DEFAULT_NODE_LABEL,
  DEFAULT_EDGE_LABEL,
} from './graph-elements'
export type {
  GraphElements,
  GraphStyles,
  NodeData,
  EdgeData,
  NodeStyle,
  EdgeStyle,
  JsonValue,
  RelationType,
} from './graph-elements'
