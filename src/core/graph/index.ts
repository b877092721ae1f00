export { SimilarityGraph, aggregateEdges } from './similarity-graph'
