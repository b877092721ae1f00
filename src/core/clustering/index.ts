export type { CommunityDetectionAlgorithm, Partition } from './types'
export { ConnectedComponents } from './connected-components'
export { Louvain } from './louvain'
export type { LouvainOptions } from './louvain'
export { CommunityAlgorithmRegistry } from './registry'
export type { AlgorithmRegistryOptions } from './registry'
export { ClusterExtractor, toClusters } from './cluster-extractor'
export type { ClusterExtractorOptions, ClusterExtraction } from './cluster-extractor'
