import { ConnectedComponents } from './connected-components'
import { Louvain } from './louvain'
import type { CommunityDetectionAlgorithm } from './types'

export interface AlgorithmRegistryOptions {
  /** Passed to the built-in Louvain algorithm */
  resolution?: number
}

/**
 * Community detection algorithms available to a cluster extractor, by name.
 * Starts with `louvain` and `connected-components`.
 */
export class CommunityAlgorithmRegistry {
  private readonly algorithms = new Map<string, CommunityDetectionAlgorithm>()

  constructor(options: AlgorithmRegistryOptions = {}) {
    this.register(new Louvain({ resolution: options.resolution }))
    this.register(new ConnectedComponents())
  }

  register(algorithm: CommunityDetectionAlgorithm): void {
    this.algorithms.set(algorithm.name, algorithm)
  }

  get(name: string): CommunityDetectionAlgorithm | undefined {
    return this.algorithms.get(name)
  }

  has(name: string): boolean {
    return this.algorithms.has(name)
  }

  list(): string[] {
    return Array.from(this.algorithms.keys()).sort()
  }

  all(): CommunityDetectionAlgorithm[] {
    return Array.from(this.algorithms.values())
  }
}
