export type { BlockSet, CandidatePair } from './types'
export { CATCH_ALL_BLOCK_KEY } from './types'
export { applyTransform, firstN, lastN, soundexTransform } from './transforms'
export { Blocker } from './blocker'
export { BlockGenerator } from './block-generator'
export type { BlockGeneratorOptions, BlockingOutcome } from './block-generator'
