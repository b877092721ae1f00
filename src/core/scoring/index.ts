export { PairScorer, compareWith } from './pair-scorer'
export { InProcessExecutor } from './executor'
export type { BlockScoringExecutor, BlockScoringTask } from './executor'
