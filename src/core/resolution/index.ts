export {
  plurality,
  pluralityOrMostComplete,
  defaultPolicyFor,
  CANONICAL_POLICIES,
} from './canonical-policies'
export type { CandidateValue, CanonicalPolicyFunction } from './canonical-policies'
export { MasterEntityBuilder, contentMasterId } from './master-entity-builder'
export type {
  MasterEntityBuilderOptions,
  MasterEntityBuild,
  MasterIdGenerator,
} from './master-entity-builder'
export {
  MergeStrategy,
  LinkStrategy,
  createResolutionStrategy,
} from './resolution-strategy'
export type {
  ResolutionStrategy,
  ResolutionInput,
  ResolutionOutcome,
} from './resolution-strategy'
