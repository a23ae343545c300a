export {
  ConsensusResolverImpl,
  createConsensusResolver,
  clusterResponses,
  detectConflicts,
  validResponses,
  thresholdsFromConfig,
  mergeThresholds,
  DEFAULT_THRESHOLDS,
  UNWEIGHTED_PROVIDER_WEIGHT,
} from './consensus-resolver.js'
export type { ConsensusResolverOptions } from './consensus-resolver.js'
export { similarity, normalizeWhitespace } from './similarity.js'
export type {
  ClusterOrder,
  ConsensusAlternative,
  ConsensusDecision,
  ConsensusResolver,
  ConsensusThresholds,
  FixCluster,
  ProviderWeights,
} from './types.js'
