/**
 * Types for the weighted consensus resolver.
 */

import type { ProviderId, ProviderResponse } from '../../core/types.js'

/** Order in which responses are fed to the greedy clustering pass */
export type ClusterOrder = 'as-received' | 'weight-desc'

export interface ConsensusThresholds {
  /** Minimum weighted confidence of the winning cluster, in [0, 1] */
  readonly minConfidence: number
  /** Minimum number of providers in the winning cluster */
  readonly minAgreement: number
  /** Similarity at or above which a fix joins an existing cluster */
  readonly similarityThreshold: number
  readonly clusterOrder: ClusterOrder
  /** Second score ≥ ratio × top score is reported as a close decision */
  readonly closeDecisionRatio: number
  /** Top cluster average raw confidence below this is reported as low confidence */
  readonly lowConfidenceThreshold: number
  /** This many clusters or more is reported as high disagreement */
  readonly highDisagreementClusters: number
}

/** A group of responses whose proposed fixes are treated as the same fix */
export interface FixCluster {
  /** Fix text of the response that seeded the cluster */
  readonly representativeFix: string
  readonly members: readonly ProviderResponse[]
  /** Provider weight of each member, same order as `members` */
  readonly weights: readonly number[]
  /** Σ weight × confidence over members */
  readonly weightedScore: number
  /** Mean of the members' raw confidences */
  readonly averageConfidence: number
}

export interface ConsensusAlternative {
  readonly fix: string
  readonly weightedScore: number
  readonly providers: readonly ProviderId[]
}

export interface ConsensusDecision {
  readonly hasConsensus: boolean
  /** Empty when there is no consensus */
  readonly chosenFix: string
  /** Weighted confidence of the top cluster (score / Σ member weights) */
  readonly confidence: number
  readonly supportingProviders: readonly ProviderId[]
  /** Weighted score of the top cluster */
  readonly totalWeight: number
  readonly reasoning: string
  /** Every non-winning cluster, in rank order */
  readonly alternatives: readonly ConsensusAlternative[]
  /** Advisory annotations; never affect the verdict */
  readonly conflicts: readonly string[]
}

/** Provider id → voting weight */
export type ProviderWeights = Readonly<Partial<Record<ProviderId, number>>>

export interface ConsensusResolver {
  /**
   * Cluster the responses, rank the clusters and decide.
   * Pure and synchronous.
   *
   * @throws {ProviderConfigError} when a weight is negative or not finite
   * @throws {ConfigError} when a threshold is out of range
   */
  resolve(
    responses: readonly ProviderResponse[],
    weights: ProviderWeights,
    overrides?: Partial<ConsensusThresholds>,
  ): ConsensusDecision
}
