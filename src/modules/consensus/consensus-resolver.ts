/**
 * ConsensusResolver: weighted voting over clustered fix proposals.
 *
 * Steps:
 *  1. drop errored responses and empty fixes
 *  2. greedy single-pass clustering by fix similarity
 *  3. rank clusters by weighted score (stable)
 *  4. decide against min agreement and min weighted confidence
 *  5. annotate conflicts
 */

import type pino from 'pino'
import type { ProviderId, ProviderResponse } from '../../core/types.js'
import { ConfigError, ProviderConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ConsensusConfig } from '../config/config-schema.js'
import { similarity } from './similarity.js'
import type {
  ConsensusDecision,
  ConsensusResolver,
  ConsensusThresholds,
  FixCluster,
  ProviderWeights,
} from './types.js'

/** Weight used for providers missing from the weight map */
export const UNWEIGHTED_PROVIDER_WEIGHT = 0.5

export const DEFAULT_THRESHOLDS: ConsensusThresholds = {
  minConfidence: 0.6,
  minAgreement: 2,
  similarityThreshold: 0.7,
  clusterOrder: 'as-received',
  closeDecisionRatio: 0.8,
  lowConfidenceThreshold: 0.7,
  highDisagreementClusters: 4,
}

/** Map the `consensus` config section onto resolver thresholds */
export function thresholdsFromConfig(config: ConsensusConfig): ConsensusThresholds {
  return {
    minConfidence: config.min_confidence,
    minAgreement: config.min_agreement,
    similarityThreshold: config.similarity_threshold,
    clusterOrder: config.cluster_order,
    closeDecisionRatio: config.close_decision_ratio,
    lowConfidenceThreshold: config.low_confidence_threshold,
    highDisagreementClusters: config.high_disagreement_clusters,
  }
}

/** Apply overrides, ignoring keys that are present but undefined */
export function mergeThresholds(
  base: ConsensusThresholds,
  overrides: Partial<ConsensusThresholds> = {},
): ConsensusThresholds {
  return {
    minConfidence: overrides.minConfidence ?? base.minConfidence,
    minAgreement: overrides.minAgreement ?? base.minAgreement,
    similarityThreshold: overrides.similarityThreshold ?? base.similarityThreshold,
    clusterOrder: overrides.clusterOrder ?? base.clusterOrder,
    closeDecisionRatio: overrides.closeDecisionRatio ?? base.closeDecisionRatio,
    lowConfidenceThreshold: overrides.lowConfidenceThreshold ?? base.lowConfidenceThreshold,
    highDisagreementClusters: overrides.highDisagreementClusters ?? base.highDisagreementClusters,
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateWeights(weights: ProviderWeights): void {
  for (const [provider, weight] of Object.entries(weights)) {
    if (weight === undefined) continue
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ProviderConfigError(`Invalid weight ${String(weight)} for provider "${provider}"`, {
        provider,
        weight,
      })
    }
  }
}

function validateThresholds(t: ConsensusThresholds): void {
  if (!(t.minConfidence >= 0 && t.minConfidence <= 1)) {
    throw new ConfigError(`minConfidence must be within [0, 1], got ${String(t.minConfidence)}`)
  }
  if (!Number.isInteger(t.minAgreement) || t.minAgreement < 1) {
    throw new ConfigError(`minAgreement must be an integer >= 1, got ${String(t.minAgreement)}`)
  }
  if (!(t.similarityThreshold >= 0 && t.similarityThreshold <= 1)) {
    throw new ConfigError(`similarityThreshold must be within [0, 1], got ${String(t.similarityThreshold)}`)
  }
}

function weightOf(provider: ProviderId, weights: ProviderWeights): number {
  return weights[provider] ?? UNWEIGHTED_PROVIDER_WEIGHT
}

// ---------------------------------------------------------------------------
// Clustering
// ---------------------------------------------------------------------------

interface MutableCluster {
  representativeFix: string
  members: ProviderResponse[]
  weights: number[]
  weightedScore: number
}

/** Responses that carry a usable fix */
export function validResponses(responses: readonly ProviderResponse[]): ProviderResponse[] {
  return responses.filter((r) => r.error === undefined && r.proposedFix.length > 0)
}

/**
 * Group fixes and rank the groups by weighted score, descending.
 *
 * Each response joins the most similar existing cluster when that similarity
 * meets the threshold (the earliest cluster wins a tie), otherwise it seeds a
 * new cluster. Membership depends on the feed order, which `clusterOrder`
 * makes explicit.
 */
export function clusterResponses(
  responses: readonly ProviderResponse[],
  weights: ProviderWeights,
  thresholds: Pick<ConsensusThresholds, 'similarityThreshold' | 'clusterOrder'>,
): FixCluster[] {
  const ordered =
    thresholds.clusterOrder === 'weight-desc'
      ? [...responses].sort((a, b) => weightOf(b.provider, weights) - weightOf(a.provider, weights))
      : responses

  const clusters: MutableCluster[] = []
  for (const response of ordered) {
    const weight = weightOf(response.provider, weights)

    let best: MutableCluster | undefined
    let bestScore = -1
    for (const cluster of clusters) {
      const score = similarity(response.proposedFix, cluster.representativeFix)
      if (score > bestScore) {
        best = cluster
        bestScore = score
      }
    }

    if (best !== undefined && bestScore >= thresholds.similarityThreshold) {
      best.members.push(response)
      best.weights.push(weight)
      best.weightedScore += weight * response.confidence
    } else {
      clusters.push({
        representativeFix: response.proposedFix,
        members: [response],
        weights: [weight],
        weightedScore: weight * response.confidence,
      })
    }
  }

  return clusters
    .map((c) => ({
      representativeFix: c.representativeFix,
      members: c.members,
      weights: c.weights,
      weightedScore: c.weightedScore,
      averageConfidence: c.members.reduce((sum, m) => sum + m.confidence, 0) / c.members.length,
    }))
    .sort((a, b) => b.weightedScore - a.weightedScore)
}

// ---------------------------------------------------------------------------
// Conflicts
// ---------------------------------------------------------------------------

export function detectConflicts(clusters: readonly FixCluster[], thresholds: ConsensusThresholds): string[] {
  const conflicts: string[] = []
  const [top, second] = clusters

  if (top !== undefined && second !== undefined && second.weightedScore >= top.weightedScore * thresholds.closeDecisionRatio) {
    const within = Math.round((1 - thresholds.closeDecisionRatio) * 100)
    conflicts.push(
      `Close decision: Top fix has weight ${top.weightedScore.toFixed(2)}, ` +
        `second has ${second.weightedScore.toFixed(2)} (within ${String(within)}%)`,
    )
  }

  if (top !== undefined && top.averageConfidence < thresholds.lowConfidenceThreshold) {
    conflicts.push(`Low confidence: Top fix has average confidence ${top.averageConfidence.toFixed(2)}`)
  }

  if (clusters.length >= thresholds.highDisagreementClusters) {
    conflicts.push(`High disagreement: ${String(clusters.length)} different fix proposals`)
  }

  return conflicts
}

// ---------------------------------------------------------------------------
// ConsensusResolverImpl
// ---------------------------------------------------------------------------

export interface ConsensusResolverOptions {
  thresholds?: Partial<ConsensusThresholds>
  logger?: pino.Logger
}

export class ConsensusResolverImpl implements ConsensusResolver {
  private readonly _thresholds: ConsensusThresholds
  private readonly _logger: pino.Logger

  constructor(options: ConsensusResolverOptions = {}) {
    this._thresholds = mergeThresholds(DEFAULT_THRESHOLDS, options.thresholds)
    validateThresholds(this._thresholds)
    this._logger = options.logger ?? createLogger('consensus')
  }

  resolve(
    responses: readonly ProviderResponse[],
    weights: ProviderWeights,
    overrides: Partial<ConsensusThresholds> = {},
  ): ConsensusDecision {
    const t = mergeThresholds(this._thresholds, overrides)
    validateThresholds(t)
    validateWeights(weights)

    const valid = validResponses(responses)
    if (valid.length === 0) {
      this._logger.warn({ responses: responses.length }, 'No valid responses to resolve')
      return {
        hasConsensus: false,
        chosenFix: '',
        confidence: 0,
        supportingProviders: [],
        totalWeight: 0,
        reasoning: 'No valid responses from any provider',
        alternatives: [],
        conflicts: ['All providers failed or returned empty fixes'],
      }
    }

    const clusters = clusterResponses(valid, weights, t)
    const conflicts = detectConflicts(clusters, t)
    const [top, ...rest] = clusters
    if (top === undefined) {
      throw new ConfigError('Clustering produced no clusters for a non-empty response set')
    }

    const supporters = top.members.map((m) => m.provider)
    const sumWeights = top.weights.reduce((sum, w) => sum + w, 0)
    const weightedConfidence = sumWeights > 0 ? top.weightedScore / sumWeights : 0
    const hasConsensus = supporters.length >= t.minAgreement && weightedConfidence >= t.minConfidence

    const alternatives = rest.map((c) => ({
      fix: c.representativeFix,
      weightedScore: c.weightedScore,
      providers: c.members.map((m) => m.provider),
    }))

    let reasoning: string
    if (hasConsensus) {
      reasoning =
        `Consensus reached with ${String(supporters.length)} LLMs agreeing ` +
        `(weighted confidence: ${weightedConfidence.toFixed(2)}). ` +
        `Supporting providers: ${supporters.join(', ')}.`
      if (conflicts.length > 0) reasoning += ` Note: ${conflicts.join('; ')}`
    } else {
      const reasons: string[] = []
      if (supporters.length < t.minAgreement) {
        reasons.push(`only ${String(supporters.length)} LLMs agree (need ${String(t.minAgreement)})`)
      }
      if (weightedConfidence < t.minConfidence) {
        reasons.push(
          `weighted confidence ${weightedConfidence.toFixed(2)} below threshold ${String(t.minConfidence)}`,
        )
      }
      reasoning = `No consensus: ${reasons.join('; ')}.`
      if (alternatives.length > 0) {
        const others = alternatives.flatMap((a) => a.providers)
        reasoning += ` Alternative fixes proposed by: ${others.join(', ')}.`
      }
      if (conflicts.length > 0) reasoning += ` Conflicts: ${conflicts.join('; ')}`
    }

    this._logger.debug(
      { clusters: clusters.length, hasConsensus, confidence: weightedConfidence, supporters },
      'Consensus resolved',
    )

    return {
      hasConsensus,
      chosenFix: hasConsensus ? top.representativeFix : '',
      confidence: weightedConfidence,
      supportingProviders: supporters,
      totalWeight: top.weightedScore,
      reasoning,
      alternatives,
      conflicts,
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createConsensusResolver(options: ConsensusResolverOptions = {}): ConsensusResolver {
  return new ConsensusResolverImpl(options)
}
