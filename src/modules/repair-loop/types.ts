/**
 * Types for the iterative repair loop.
 */

import type { ProviderResponse, TestOutcome } from '../../core/types.js'
import type { ConsensusDecision } from '../consensus/types.js'

// ---------------------------------------------------------------------------
// Context search collaborator
// ---------------------------------------------------------------------------

export interface ContextSearchHit {
  /** Project-relative path */
  readonly filePath: string
  /** File content when the index already holds it */
  readonly content?: string
}

/** Optional semantic code search used to pick the code context */
export interface ContextSearch {
  search(query: string, limit: number, scoreThreshold: number): Promise<ContextSearchHit[]>
}

export interface ContextSearchSettings {
  readonly limit: number
  readonly scoreThreshold: number
  /** Failure messages queried alongside the bug description */
  readonly maxFailureQueries: number
}

// ---------------------------------------------------------------------------
// Run request and results
// ---------------------------------------------------------------------------

export interface RepairRequest {
  readonly bugDescription: string
  /** Passed to the test runner verbatim */
  readonly testSelector?: readonly string[]
  readonly maxIterations?: number
  readonly minConfidence?: number
  readonly minAgreement?: number
}

export interface IterationRecord {
  /** 1-based */
  readonly iteration: number
  readonly testOutcome: TestOutcome
  readonly responses: readonly ProviderResponse[]
  /** null when the tests passed or the iteration aborted before resolving */
  readonly consensus: ConsensusDecision | null
  readonly fixApplied: boolean
  /** Chosen fix text; empty without consensus */
  readonly fixText: string
  /** ISO-8601 */
  readonly timestamp: string
}

export interface RepairRunResult {
  readonly success: boolean
  /** Number of recorded iterations */
  readonly iterations: number
  readonly maxIterations: number
  /** null only when the very first test run crashed */
  readonly finalTestOutcome: TestOutcome | null
  readonly history: readonly IterationRecord[]
  readonly durationMs: number
  readonly failureReason?: string
}

export interface RepairLoop {
  /**
   * Run tests, ask the providers, apply the consensus fix and repeat until
   * the tests pass or the iteration budget is spent.
   *
   * Collaborator failures end the run with `success: false`; the promise
   * rejects only for invalid run parameters.
   *
   * @throws {ConfigError} when maxIterations, minAgreement or minConfidence is out of range
   */
  repair(request: RepairRequest): Promise<RepairRunResult>
}
