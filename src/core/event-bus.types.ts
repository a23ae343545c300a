/**
 * RepairEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "repair:started", "repair:consensus")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { ProviderId, TestOutcome } from './types.js'

/**
 * Complete typed map of all events emitted during a repair run.
 * Use `keyof RepairEvents` to constrain event keys.
 */
export interface RepairEvents {
  /** A repair run has begun */
  'repair:started': { runId: string; bugDescription: string; maxIterations: number }

  /** A new iteration is about to run the tests */
  'repair:iteration-started': { runId: string; iteration: number; maxIterations: number }

  /** The test runner finished for this iteration */
  'repair:tests-completed': { runId: string; iteration: number; outcome: TestOutcome }

  /** All providers have answered (or failed) for this iteration */
  'repair:fan-out-completed': {
    runId: string
    iteration: number
    contextFiles: number
    succeeded: ProviderId[]
    failed: ProviderId[]
  }

  /** The consensus resolver produced a decision */
  'repair:consensus': {
    runId: string
    iteration: number
    hasConsensus: boolean
    confidence: number
    supportingProviders: ProviderId[]
    conflicts: string[]
  }

  /** A consensus fix was handed to the fix applier */
  'repair:fix-applied': { runId: string; iteration: number; applied: boolean }

  /** The run terminated */
  'repair:finished': {
    runId: string
    success: boolean
    iterations: number
    durationMs: number
    failureReason?: string
  }
}
