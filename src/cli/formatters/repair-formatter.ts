/**
 * Repair formatter: run summary rendering for `fixquorum repair`.
 *
 * Provides:
 *   - `describeIteration`: one-line summary of an iteration record
 *   - `renderRepairSummary`: human-readable report
 *   - `renderRepairJson`: the RepairRunResult as JSON
 */

import type { IterationRecord, RepairRunResult } from '../../modules/repair-loop/types.js'
import { formatDuration } from '../../utils/helpers.js'

const RULE = '='.repeat(80)

const MAX_LISTED_FAILURES = 10

// ---------------------------------------------------------------------------
// describeIteration
// ---------------------------------------------------------------------------

export function describeIteration(record: IterationRecord): string {
  const prefix = `Iteration ${String(record.iteration)}:`
  if (record.testOutcome.passed) return `${prefix} tests passed`

  const failing = `${String(record.testOutcome.failingTests.length)} failing test(s)`
  const decision = record.consensus
  if (decision === null) return `${prefix} ${failing}; aborted before consensus`
  if (!decision.hasConsensus) {
    return `${prefix} ${failing}; no consensus (confidence ${decision.confidence.toFixed(2)})`
  }
  return (
    `${prefix} ${failing}; consensus (confidence ${decision.confidence.toFixed(2)}) ` +
    `from ${decision.supportingProviders.join(', ')}; ${record.fixApplied ? 'fix applied' : 'fix not applied'}`
  )
}

// ---------------------------------------------------------------------------
// renderRepairSummary
// ---------------------------------------------------------------------------

export function renderRepairSummary(result: RepairRunResult): string {
  const lines: string[] = [RULE, result.success ? 'REPAIR SUCCEEDED' : 'REPAIR FAILED', RULE]
  lines.push(`Iterations: ${String(result.iterations)}/${String(result.maxIterations)}`)
  lines.push(`Duration: ${formatDuration(result.durationMs)}`)
  if (result.failureReason !== undefined) lines.push(`Reason: ${result.failureReason}`)

  if (result.history.length > 0) {
    lines.push('')
    for (const record of result.history) lines.push(describeIteration(record))
  }

  const final = result.finalTestOutcome
  if (final !== null) {
    lines.push('', 'Final Test Results:')
    lines.push(`  Passed: ${final.passed ? 'yes' : 'no'}`)
    if (!final.passed) {
      lines.push(`  Failing tests: ${String(final.failingTests.length)}`)
      for (const test of final.failingTests.slice(0, MAX_LISTED_FAILURES)) {
        lines.push(`    - ${test.name}${test.file ? ` (${test.file})` : ''}`)
      }
      const hidden = final.failingTests.length - MAX_LISTED_FAILURES
      if (hidden > 0) lines.push(`    ... and ${String(hidden)} more`)
    }
  }

  lines.push(RULE)
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// renderRepairJson
// ---------------------------------------------------------------------------

export function renderRepairJson(result: RepairRunResult): string {
  return JSON.stringify(result, null, 2)
}
