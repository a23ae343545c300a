/**
 * Decision formatter: human-readable consensus report for `fixquorum resolve`
 * and the per-iteration output of `fixquorum repair`.
 */

import type { ConsensusDecision } from '../../modules/consensus/types.js'

const RULE = '='.repeat(80)

/** Characters of each alternative fix shown in the report */
export const ALTERNATIVE_PREVIEW_LENGTH = 200

/**
 * Render a ConsensusDecision: verdict, confidence, supporters, reasoning,
 * chosen fix, runner-up proposals and conflicts.
 */
export function explainDecision(decision: ConsensusDecision): string {
  const lines: string[] = [RULE, 'CONSENSUS DECISION', RULE]

  lines.push(decision.hasConsensus ? 'CONSENSUS REACHED' : 'NO CONSENSUS')
  lines.push(`Confidence: ${decision.confidence.toFixed(2)}`)
  lines.push(`Total Weight: ${decision.totalWeight.toFixed(2)}`)
  if (decision.hasConsensus) {
    lines.push(`Supporting Providers: ${decision.supportingProviders.join(', ')}`)
  }
  lines.push(`\nReasoning:\n${decision.reasoning}`)
  if (decision.hasConsensus) {
    lines.push(`\nChosen Fix:\n${decision.chosenFix}`)
  }

  if (decision.alternatives.length > 0) {
    const label = decision.hasConsensus ? 'Alternative' : 'Proposal'
    lines.push(decision.hasConsensus ? '\nAlternative Fixes Considered:' : '\nProposed Fixes:')
    decision.alternatives.forEach((alt, i) => {
      lines.push(`\n  ${label} ${String(i + 1)} (weight: ${alt.weightedScore.toFixed(2)}):`)
      lines.push(`  Providers: ${alt.providers.join(', ')}`)
      lines.push(`  Fix: ${alt.fix.slice(0, ALTERNATIVE_PREVIEW_LENGTH)}...`)
    })
  }

  if (decision.conflicts.length > 0) {
    lines.push('\nConflicts Detected:')
    for (const conflict of decision.conflicts) {
      lines.push(`  - ${conflict}`)
    }
  }

  lines.push(RULE)
  return lines.join('\n')
}
