/**
 * Tests for explainDecision.
 */

import { describe, it, expect } from 'vitest'
import { explainDecision, ALTERNATIVE_PREVIEW_LENGTH } from '../decision-formatter.js'
import type { ConsensusDecision } from '../../../modules/consensus/types.js'

const RULE = '='.repeat(80)

const REACHED: ConsensusDecision = {
  hasConsensus: true,
  chosenFix: 'return a + b',
  confidence: 0.8765,
  supportingProviders: ['gpt4', 'claude'],
  totalWeight: 1.6,
  reasoning: 'Consensus reached with 2 LLMs agreeing (weighted confidence: 0.88). Supporting providers: gpt4, claude.',
  alternatives: [{ fix: 'return b + a', weightedScore: 0.42, providers: ['qwen'] }],
  conflicts: [],
}

describe('explainDecision', () => {
  it('renders a consensus decision', () => {
    expect(explainDecision(REACHED).split('\n')).toEqual([
      RULE,
      'CONSENSUS DECISION',
      RULE,
      'CONSENSUS REACHED',
      'Confidence: 0.88',
      'Total Weight: 1.60',
      'Supporting Providers: gpt4, claude',
      '',
      'Reasoning:',
      REACHED.reasoning,
      '',
      'Chosen Fix:',
      'return a + b',
      '',
      'Alternative Fixes Considered:',
      '',
      '  Alternative 1 (weight: 0.42):',
      '  Providers: qwen',
      '  Fix: return b + a...',
      RULE,
    ])
  })

  it('lists proposals and conflicts when there is no consensus', () => {
    const text = explainDecision({
      hasConsensus: false,
      chosenFix: '',
      confidence: 0.45,
      supportingProviders: ['gpt4'],
      totalWeight: 0.45,
      reasoning: 'No consensus: only 1 LLMs agree (need 2).',
      alternatives: [{ fix: 'x'.repeat(250), weightedScore: 0.4, providers: ['claude'] }],
      conflicts: ['Close decision: Top fix has weight 0.45, second has 0.40 (within 20%)'],
    })

    const lines = text.split('\n')
    expect(lines[3]).toBe('NO CONSENSUS')
    expect(text).not.toContain('Supporting Providers:')
    expect(text).not.toContain('Chosen Fix:')
    expect(text).toContain('\nProposed Fixes:\n\n  Proposal 1 (weight: 0.40):\n')
    expect(text).toContain(`  Fix: ${'x'.repeat(ALTERNATIVE_PREVIEW_LENGTH)}...\n`)
    expect(text).toContain(
      '\nConflicts Detected:\n  - Close decision: Top fix has weight 0.45, second has 0.40 (within 20%)\n' + RULE,
    )
  })
})
