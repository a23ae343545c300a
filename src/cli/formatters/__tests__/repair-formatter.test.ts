/**
 * Tests for the repair run summary formatters.
 */

import { describe, it, expect } from 'vitest'
import { describeIteration, renderRepairJson, renderRepairSummary } from '../repair-formatter.js'
import type { IterationRecord, RepairRunResult } from '../../../modules/repair-loop/types.js'
import type { ConsensusDecision } from '../../../modules/consensus/types.js'
import type { FailingTest, TestOutcome } from '../../../core/types.js'

const RULE = '='.repeat(80)

function failing(count: number): TestOutcome {
  const tests: FailingTest[] = []
  for (let i = 1; i <= count; i++) {
    tests.push({ name: `test_${String(i)}`, file: 'tests/test_calc.py', kind: 'assertion', message: '', trace: '' })
  }
  return { passed: false, failingTests: tests }
}

const DECISION: ConsensusDecision = {
  hasConsensus: true,
  chosenFix: 'return a + b',
  confidence: 0.9,
  supportingProviders: ['gpt4', 'claude'],
  totalWeight: 1.71,
  reasoning: '',
  alternatives: [],
  conflicts: [],
}

function record(overrides: Partial<IterationRecord>): IterationRecord {
  return {
    iteration: 1,
    testOutcome: failing(1),
    responses: [],
    consensus: null,
    fixApplied: false,
    fixText: '',
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

describe('describeIteration', () => {
  it('covers each iteration shape', () => {
    expect(describeIteration(record({ testOutcome: { passed: true, failingTests: [] } }))).toBe(
      'Iteration 1: tests passed',
    )
    expect(describeIteration(record({ iteration: 2 }))).toBe(
      'Iteration 2: 1 failing test(s); aborted before consensus',
    )
    expect(
      describeIteration(record({ consensus: { ...DECISION, hasConsensus: false, chosenFix: '', confidence: 0.4 } })),
    ).toBe('Iteration 1: 1 failing test(s); no consensus (confidence 0.40)')
    expect(describeIteration(record({ consensus: DECISION, fixApplied: true }))).toBe(
      'Iteration 1: 1 failing test(s); consensus (confidence 0.90) from gpt4, claude; fix applied',
    )
    expect(describeIteration(record({ consensus: DECISION }))).toBe(
      'Iteration 1: 1 failing test(s); consensus (confidence 0.90) from gpt4, claude; fix not applied',
    )
  })
})

describe('renderRepairSummary', () => {
  it('renders a successful run', () => {
    const result: RepairRunResult = {
      success: true,
      iterations: 2,
      maxIterations: 5,
      finalTestOutcome: { passed: true, failingTests: [] },
      history: [
        record({ consensus: DECISION, fixApplied: true }),
        record({ iteration: 2, testOutcome: { passed: true, failingTests: [] } }),
      ],
      durationMs: 1500,
    }

    expect(renderRepairSummary(result).split('\n')).toEqual([
      RULE,
      'REPAIR SUCCEEDED',
      RULE,
      'Iterations: 2/5',
      'Duration: 1.5s',
      '',
      'Iteration 1: 1 failing test(s); consensus (confidence 0.90) from gpt4, claude; fix applied',
      'Iteration 2: tests passed',
      '',
      'Final Test Results:',
      '  Passed: yes',
      RULE,
    ])
  })

  it('lists at most ten failing tests', () => {
    const outcome = failing(12)
    const text = renderRepairSummary({
      success: false,
      iterations: 1,
      maxIterations: 1,
      finalTestOutcome: outcome,
      history: [record({ testOutcome: outcome })],
      durationMs: 250,
      failureReason: 'Maximum iterations reached without passing tests',
    })

    expect(text).toContain('REPAIR FAILED\n')
    expect(text).toContain('Duration: 250ms\nReason: Maximum iterations reached without passing tests\n')
    expect(text).toContain('  Failing tests: 12\n')
    expect(text).toContain('    - test_10 (tests/test_calc.py)\n    ... and 2 more\n')
    expect(text).not.toContain('test_11')
  })

  it('omits final results when the first test run crashed', () => {
    const text = renderRepairSummary({
      success: false,
      iterations: 0,
      maxIterations: 5,
      finalTestOutcome: null,
      history: [],
      durationMs: 12,
      failureReason: 'Exception in iteration 1: spawn pytest ENOENT',
    })

    expect(text.split('\n')).toEqual([
      RULE,
      'REPAIR FAILED',
      RULE,
      'Iterations: 0/5',
      'Duration: 12ms',
      'Reason: Exception in iteration 1: spawn pytest ENOENT',
      RULE,
    ])
  })
})

describe('renderRepairJson', () => {
  it('round-trips through JSON.parse', () => {
    const result: RepairRunResult = {
      success: true,
      iterations: 1,
      maxIterations: 3,
      finalTestOutcome: { passed: true, failingTests: [] },
      history: [],
      durationMs: 5,
    }
    expect(JSON.parse(renderRepairJson(result))).toEqual(result)
  })
})
