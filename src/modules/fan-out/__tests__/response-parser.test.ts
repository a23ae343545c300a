import { describe, it, expect } from 'vitest'
import { clampConfidence, extractBalancedObject, parseStructuredResponse } from '../response-parser.js'

describe('extractBalancedObject', () => {
  it('returns the first complete object', () => {
    expect(extractBalancedObject('prefix {"a": {"b": 1}} trailing {"c": 2}')).toBe('{"a": {"b": 1}}')
  })

  it('ignores braces inside strings', () => {
    expect(extractBalancedObject('x {"fix": "if (a) { b }", "n": "\\"}"} y')).toBe('{"fix": "if (a) { b }", "n": "\\"}"}')
  })

  it('returns undefined for unbalanced input', () => {
    expect(extractBalancedObject('{"a": 1')).toBeUndefined()
    expect(extractBalancedObject('no braces')).toBeUndefined()
  })
})

describe('parseStructuredResponse', () => {
  it('parses a bare JSON object', () => {
    const result = parseStructuredResponse(
      '{"analysis":"a","root_cause":"r","proposed_fix":"f","reasoning":"why","confidence":0.9,"alternative_approaches":["alt"]}',
    )
    expect(result).toEqual({
      ok: true,
      fix: {
        analysis: 'a',
        rootCause: 'r',
        proposedFix: 'f',
        reasoning: 'why',
        confidence: 0.9,
        alternativeApproaches: ['alt'],
      },
    })
  })

  it('prefers a json fence over other content', () => {
    const text = 'Notes {"proposed_fix": "wrong"}\n```json\n{"proposed_fix": "right"}\n```'
    const result = parseStructuredResponse(text)
    expect(result.ok && result.fix.proposedFix).toBe('right')
  })

  it('falls back to a plain fence', () => {
    const result = parseStructuredResponse('```\n{"proposed_fix": "plain"}\n```')
    expect(result.ok && result.fix.proposedFix).toBe('plain')
  })

  it('finds an object embedded in prose', () => {
    const result = parseStructuredResponse('Sure! {"proposed_fix": "inline", "confidence": "0.4"} Hope that helps.')
    expect(result.ok && result.fix.proposedFix).toBe('inline')
    expect(result.ok && result.fix.confidence).toBe(0.4)
  })

  it('defaults missing fields', () => {
    const result = parseStructuredResponse('{"proposed_fix": "only fix"}')
    expect(result).toEqual({
      ok: true,
      fix: {
        analysis: '',
        rootCause: '',
        proposedFix: 'only fix',
        reasoning: '',
        confidence: 0.5,
        alternativeApproaches: [],
      },
    })
  })

  it('defaults a confidence that is not a number', () => {
    for (const value of ['null', '""', '[]', 'true', '"high"']) {
      const result = parseStructuredResponse(`{"proposed_fix": "f", "confidence": ${value}}`)
      expect(result.ok && result.fix.confidence).toBe(0.5)
    }
  })

  it('clamps out-of-range confidence', () => {
    const low = parseStructuredResponse('{"proposed_fix": "f", "confidence": -2}')
    const high = parseStructuredResponse('{"proposed_fix": "f", "confidence": 7}')
    expect(low.ok && low.fix.confidence).toBe(0)
    expect(high.ok && high.fix.confidence).toBe(1)
  })

  it('fails on text without a JSON object', () => {
    const result = parseStructuredResponse('I think the bug is in the loop.')
    expect(result.ok).toBe(false)
  })

  it('fails on a JSON value that is not an object', () => {
    expect(parseStructuredResponse('[1, 2, 3]')).toEqual({ ok: false, message: 'Response JSON is not an object' })
  })

  it('fails on empty text', () => {
    expect(parseStructuredResponse('  ')).toEqual({ ok: false, message: 'Empty response' })
  })
})

describe('clampConfidence', () => {
  it('keeps values inside [0, 1]', () => {
    expect(clampConfidence(0.42)).toBe(0.42)
    expect(clampConfidence(-0.1)).toBe(0)
    expect(clampConfidence(1.1)).toBe(1)
  })
})
