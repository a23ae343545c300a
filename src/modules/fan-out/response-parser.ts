/**
 * Decoding of the structured fix proposal from a provider's completion text.
 *
 * Providers often wrap the JSON object in prose or markdown fences. Candidates
 * are tried in order: a ```json fence, any ``` fence, the first balanced
 * `{...}` object, then the whole text. The first candidate that decodes to a
 * JSON object wins.
 */

import { z } from 'zod'
import type { StructuredFix } from './types.js'

// ---------------------------------------------------------------------------
// Payload schema
// ---------------------------------------------------------------------------

const lenientText = z.string().catch('')

/** Missing or non-numeric confidence falls back to 0.5 */
export const DEFAULT_CONFIDENCE = 0.5

const NUMERIC_TEXT = /^\s*[-+]?(\d+\.?\d*|\.\d+)\s*$/

/** A number, or a string holding one; anything else is not a confidence */
const confidenceValue = z
  .union([z.number(), z.string().regex(NUMERIC_TEXT).transform(Number)])
  .pipe(z.number().finite())

export const StructuredFixPayloadSchema = z.object({
  analysis: lenientText,
  root_cause: lenientText,
  proposed_fix: lenientText,
  reasoning: lenientText,
  confidence: confidenceValue.catch(DEFAULT_CONFIDENCE),
  alternative_approaches: z.array(z.string()).catch([]),
})

export type ParseResult =
  | { readonly ok: true; readonly fix: StructuredFix }
  | { readonly ok: false; readonly message: string }

// ---------------------------------------------------------------------------
// Candidate extraction
// ---------------------------------------------------------------------------

const JSON_FENCE = /```json\s*([\s\S]*?)```/i
const ANY_FENCE = /```[A-Za-z0-9_-]*\s*([\s\S]*?)```/

/**
 * Return the first balanced `{...}` substring, honouring JSON string quoting.
 */
export function extractBalancedObject(text: string): string | undefined {
  const start = text.indexOf('{')
  if (start === -1) return undefined

  let depth = 0
  let inString = false
  let escaped = false
  for (let i = start; i < text.length; i++) {
    const ch = text[i]
    if (inString) {
      if (escaped) escaped = false
      else if (ch === '\\') escaped = true
      else if (ch === '"') inString = false
      continue
    }
    if (ch === '"') inString = true
    else if (ch === '{') depth++
    else if (ch === '}') {
      depth--
      if (depth === 0) return text.slice(start, i + 1)
    }
  }
  return undefined
}

function candidates(text: string): string[] {
  const found: string[] = []
  const jsonFence = JSON_FENCE.exec(text)?.[1]
  if (jsonFence !== undefined) found.push(jsonFence.trim())
  const anyFence = ANY_FENCE.exec(text)?.[1]
  if (anyFence !== undefined) found.push(anyFence.trim())
  const balanced = extractBalancedObject(text)
  if (balanced !== undefined) found.push(balanced)
  found.push(text.trim())
  return found
}

export function clampConfidence(value: number): number {
  if (value < 0) return 0
  if (value > 1) return 1
  return value
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Decode a completion into a StructuredFix.
 * Returns `ok: false` with the first decode error when no candidate is a JSON object.
 */
export function parseStructuredResponse(text: string): ParseResult {
  if (text.trim().length === 0) {
    return { ok: false, message: 'Empty response' }
  }

  let firstError: string | undefined
  for (const candidate of candidates(text)) {
    let decoded: unknown
    try {
      decoded = JSON.parse(candidate)
    } catch (err) {
      firstError ??= err instanceof Error ? err.message : String(err)
      continue
    }

    const payload = StructuredFixPayloadSchema.safeParse(decoded)
    if (!payload.success) {
      firstError ??= 'Response JSON is not an object'
      continue
    }

    const data = payload.data
    return {
      ok: true,
      fix: {
        analysis: data.analysis,
        rootCause: data.root_cause,
        proposedFix: data.proposed_fix,
        reasoning: data.reasoning,
        confidence: clampConfidence(data.confidence),
        alternativeApproaches: data.alternative_approaches,
      },
    }
  }

  return { ok: false, message: firstError ?? 'No JSON object found' }
}
