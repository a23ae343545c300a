/**
 * Request/response envelopes for the two supported API styles:
 *  - Anthropic Messages API
 *  - OpenAI-compatible chat completions (OpenAI, OpenRouter)
 */

import { z } from 'zod'
import type { ApiStyle } from '../config/config-schema.js'
import type { ProviderProfile } from '../provider-registry/types.js'
import type { TransportRequest } from './types.js'

export const ANTHROPIC_VERSION = '2023-06-01'
export const OPENAI_TEMPERATURE = 0.7

const OPENROUTER_HOST = 'openrouter.ai'
const OPENROUTER_HEADERS: Readonly<Record<string, string>> = {
  'HTTP-Referer': 'https://github.com/fixquorum/fixquorum',
  'X-Title': 'fixquorum',
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/**
 * Build the HTTP request for one provider call.
 */
export function buildWireRequest(profile: ProviderProfile, prompt: string, apiKey: string): TransportRequest {
  const messages = [{ role: 'user', content: prompt }]

  if (profile.apiStyle === 'anthropic') {
    return {
      endpoint: profile.endpoint,
      headers: {
        'x-api-key': apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: {
        model: profile.model,
        max_tokens: profile.maxOutputTokens,
        messages,
      },
    }
  }

  return {
    endpoint: profile.endpoint,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      ...(profile.endpoint.includes(OPENROUTER_HOST) ? OPENROUTER_HEADERS : {}),
    },
    body: {
      model: profile.model,
      messages,
      max_tokens: profile.maxOutputTokens,
      temperature: OPENAI_TEMPERATURE,
    },
  }
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

const AnthropicEnvelopeSchema = z.object({
  content: z.array(
    z.object({
      type: z.string().optional(),
      text: z.string().optional(),
    }),
  ),
})

const OpenAIEnvelopeSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
})

/**
 * Pull the completion text out of a decoded response envelope.
 * @returns the text, or undefined when the envelope has an unexpected shape or no text
 */
export function extractCompletionText(apiStyle: ApiStyle, envelope: unknown): string | undefined {
  if (apiStyle === 'anthropic') {
    const parsed = AnthropicEnvelopeSchema.safeParse(envelope)
    if (!parsed.success) return undefined
    const text = parsed.data.content
      .filter((block) => (block.type === undefined || block.type === 'text') && typeof block.text === 'string')
      .map((block) => block.text ?? '')
      .join('')
    return text.length > 0 ? text : undefined
  }

  const parsed = OpenAIEnvelopeSchema.safeParse(envelope)
  if (!parsed.success) return undefined
  const text = parsed.data.choices[0]?.message.content ?? ''
  return text.length > 0 ? text : undefined
}
