/**
 * Prompt construction for fan-out calls.
 *
 * Every provider receives the same shared prompt followed by its own
 * steering clause.
 */

import { extname } from 'path'
import type { ProviderProfile } from '../provider-registry/types.js'
import type { FanOutRequest } from './types.js'

const FENCE_LANGUAGES: Record<string, string> = {
  '.py': 'python',
  '.ts': 'typescript',
  '.tsx': 'tsx',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.json': 'json',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.rb': 'ruby',
}

const RESPONSE_CONTRACT = `{
  "analysis": "Detailed analysis of the bug",
  "root_cause": "The underlying cause of the failure",
  "proposed_fix": "Exact code changes, as a unified diff",
  "reasoning": "Why this fix resolves the failure",
  "confidence": 0.85,
  "alternative_approaches": ["Other possible fixes, if confidence is low"]
}`

function formatCodeContext(codeContext: Readonly<Record<string, string>>): string {
  const entries = Object.entries(codeContext)
  if (entries.length === 0) return '(no source files were found for this failure)'
  return entries
    .map(([path, content]) => {
      const lang = FENCE_LANGUAGES[extname(path).toLowerCase()] ?? ''
      return `File: ${path}\n\`\`\`${lang}\n${content}\n\`\`\``
    })
    .join('\n\n')
}

function formatPriorAttempts(attempts: readonly string[]): string {
  if (attempts.length === 0) return ''
  const numbered = attempts.map((attempt, i) => `Attempt ${String(i + 1)}:\n${attempt}`).join('\n\n')
  return `\n\n**Previous fix attempts that did not make the tests pass:**\n${numbered}`
}

/**
 * Build the provider-independent part of the prompt.
 */
export function buildSharedPrompt(request: FanOutRequest): string {
  return `You are a senior software engineer fixing failing tests.

**Bug Description:**
${request.bugDescription}

**Test Failures:**
${request.failureText}

**Code Context:**
${formatCodeContext(request.codeContext)}${formatPriorAttempts(request.priorFailedAttempts)}

**Your Task:**
1. Analyze the bug
2. Identify the root cause
3. Propose a specific fix with exact code changes
4. Explain your reasoning
5. Estimate your confidence (0.0 to 1.0)

**Response Format (JSON):**
${RESPONSE_CONTRACT}

Respond with the JSON object only.
`
}

/** Shared prompt plus the provider's steering clause */
export function buildProviderPrompt(sharedPrompt: string, profile: ProviderProfile): string {
  return profile.steering ? `${sharedPrompt}\n${profile.steering}` : sharedPrompt
}
