/**
 * Credential masking utilities for CLI output and Pino logger redaction.
 *
 * Keeps provider API keys out of logs, stored provider error messages and
 * `config show` output.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify API key values.
 * Used by the string-scrubbing function.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // OpenAI / OpenRouter: sk-... / sk-or-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Bearer tokens echoed back in error bodies
  /Bearer\s+[A-Za-z0-9._-]{16,}/g,
]

/**
 * Known Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  'credential',
  '*.apiKey',
  '*.api_key',
  '*.credential',
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known API key patterns in a string with `***`.
 *
 * This is a best-effort scrub for log messages and error strings; it does
 * NOT guarantee removal of every possible secret format.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

/**
 * Credential field names that should be replaced with `***` in displayed output.
 * `credential_env` only names an environment variable and stays visible.
 */
const CREDENTIAL_FIELDS = new Set(['api_key', 'apiKey', 'credential', 'token', 'secret', 'password'])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 *
 * Only operates on plain objects and arrays; primitives are returned as-is.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
