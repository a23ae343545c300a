/**
 * Core types for fixquorum
 * Shared type definitions used across all modules
 */

/** Identifiers of the supported LLM backends */
export const PROVIDER_IDS = ['gpt4', 'claude', 'qwen', 'deepseek'] as const

/** Unique identifier for a configured provider */
export type ProviderId = (typeof PROVIDER_IDS)[number]

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Why a provider produced no usable opinion */
export type ProviderErrorKind =
  | 'timeout'
  | 'transport'
  | 'http_status'
  | 'parse'
  | 'missing_credential'

/**
 * One provider's answer to a fan-out call.
 *
 * Failed calls still produce a response: `error` is set and `proposedFix`
 * is empty, so downstream stages treat "no opinion" uniformly.
 */
export interface ProviderResponse {
  readonly provider: ProviderId
  readonly analysis: string
  readonly proposedFix: string
  /** Provider-reported confidence, clamped to [0, 1] */
  readonly confidence: number
  readonly reasoning: string
  readonly error?: string
  readonly errorKind?: ProviderErrorKind
  /** True when the body could not be decoded and was kept as free text */
  readonly salvaged: boolean
  readonly rootCause?: string
  readonly alternativeApproaches: readonly string[]
  readonly latencyMs: number
}

/** A single failing test as reported by the test runner */
export interface FailingTest {
  readonly name: string
  readonly file: string
  /** Failure category, e.g. "assertion", "error", "timeout" */
  readonly kind: string
  readonly message: string
  readonly trace: string
  readonly sourceFile?: string
  readonly sourceLine?: number
}

/** Outcome of one test run */
export interface TestOutcome {
  readonly passed: boolean
  readonly failingTests: readonly FailingTest[]
}
