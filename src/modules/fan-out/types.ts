/**
 * Types for the provider fan-out coordinator.
 */

import type { ProviderId, ProviderResponse } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

/**
 * One "ask every provider" call.
 */
export interface FanOutRequest {
  readonly bugDescription: string
  /** File path → file content; may be empty */
  readonly codeContext: Readonly<Record<string, string>>
  /** Formatted failure report; must be non-empty */
  readonly failureText: string
  /** Fixes already applied without turning the tests green, oldest first */
  readonly priorFailedAttempts: readonly string[]
  /** Subset of providers to ask; defaults to every registered provider */
  readonly providers?: readonly ProviderId[]
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface TransportRequest {
  readonly endpoint: string
  readonly headers: Readonly<Record<string, string>>
  readonly body: unknown
}

export interface TransportResponse {
  readonly status: number
  /** Raw response body text */
  readonly body: string
}

/**
 * Posts one JSON request. Network failures reject; HTTP error statuses resolve.
 * Implementations must stop work when `signal` aborts.
 */
export interface ProviderTransport {
  post(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse>
}

// ---------------------------------------------------------------------------
// Parsed payload and call outcomes
// ---------------------------------------------------------------------------

/** The structured fix proposal decoded from a provider's completion text */
export interface StructuredFix {
  readonly analysis: string
  readonly rootCause: string
  readonly proposedFix: string
  readonly reasoning: string
  /** Already clamped into [0, 1] */
  readonly confidence: number
  readonly alternativeApproaches: readonly string[]
}

/**
 * Result of a single provider call before it is collapsed into a
 * ProviderResponse.
 */
export type ProviderCallOutcome =
  | { readonly kind: 'success'; readonly fix: StructuredFix; readonly latencyMs: number }
  | { readonly kind: 'parse_error'; readonly rawText: string; readonly message: string; readonly latencyMs: number }
  /** The HTTP body was not a usable API envelope; nothing is salvaged */
  | { readonly kind: 'envelope_error'; readonly message: string; readonly latencyMs: number }
  | { readonly kind: 'timeout'; readonly timeoutMs: number; readonly latencyMs: number }
  | { readonly kind: 'transport_error'; readonly message: string; readonly latencyMs: number }
  | { readonly kind: 'http_error'; readonly status: number; readonly bodyExcerpt: string; readonly latencyMs: number }
  | { readonly kind: 'missing_credential'; readonly credentialEnv: string }

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export interface FanOutCoordinator {
  /**
   * Ask every selected provider concurrently and return one response per
   * provider, in selection order. Provider failures are reported inside the
   * responses; only request and configuration errors reject.
   *
   * @throws {InvalidRequestError} when `failureText` is empty
   * @throws {ProviderConfigError} when the provider selection is empty or unknown
   */
  analyze(request: FanOutRequest): Promise<ProviderResponse[]>
}
