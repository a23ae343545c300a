/**
 * FanOutCoordinator: asks every selected provider for a fix proposal at once.
 *
 * Each call runs as its own task with its own deadline. Tasks never reject:
 * every failure mode becomes a tagged ProviderCallOutcome, and outcomes are
 * collapsed into uniform ProviderResponse records only when the batch is
 * returned.
 */

import type pino from 'pino'
import type { ProviderId, ProviderResponse } from '../../core/types.js'
import { InvalidRequestError, ProviderConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { DeadlineExceededError, isAbortError, withDeadline } from '../../utils/helpers.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import type { ProviderProfile, ProviderRegistry } from '../provider-registry/types.js'
import { buildProviderPrompt, buildSharedPrompt } from './prompt-builder.js'
import { parseStructuredResponse } from './response-parser.js'
import { buildWireRequest, extractCompletionText } from './wire-formats.js'
import type {
  FanOutCoordinator,
  FanOutRequest,
  ProviderCallOutcome,
  ProviderTransport,
} from './types.js'

/** Confidence assigned to salvaged free-text answers */
export const SALVAGED_CONFIDENCE = 0.3

const BODY_EXCERPT_LENGTH = 500

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface FanOutCoordinatorOptions {
  registry: ProviderRegistry
  transport: ProviderTransport
  /** Where credentials are looked up (default: process.env) */
  env?: NodeJS.ProcessEnv
  logger?: pino.Logger
}

// ---------------------------------------------------------------------------
// Outcome → response
// ---------------------------------------------------------------------------

function emptyResponse(provider: ProviderId, latencyMs: number): ProviderResponse {
  return {
    provider,
    analysis: '',
    proposedFix: '',
    confidence: 0,
    reasoning: '',
    salvaged: false,
    alternativeApproaches: [],
    latencyMs,
  }
}

/**
 * Collapse a tagged call outcome into the uniform response record.
 */
export function toProviderResponse(provider: ProviderId, outcome: ProviderCallOutcome): ProviderResponse {
  switch (outcome.kind) {
    case 'success':
      return {
        provider,
        analysis: outcome.fix.analysis,
        proposedFix: outcome.fix.proposedFix,
        confidence: outcome.fix.confidence,
        reasoning: outcome.fix.reasoning,
        salvaged: false,
        rootCause: outcome.fix.rootCause,
        alternativeApproaches: outcome.fix.alternativeApproaches,
        latencyMs: outcome.latencyMs,
      }
    case 'parse_error':
      return {
        ...emptyResponse(provider, outcome.latencyMs),
        analysis: outcome.rawText,
        confidence: SALVAGED_CONFIDENCE,
        reasoning: 'Failed to parse structured response',
        error: `JSON parse error: ${outcome.message}`,
        errorKind: 'parse',
        salvaged: true,
      }
    case 'envelope_error':
      return {
        ...emptyResponse(provider, outcome.latencyMs),
        error: outcome.message,
        errorKind: 'parse',
      }
    case 'timeout':
      return {
        ...emptyResponse(provider, outcome.latencyMs),
        error: `Timeout after ${String(outcome.timeoutMs)}ms`,
        errorKind: 'timeout',
      }
    case 'transport_error':
      return {
        ...emptyResponse(provider, outcome.latencyMs),
        error: maskSecrets(outcome.message),
        errorKind: 'transport',
      }
    case 'http_error':
      return {
        ...emptyResponse(provider, outcome.latencyMs),
        error: maskSecrets(`API error ${String(outcome.status)}: ${outcome.bodyExcerpt}`),
        errorKind: 'http_status',
      }
    case 'missing_credential':
      return {
        ...emptyResponse(provider, 0),
        error: `API key not found for ${provider} (set ${outcome.credentialEnv})`,
        errorKind: 'missing_credential',
      }
  }
}

// ---------------------------------------------------------------------------
// FanOutCoordinatorImpl
// ---------------------------------------------------------------------------

export class FanOutCoordinatorImpl implements FanOutCoordinator {
  private readonly _registry: ProviderRegistry
  private readonly _transport: ProviderTransport
  private readonly _env: NodeJS.ProcessEnv
  private readonly _logger: pino.Logger

  constructor(options: FanOutCoordinatorOptions) {
    this._registry = options.registry
    this._transport = options.transport
    this._env = options.env ?? process.env
    this._logger = options.logger ?? createLogger('fan-out')
  }

  async analyze(request: FanOutRequest): Promise<ProviderResponse[]> {
    if (request.failureText.trim().length === 0) {
      throw new InvalidRequestError('failureText must not be empty')
    }
    const profiles = this._selectProfiles(request.providers)

    const sharedPrompt = buildSharedPrompt(request)
    const outcomes = await Promise.all(
      profiles.map((profile) => this._callProvider(profile, buildProviderPrompt(sharedPrompt, profile))),
    )

    const responses = profiles.map((profile, i) => {
      const outcome: ProviderCallOutcome = outcomes[i] ?? {
        kind: 'transport_error',
        message: 'No outcome recorded',
        latencyMs: 0,
      }
      return toProviderResponse(profile.id, outcome)
    })

    this._logger.info(
      {
        providers: profiles.map((p) => p.id),
        failed: responses.filter((r) => r.error !== undefined).map((r) => r.provider),
      },
      'Fan-out completed',
    )
    return responses
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _selectProfiles(requested: readonly ProviderId[] | undefined): ProviderProfile[] {
    if (this._registry.size === 0) {
      throw new ProviderConfigError('No providers are configured')
    }
    if (requested === undefined) {
      return [...this._registry.list()]
    }
    if (requested.length === 0) {
      throw new ProviderConfigError('Provider selection is empty')
    }
    const unique = requested.filter((id, i) => requested.indexOf(id) === i)
    return unique.map((id) => this._registry.get(id))
  }

  private async _callProvider(profile: ProviderProfile, prompt: string): Promise<ProviderCallOutcome> {
    const apiKey = this._env[profile.credentialEnv]
    if (apiKey === undefined || apiKey.length === 0) {
      this._logger.warn({ provider: profile.id, credentialEnv: profile.credentialEnv }, 'Provider credential missing')
      return { kind: 'missing_credential', credentialEnv: profile.credentialEnv }
    }

    const startedAt = Date.now()
    const elapsed = (): number => Date.now() - startedAt

    try {
      const wire = buildWireRequest(profile, prompt, apiKey)
      this._logger.debug({ provider: profile.id, model: profile.model }, 'Calling provider')

      const res = await withDeadline((signal) => this._transport.post(wire, signal), profile.timeoutMs)

      if (res.status < 200 || res.status >= 300) {
        this._logger.warn({ provider: profile.id, status: res.status }, 'Provider returned an error status')
        return {
          kind: 'http_error',
          status: res.status,
          bodyExcerpt: res.body.slice(0, BODY_EXCERPT_LENGTH),
          latencyMs: elapsed(),
        }
      }

      let envelope: unknown
      try {
        envelope = JSON.parse(res.body)
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        this._logger.warn({ provider: profile.id, error: message }, 'Provider returned an undecodable envelope')
        return { kind: 'envelope_error', message: `Invalid response envelope: ${message}`, latencyMs: elapsed() }
      }

      const text = extractCompletionText(profile.apiStyle, envelope)
      if (text === undefined) {
        return { kind: 'envelope_error', message: 'Response envelope has no completion text', latencyMs: elapsed() }
      }

      const parsed = parseStructuredResponse(text)
      if (!parsed.ok) {
        this._logger.warn({ provider: profile.id, error: parsed.message }, 'Could not decode structured response')
        return { kind: 'parse_error', rawText: text, message: parsed.message, latencyMs: elapsed() }
      }
      return { kind: 'success', fix: parsed.fix, latencyMs: elapsed() }
    } catch (err) {
      if (err instanceof DeadlineExceededError || isAbortError(err)) {
        this._logger.warn({ provider: profile.id, timeoutMs: profile.timeoutMs }, 'Provider call timed out')
        return { kind: 'timeout', timeoutMs: profile.timeoutMs, latencyMs: elapsed() }
      }
      const message = err instanceof Error ? err.message : String(err)
      this._logger.warn({ provider: profile.id, error: maskSecrets(message) }, 'Provider call failed')
      return { kind: 'transport_error', message, latencyMs: elapsed() }
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createFanOutCoordinator(options: FanOutCoordinatorOptions): FanOutCoordinator {
  return new FanOutCoordinatorImpl(options)
}
