/**
 * Provider profile types.
 */

import type { ProviderId } from '../../core/types.js'
import type { ApiStyle } from '../config/config-schema.js'

/**
 * Static description of one LLM backend. Immutable once the registry is built.
 */
export interface ProviderProfile {
  readonly id: ProviderId
  readonly model: string
  /** Voting weight, typically in [0, 1] */
  readonly weight: number
  readonly timeoutMs: number
  readonly maxOutputTokens: number
  readonly endpoint: string
  readonly apiStyle: ApiStyle
  /** Name of the environment variable that holds the API key */
  readonly credentialEnv: string
  /** Provider-specific clause appended to the shared prompt */
  readonly steering: string
}

/**
 * Read-only lookup over the configured provider profiles.
 */
export interface ProviderRegistry {
  /** Number of registered profiles */
  readonly size: number

  has(id: ProviderId): boolean

  /**
   * Look up a profile by id.
   * @throws {ProviderConfigError} when the provider is not configured
   */
  get(id: ProviderId): ProviderProfile

  /** All profiles in canonical provider order */
  list(): readonly ProviderProfile[]

  /** Provider ids in canonical order */
  ids(): ProviderId[]

  /** Voting weights keyed by provider id */
  weights(): Partial<Record<ProviderId, number>>
}
