/**
 * ProviderRegistry: immutable id → profile lookup built once at startup.
 *
 * Profiles come either from explicit values (tests, embedding callers) or
 * from the `providers` section of the loaded configuration, where disabled
 * providers are left out.
 */

import { PROVIDER_IDS, type ProviderId } from '../../core/types.js'
import { ProviderConfigError } from '../../core/errors.js'
import { MAX_TIMEOUT_MS, type ProvidersConfig } from '../config/config-schema.js'
import type { ProviderProfile, ProviderRegistry } from './types.js'

// ---------------------------------------------------------------------------
// Steering clauses
// ---------------------------------------------------------------------------

/** Built-in focus instruction per provider */
export const DEFAULT_STEERING: Readonly<Record<ProviderId, string>> = {
  gpt4: 'Focus on architectural issues and complex logic bugs.',
  claude: 'Focus on API usage patterns and code structure.',
  qwen: 'Focus on syntax errors and quick fixes. Be concise.',
  deepseek: 'Focus on edge cases and subtle bugs.',
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateProfile(profile: ProviderProfile): void {
  if (!Number.isFinite(profile.weight) || profile.weight < 0) {
    throw new ProviderConfigError(
      `Provider "${profile.id}" has invalid weight ${String(profile.weight)}; expected a finite number >= 0`,
      { provider: profile.id, weight: profile.weight },
    )
  }
  if (!Number.isInteger(profile.timeoutMs) || profile.timeoutMs <= 0 || profile.timeoutMs > MAX_TIMEOUT_MS) {
    throw new ProviderConfigError(`Provider "${profile.id}" has invalid timeout ${String(profile.timeoutMs)}ms`, {
      provider: profile.id,
      timeoutMs: profile.timeoutMs,
    })
  }
  if (profile.credentialEnv.length === 0) {
    throw new ProviderConfigError(`Provider "${profile.id}" has no credential reference`, { provider: profile.id })
  }
}

// ---------------------------------------------------------------------------
// ProviderRegistryImpl
// ---------------------------------------------------------------------------

export class ProviderRegistryImpl implements ProviderRegistry {
  private readonly _profiles = new Map<ProviderId, ProviderProfile>()

  constructor(profiles: readonly ProviderProfile[]) {
    for (const profile of profiles) {
      if (this._profiles.has(profile.id)) {
        throw new ProviderConfigError(`Provider "${profile.id}" is registered twice`, { provider: profile.id })
      }
      validateProfile(profile)
      this._profiles.set(profile.id, Object.freeze({ ...profile }))
    }
  }

  get size(): number {
    return this._profiles.size
  }

  has(id: ProviderId): boolean {
    return this._profiles.has(id)
  }

  get(id: ProviderId): ProviderProfile {
    const profile = this._profiles.get(id)
    if (profile === undefined) {
      throw new ProviderConfigError(`Provider "${id}" is not configured`, {
        provider: id,
        configured: this.ids(),
      })
    }
    return profile
  }

  list(): readonly ProviderProfile[] {
    return this.ids().map((id) => this.get(id))
  }

  ids(): ProviderId[] {
    return PROVIDER_IDS.filter((id) => this._profiles.has(id))
  }

  weights(): Partial<Record<ProviderId, number>> {
    const result: Partial<Record<ProviderId, number>> = {}
    for (const [id, profile] of this._profiles) {
      result[id] = profile.weight
    }
    return result
  }
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

/**
 * Build a registry from explicit profiles.
 * @throws {ProviderConfigError} on duplicate ids or invalid values
 */
export function createProviderRegistry(profiles: readonly ProviderProfile[]): ProviderRegistry {
  return new ProviderRegistryImpl(profiles)
}

/**
 * Build a registry from the `providers` config section. Disabled providers
 * are skipped; `only`, when given, narrows the set further.
 * @throws {ProviderConfigError} when `only` names a disabled provider
 */
export function providerRegistryFromConfig(
  providers: ProvidersConfig,
  only?: readonly ProviderId[],
): ProviderRegistry {
  const disabled = (only ?? []).filter((id) => !providers[id].enabled)
  if (disabled.length > 0) {
    throw new ProviderConfigError(`Requested provider(s) not enabled: ${disabled.join(', ')}`, {
      requested: only,
      disabled,
    })
  }

  const profiles: ProviderProfile[] = []
  for (const id of PROVIDER_IDS) {
    const cfg = providers[id]
    if (!cfg.enabled) continue
    if (only !== undefined && !only.includes(id)) continue
    profiles.push({
      id,
      model: cfg.model,
      weight: cfg.weight,
      timeoutMs: cfg.timeout_ms,
      maxOutputTokens: cfg.max_output_tokens,
      endpoint: cfg.endpoint,
      apiStyle: cfg.api_style,
      credentialEnv: cfg.credential_env,
      steering: cfg.steering ?? DEFAULT_STEERING[id],
    })
  }
  return createProviderRegistry(profiles)
}
