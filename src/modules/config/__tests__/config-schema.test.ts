/**
 * Unit tests for config-schema.ts
 *
 * Validates that:
 *  - FixQuorumConfigSchema accepts the defaults and rejects bad values
 *  - ProviderConfigSchema validates all fields
 *  - PartialFixQuorumConfigSchema accepts partial configs
 */

import { describe, it, expect } from 'vitest'
import {
  FixQuorumConfigSchema,
  ProviderConfigSchema,
  PartialFixQuorumConfigSchema,
  ConsensusConfigSchema,
  RepairConfigSchema,
} from '../config-schema.js'
import { DEFAULT_CONFIG, DEFAULT_CLAUDE_PROVIDER, DEFAULT_REPAIR_CONFIG } from '../defaults.js'

// ---------------------------------------------------------------------------
// FixQuorumConfigSchema
// ---------------------------------------------------------------------------

describe('FixQuorumConfigSchema', () => {
  it('accepts the built-in default config', () => {
    expect(FixQuorumConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('requires config_format_version', () => {
    const { config_format_version: _, ...rest } = DEFAULT_CONFIG
    expect(FixQuorumConfigSchema.safeParse(rest).success).toBe(false)
  })

  it('rejects unknown config_format_version', () => {
    const cfg = { ...DEFAULT_CONFIG, config_format_version: '99' }
    expect(FixQuorumConfigSchema.safeParse(cfg).success).toBe(false)
  })

  it('rejects unknown top-level keys', () => {
    const cfg = { ...DEFAULT_CONFIG, extra: true }
    expect(FixQuorumConfigSchema.safeParse(cfg).success).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// ProviderConfigSchema
// ---------------------------------------------------------------------------

describe('ProviderConfigSchema', () => {
  it('accepts a default provider profile', () => {
    expect(ProviderConfigSchema.safeParse(DEFAULT_CLAUDE_PROVIDER).success).toBe(true)
  })

  it('rejects a negative weight', () => {
    const result = ProviderConfigSchema.safeParse({ ...DEFAULT_CLAUDE_PROVIDER, weight: -0.1 })
    expect(result.success).toBe(false)
  })

  it('rejects an unknown api_style', () => {
    const result = ProviderConfigSchema.safeParse({ ...DEFAULT_CLAUDE_PROVIDER, api_style: 'grpc' })
    expect(result.success).toBe(false)
  })

  it('rejects a non-url endpoint', () => {
    const result = ProviderConfigSchema.safeParse({ ...DEFAULT_CLAUDE_PROVIDER, endpoint: 'not a url' })
    expect(result.success).toBe(false)
  })

  it('accepts an optional steering clause', () => {
    const result = ProviderConfigSchema.safeParse({ ...DEFAULT_CLAUDE_PROVIDER, steering: 'Be brief.' })
    expect(result.success).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// Section schemas
// ---------------------------------------------------------------------------

describe('ConsensusConfigSchema', () => {
  it('rejects min_confidence above 1', () => {
    const result = ConsensusConfigSchema.safeParse({ ...DEFAULT_CONFIG.consensus, min_confidence: 1.5 })
    expect(result.success).toBe(false)
  })

  it('rejects min_agreement of 0', () => {
    const result = ConsensusConfigSchema.safeParse({ ...DEFAULT_CONFIG.consensus, min_agreement: 0 })
    expect(result.success).toBe(false)
  })
})

describe('RepairConfigSchema', () => {
  it('accepts an explicit test command', () => {
    const result = RepairConfigSchema.safeParse({ ...DEFAULT_REPAIR_CONFIG, test_command: ['pytest', '-x'] })
    expect(result.success).toBe(true)
  })

  it('rejects an empty test command', () => {
    const result = RepairConfigSchema.safeParse({ ...DEFAULT_REPAIR_CONFIG, test_command: [] })
    expect(result.success).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// PartialFixQuorumConfigSchema
// ---------------------------------------------------------------------------

describe('PartialFixQuorumConfigSchema', () => {
  it('accepts an empty object', () => {
    expect(PartialFixQuorumConfigSchema.safeParse({}).success).toBe(true)
  })

  it('accepts a single provider field', () => {
    const result = PartialFixQuorumConfigSchema.safeParse({ providers: { qwen: { enabled: false } } })
    expect(result.success).toBe(true)
  })

  it('accepts a partial context_search section', () => {
    const result = PartialFixQuorumConfigSchema.safeParse({ repair: { context_search: { limit: 3 } } })
    expect(result.success).toBe(true)
  })

  it('rejects an unknown provider id', () => {
    const result = PartialFixQuorumConfigSchema.safeParse({ providers: { gemini: { enabled: true } } })
    expect(result.success).toBe(false)
  })
})
