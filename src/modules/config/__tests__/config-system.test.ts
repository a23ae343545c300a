/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - getMasked() output
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { createConfigSystem, deepMerge, readEnvOverrides } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `fixquorum-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.fixquorum')
  globalConfigDir = join(testDir, 'global', '.fixquorum')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function createSystem(overrides: ConfigSystemOptions = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns default config when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.config_format_version).toBe('1')
    expect(config.consensus.min_confidence).toBe(0.6)
    expect(config.consensus.min_agreement).toBe(2)
    expect(config.consensus.similarity_threshold).toBe(0.7)
    expect(config.repair.max_iterations).toBe(5)
    expect(config.providers.qwen.weight).toBe(0.7)
  })

  it('throws ConfigError if getConfig called before load', () => {
    const system = createSystem()
    expect(() => system.getConfig()).toThrow(ConfigError)
  })

  it('isLoaded flips to true after load', async () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    await system.load()
    expect(system.isLoaded).toBe(true)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('global config overrides defaults', async () => {
    await writeYaml(globalConfigDir, 'consensus:\n  min_agreement: 3\n')

    const system = createSystem()
    await system.load()
    expect(system.getConfig().consensus.min_agreement).toBe(3)
  })

  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'consensus:\n  min_agreement: 3\n')
    await writeYaml(projectConfigDir, 'consensus:\n  min_agreement: 1\n')

    const system = createSystem()
    await system.load()
    expect(system.getConfig().consensus.min_agreement).toBe(1)
  })

  it('env var overrides project config', async () => {
    await writeYaml(projectConfigDir, 'repair:\n  max_iterations: 7\n')

    const system = createSystem({ env: { FQ_MAX_ITERATIONS: '2' } })
    await system.load()
    expect(system.getConfig().repair.max_iterations).toBe(2)
  })

  it('CLI overrides take highest priority', async () => {
    await writeYaml(projectConfigDir, 'consensus:\n  min_confidence: 0.5\n')

    const system = createSystem({
      env: { FQ_MIN_CONFIDENCE: '0.65' },
      cliOverrides: { consensus: { min_confidence: 0.9 } },
    })
    await system.load()
    expect(system.getConfig().consensus.min_confidence).toBe(0.9)
  })

  it('merges a single provider field without losing the rest of the profile', async () => {
    await writeYaml(projectConfigDir, ['providers:', '  deepseek:', '    weight: 0.95'].join('\n') + '\n')

    const system = createSystem()
    await system.load()
    const deepseek = system.getConfig().providers.deepseek
    expect(deepseek.weight).toBe(0.95)
    expect(deepseek.model).toBe('deepseek/deepseek-r1')
    expect(deepseek.credential_env).toBe('OPENROUTER_API_KEY')
  })

  it('merges a nested context_search field', async () => {
    await writeYaml(projectConfigDir, ['repair:', '  context_search:', '    limit: 2'].join('\n') + '\n')

    const system = createSystem()
    await system.load()
    expect(system.getConfig().repair.context_search).toEqual({
      limit: 2,
      score_threshold: 0.7,
      max_failure_queries: 3,
    })
  })
})

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation errors', () => {
  it('throws ConfigError for an invalid log_level', async () => {
    await writeYaml(projectConfigDir, 'global:\n  log_level: INVALID\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('throws ConfigError for an out-of-range min_confidence', async () => {
    await writeYaml(projectConfigDir, 'consensus:\n  min_confidence: 1.2\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('throws ConfigError for a provider timeout beyond the timer limit', async () => {
    await writeYaml(projectConfigDir, 'providers:\n  qwen:\n    timeout_ms: 2147483648\n')
    await expect(createSystem().load()).rejects.toThrow(/providers\.qwen\.timeout_ms/)
  })

  it('throws ConfigError for malformed YAML', async () => {
    await writeYaml(projectConfigDir, 'consensus: [unterminated\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigError)
  })

  it('throws ConfigIncompatibleFormatError for an unsupported format version', async () => {
    await writeYaml(projectConfigDir, 'config_format_version: "9"\n')
    await expect(createSystem().load()).rejects.toThrow(ConfigIncompatibleFormatError)
  })
})

// ---------------------------------------------------------------------------
// get() / getMasked()
// ---------------------------------------------------------------------------

describe('ConfigSystem - accessors', () => {
  it('get() resolves dot-notation keys', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('config_format_version')).toBe('1')
    expect(system.get('providers.claude.api_style')).toBe('anthropic')
    expect(system.get('providers.claude.nonExistentKey')).toBeUndefined()
  })

  it('getMasked() keeps credential_env names visible', async () => {
    const system = createSystem()
    await system.load()
    const masked = system.getMasked()
    expect(masked['config_format_version']).toBe('1')
    expect(system.get('providers.gpt4.credential_env')).toBe('OPENAI_API_KEY')
    expect(JSON.stringify(masked)).toContain('"credential_env":"OPENAI_API_KEY"')
  })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    const merged = deepMerge({ a: { b: 1, c: [1, 2] }, d: 'x' }, { a: { c: [3] }, e: undefined })
    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: 'x' })
  })
})

describe('readEnvOverrides', () => {
  it('coerces booleans and numbers', () => {
    expect(
      readEnvOverrides({ FQ_QWEN_ENABLED: 'false', FQ_MIN_AGREEMENT: '3', FQ_SIMILARITY_THRESHOLD: '0.8' }),
    ).toEqual({
      providers: { qwen: { enabled: false } },
      consensus: { min_agreement: 3, similarity_threshold: 0.8 },
    })
  })

  it('ignores invalid overrides', () => {
    expect(readEnvOverrides({ FQ_LOG_LEVEL: 'loud' })).toEqual({})
  })

  it('keeps valid overrides beside an invalid one', () => {
    expect(readEnvOverrides({ FQ_MIN_CONFIDENCE: '1.5', FQ_GPT4_ENABLED: 'false' })).toEqual({
      providers: { gpt4: { enabled: false } },
    })
  })
})
