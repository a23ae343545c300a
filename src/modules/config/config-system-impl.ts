/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.fixquorum/config.yaml)
 *     → project config      (./.fixquorum/config.yaml)
 *     → environment vars    (FQ_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import {
  FixQuorumConfigSchema,
  PartialFixQuorumConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type FixQuorumConfig,
  type PartialFixQuorumConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { deepMask } from '../../cli/utils/masking.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

/**
 * Merge `override` into a copy of `base`. Nested plain objects merge key by
 * key; arrays and scalars replace; undefined values are skipped.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of FQ_ environment variable names to config paths.
 * Only overrides scalar values.
 */
const ENV_VAR_MAP: Record<string, string> = {
  FQ_LOG_LEVEL: 'global.log_level',
  FQ_MAX_ITERATIONS: 'repair.max_iterations',
  FQ_MIN_CONFIDENCE: 'consensus.min_confidence',
  FQ_MIN_AGREEMENT: 'consensus.min_agreement',
  FQ_SIMILARITY_THRESHOLD: 'consensus.similarity_threshold',
  FQ_GPT4_ENABLED: 'providers.gpt4.enabled',
  FQ_CLAUDE_ENABLED: 'providers.claude.enabled',
  FQ_QWEN_ENABLED: 'providers.qwen.enabled',
  FQ_DEEPSEEK_ENABLED: 'providers.deepseek.enabled',
}

function coerceEnvValue(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Each override is validated on its own; an invalid one is logged and
 * ignored without dropping the others.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialFixQuorumConfig {
  let valid: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue

    const overlay: Record<string, unknown> = {}
    setByPath(overlay, configPath, coerceEnvValue(rawValue))
    const check = PartialFixQuorumConfigSchema.safeParse(overlay)
    if (!check.success) {
      logger.warn({ envKey, errors: check.error.issues }, 'Invalid environment variable override ignored')
      continue
    }
    valid = deepMerge(valid, overlay)
  }

  const parsed = PartialFixQuorumConfigSchema.safeParse(valid)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation helpers
// ---------------------------------------------------------------------------

/** Get a value from a nested object using a dot-notation key */
function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/** Set `path` to `value` in place, creating intermediate objects as needed */
function setByPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.')
  let cursor = target
  for (const part of parts.slice(0, -1)) {
    const next = cursor[part]
    if (isPlainObject(next)) {
      cursor = next
    } else {
      const created: Record<string, unknown> = {}
      cursor[part] = created
      cursor = created
    }
  }
  cursor[parts[parts.length - 1] ?? ''] = value
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: FixQuorumConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialFixQuorumConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.fixquorum')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.fixquorum')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    // 1. Built-in defaults
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    // 2. Global user config, then 3. project config
    for (const dir of [this._globalConfigDir, this._projectConfigDir]) {
      const fileConfig = await this._loadYamlFile(join(dir, 'config.yaml'))
      if (fileConfig !== null) merged = deepMerge(merged, fileConfig)
    }

    // 4. Environment variable overrides
    merged = deepMerge(merged, readEnvOverrides(this._env))

    // 5. CLI flag overrides
    merged = deepMerge(merged, this._cliOverrides)

    const result = FixQuorumConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): FixQuorumConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): Record<string, unknown> {
    const masked = deepMask(this.getConfig())
    if (!isPlainObject(masked)) {
      throw new ConfigError('Masked configuration is not an object')
    }
    return masked
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialFixQuorumConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      const raw = await readFile(filePath, 'utf-8')
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file is an empty overlay
    if (parsed === null || parsed === undefined) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (typeof version === 'string' && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version)) {
        throw new ConfigIncompatibleFormatError(
          `Unsupported config_format_version "${version}" in ${filePath}. ` +
            `Supported versions: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
          { filePath, version },
        )
      }
    }

    const result = PartialFixQuorumConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
