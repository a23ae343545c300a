/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { FixQuorumConfig, PartialFixQuorumConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .fixquorum/ directory (default: <cwd>/.fixquorum) */
  projectConfigDir?: string
  /** Path to the global user-level .fixquorum/ directory (default: ~/.fixquorum) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialFixQuorumConfig
  /** Environment to read FQ_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * Return the fully-merged, validated configuration.
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): FixQuorumConfig

  /**
   * Return a single value by dot-notation key (e.g. "consensus.min_agreement").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  /**
   * Return the merged config with credential values masked.
   * Safe to display in CLI output or logs.
   */
  getMasked(): Record<string, unknown>

  readonly isLoaded: boolean
}
