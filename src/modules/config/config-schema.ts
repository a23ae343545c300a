/**
 * Zod validation schemas for the fixquorum configuration system.
 *
 * Defines schemas for all config sections:
 *  - provider profiles (gpt4, claude, qwen, deepseek)
 *  - global settings
 *  - consensus thresholds
 *  - repair loop settings
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Provider-level schema
// ---------------------------------------------------------------------------

/** Longest delay `setTimeout` honours; larger values fire at once */
export const MAX_TIMEOUT_MS = 2_147_483_647

/** Wire format spoken by a provider endpoint */
export const ApiStyleSchema = z.enum(['openai', 'anthropic'])
export type ApiStyle = z.infer<typeof ApiStyleSchema>

/** Per-provider configuration */
export const ProviderConfigSchema = z
  .object({
    enabled: z.boolean(),
    model: z.string().min(1),
    /** Voting weight used by the consensus resolver */
    weight: z.number().min(0),
    timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS),
    max_output_tokens: z.number().int().positive(),
    endpoint: z.string().url(),
    api_style: ApiStyleSchema,
    /** Name of the environment variable that holds the API key */
    credential_env: z.string().min(1),
    /** Replaces the built-in steering clause appended to the prompt */
    steering: z.string().optional(),
  })
  .strict()

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>

/** Map of all known providers */
export const ProvidersSchema = z
  .object({
    gpt4: ProviderConfigSchema,
    claude: ProviderConfigSchema,
    qwen: ProviderConfigSchema,
    deepseek: ProviderConfigSchema,
  })
  .strict()

export type ProvidersConfig = z.infer<typeof ProvidersSchema>

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Consensus settings
// ---------------------------------------------------------------------------

export const ClusterOrderSchema = z.enum(['as-received', 'weight-desc'])

export const ConsensusConfigSchema = z
  .object({
    min_confidence: z.number().min(0).max(1),
    min_agreement: z.number().int().min(1),
    similarity_threshold: z.number().min(0).max(1),
    cluster_order: ClusterOrderSchema,
    /** Second-best score at or above this share of the best flags a close decision */
    close_decision_ratio: z.number().min(0).max(1),
    low_confidence_threshold: z.number().min(0).max(1),
    high_disagreement_clusters: z.number().int().min(2),
  })
  .strict()

export type ConsensusConfig = z.infer<typeof ConsensusConfigSchema>

// ---------------------------------------------------------------------------
// Repair loop settings
// ---------------------------------------------------------------------------

export const TestFrameworkSchema = z.enum(['auto', 'pytest', 'jest', 'vitest', 'generic'])
export type TestFrameworkSetting = z.infer<typeof TestFrameworkSchema>

export const ContextSearchConfigSchema = z
  .object({
    limit: z.number().int().min(1),
    score_threshold: z.number().min(0).max(1),
    /** How many failure messages join the bug description in the search query */
    max_failure_queries: z.number().int().min(0),
  })
  .strict()

export const RepairConfigSchema = z
  .object({
    max_iterations: z.number().int().min(1),
    /** Explicit test command as an argv list; overrides framework detection */
    test_command: z.array(z.string()).min(1).optional(),
    test_framework: TestFrameworkSchema,
    test_timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS),
    context_search: ContextSearchConfigSchema,
  })
  .strict()

export type RepairConfig = z.infer<typeof RepairConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this toolkit can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const FixQuorumConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    providers: ProvidersSchema,
    consensus: ConsensusConfigSchema,
    repair: RepairConfigSchema,
  })
  .strict()

export type FixQuorumConfig = z.infer<typeof FixQuorumConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files and overrides before merging)
// ---------------------------------------------------------------------------

export const PartialProviderConfigSchema = ProviderConfigSchema.partial()
export type PartialProviderConfig = z.infer<typeof PartialProviderConfigSchema>

export const PartialFixQuorumConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    providers: z
      .object({
        gpt4: PartialProviderConfigSchema.optional(),
        claude: PartialProviderConfigSchema.optional(),
        qwen: PartialProviderConfigSchema.optional(),
        deepseek: PartialProviderConfigSchema.optional(),
      })
      .strict()
      .optional(),
    consensus: ConsensusConfigSchema.partial().optional(),
    repair: RepairConfigSchema.extend({
      context_search: ContextSearchConfigSchema.partial(),
    })
      .partial()
      .optional(),
  })
  .strict()

export type PartialFixQuorumConfig = z.infer<typeof PartialFixQuorumConfigSchema>
