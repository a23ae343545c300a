/**
 * Built-in default values for the fixquorum configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  FixQuorumConfig,
  ProviderConfig,
  GlobalSettings,
  ConsensusConfig,
  RepairConfig,
} from './config-schema.js'

const OPENROUTER_ENDPOINT = 'https://openrouter.ai/api/v1/chat/completions'

// ---------------------------------------------------------------------------
// Per-provider defaults
// ---------------------------------------------------------------------------

export const DEFAULT_GPT4_PROVIDER: ProviderConfig = {
  enabled: true,
  model: 'gpt-4-turbo-preview',
  weight: 1.0,
  timeout_ms: 60_000,
  max_output_tokens: 4000,
  endpoint: 'https://api.openai.com/v1/chat/completions',
  api_style: 'openai',
  credential_env: 'OPENAI_API_KEY',
}

export const DEFAULT_CLAUDE_PROVIDER: ProviderConfig = {
  enabled: true,
  model: 'claude-3-5-sonnet-20241022',
  weight: 0.9,
  timeout_ms: 60_000,
  max_output_tokens: 4000,
  endpoint: 'https://api.anthropic.com/v1/messages',
  api_style: 'anthropic',
  credential_env: 'ANTHROPIC_API_KEY',
}

export const DEFAULT_QWEN_PROVIDER: ProviderConfig = {
  enabled: true,
  model: 'qwen/qwen-2.5-coder-32b-instruct',
  weight: 0.7,
  timeout_ms: 45_000,
  max_output_tokens: 3000,
  endpoint: OPENROUTER_ENDPOINT,
  api_style: 'openai',
  credential_env: 'OPENROUTER_API_KEY',
}

export const DEFAULT_DEEPSEEK_PROVIDER: ProviderConfig = {
  enabled: true,
  model: 'deepseek/deepseek-r1',
  weight: 0.8,
  timeout_ms: 45_000,
  max_output_tokens: 3000,
  endpoint: OPENROUTER_ENDPOINT,
  api_style: 'openai',
  credential_env: 'OPENROUTER_API_KEY',
}

// ---------------------------------------------------------------------------
// Section defaults
// ---------------------------------------------------------------------------

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'info',
}

export const DEFAULT_CONSENSUS_CONFIG: ConsensusConfig = {
  min_confidence: 0.6,
  min_agreement: 2,
  similarity_threshold: 0.7,
  cluster_order: 'as-received',
  close_decision_ratio: 0.8,
  low_confidence_threshold: 0.7,
  high_disagreement_clusters: 4,
}

export const DEFAULT_REPAIR_CONFIG: RepairConfig = {
  max_iterations: 5,
  test_framework: 'auto',
  test_timeout_ms: 120_000,
  context_search: {
    limit: 5,
    score_threshold: 0.7,
    max_failure_queries: 3,
  },
}

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: FixQuorumConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  providers: {
    gpt4: DEFAULT_GPT4_PROVIDER,
    claude: DEFAULT_CLAUDE_PROVIDER,
    qwen: DEFAULT_QWEN_PROVIDER,
    deepseek: DEFAULT_DEEPSEEK_PROVIDER,
  },
  consensus: DEFAULT_CONSENSUS_CONFIG,
  repair: DEFAULT_REPAIR_CONFIG,
}
