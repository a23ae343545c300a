/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge, readEnvOverrides } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  FixQuorumConfigSchema,
  PartialFixQuorumConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  FixQuorumConfig,
  PartialFixQuorumConfig,
  ProviderConfig,
  ConsensusConfig,
  RepairConfig,
  ApiStyle,
  TestFrameworkSetting,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
