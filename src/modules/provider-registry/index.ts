export {
  ProviderRegistryImpl,
  createProviderRegistry,
  providerRegistryFromConfig,
  DEFAULT_STEERING,
} from './provider-registry.js'
export type { ProviderProfile, ProviderRegistry } from './types.js'
