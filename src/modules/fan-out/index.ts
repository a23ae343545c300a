export {
  FanOutCoordinatorImpl,
  createFanOutCoordinator,
  toProviderResponse,
  SALVAGED_CONFIDENCE,
} from './fan-out-coordinator.js'
export type { FanOutCoordinatorOptions } from './fan-out-coordinator.js'
export { FetchProviderTransport, createFetchTransport } from './provider-transport.js'
export { buildSharedPrompt, buildProviderPrompt } from './prompt-builder.js'
export { parseStructuredResponse, extractBalancedObject, clampConfidence } from './response-parser.js'
export { buildWireRequest, extractCompletionText } from './wire-formats.js'
export type {
  FanOutCoordinator,
  FanOutRequest,
  ProviderCallOutcome,
  ProviderTransport,
  StructuredFix,
  TransportRequest,
  TransportResponse,
} from './types.js'
