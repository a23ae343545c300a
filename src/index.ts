/**
 * fixquorum - Main module exports
 * Public API surface for embedding the repair loop and its stages
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { RepairEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Configuration
export * from './modules/config/index.js'

// Provider profiles
export * from './modules/provider-registry/index.js'

// Fan-out
export * from './modules/fan-out/index.js'

// Consensus
export * from './modules/consensus/index.js'

// Test runner and fix applier
export * from './modules/test-runner/index.js'
export * from './modules/fix-applier/index.js'

// Repair loop
export * from './modules/repair-loop/index.js'

// Report rendering
export { explainDecision } from './cli/formatters/decision-formatter.js'
export { describeIteration, renderRepairSummary, renderRepairJson } from './cli/formatters/repair-formatter.js'
