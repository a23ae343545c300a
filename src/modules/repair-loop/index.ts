export {
  RepairLoopImpl,
  createRepairLoop,
  DEFAULT_MAX_ITERATIONS,
  MAX_ITERATIONS_REASON,
} from './repair-loop.js'
export type { RepairLoopOptions } from './repair-loop.js'
export { assembleContext, contextQueries, DEFAULT_CONTEXT_SEARCH_SETTINGS } from './context-assembler.js'
export type { AssembleContextOptions } from './context-assembler.js'
export type {
  ContextSearch,
  ContextSearchHit,
  ContextSearchSettings,
  IterationRecord,
  RepairLoop,
  RepairRequest,
  RepairRunResult,
} from './types.js'
