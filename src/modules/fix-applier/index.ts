export {
  GitApplyFixApplier,
  DryRunFixApplier,
  createGitApplyFixApplier,
  createDryRunFixApplier,
  stripCodeFence,
  GIT_APPLY_ARGS,
} from './git-apply-fix-applier.js'
export type { GitApplyFixApplierOptions } from './git-apply-fix-applier.js'
export type { FixApplier } from './types.js'
