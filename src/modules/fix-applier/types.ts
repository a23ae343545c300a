/**
 * Fix applier interface.
 */

/**
 * Applies a consensus fix to the working tree.
 *
 * Resolves `true` when the fix was applied, `false` when it was rejected.
 * Rejects only when the applier itself failed to run.
 */
export interface FixApplier {
  apply(fixText: string, targetContext: Readonly<Record<string, string>>): Promise<boolean>
}
