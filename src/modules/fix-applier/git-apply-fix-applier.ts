/**
 * GitApplyFixApplier: hands a consensus fix to `git apply`.
 *
 * The fix text is expected to be a unified diff, optionally wrapped in a
 * markdown code fence. Turning free-form fixes into edits is out of scope:
 * anything `git apply` rejects counts as not applied.
 */

import type pino from 'pino'
import { FixApplyError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { runProcess } from '../../utils/process.js'
import type { ProcessResult } from '../../utils/process.js'
import type { FixApplier } from './types.js'

export const GIT_APPLY_ARGS = ['apply', '--whitespace=nowarn', '-'] as const

const FENCED = /^\s*```[\w+-]*[ \t]*\n([\s\S]*?)\n?```\s*$/

/** Remove one surrounding markdown code fence and ensure a trailing newline */
export function stripCodeFence(text: string): string {
  const match = FENCED.exec(text)
  const body = match !== null ? (match[1] ?? '') : text
  return body.endsWith('\n') ? body : `${body}\n`
}

export interface GitApplyFixApplierOptions {
  projectRoot: string
  logger?: pino.Logger
}

export class GitApplyFixApplier implements FixApplier {
  private readonly _projectRoot: string
  private readonly _logger: pino.Logger

  constructor(options: GitApplyFixApplierOptions) {
    this._projectRoot = options.projectRoot
    this._logger = options.logger ?? createLogger('fix-applier')
  }

  async apply(fixText: string, targetContext: Readonly<Record<string, string>>): Promise<boolean> {
    const patch = stripCodeFence(fixText)
    if (patch.trim().length === 0) {
      this._logger.warn('Empty fix, nothing to apply')
      return false
    }

    let result: ProcessResult
    try {
      result = await runProcess('git', GIT_APPLY_ARGS, { cwd: this._projectRoot, input: patch })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new FixApplyError(`Failed to run git apply: ${message}`, { projectRoot: this._projectRoot })
    }

    if (result.code !== 0) {
      this._logger.warn(
        { exitCode: result.code, stderr: result.stderr.trim(), contextFiles: Object.keys(targetContext) },
        'git apply rejected the fix',
      )
      return false
    }

    this._logger.info({ contextFiles: Object.keys(targetContext).length }, 'Fix applied')
    return true
  }
}

/**
 * Records the chosen fix without touching the working tree; every fix
 * counts as not applied.
 */
export class DryRunFixApplier implements FixApplier {
  private readonly _recorded: string[] = []

  get recorded(): readonly string[] {
    return this._recorded
  }

  apply(fixText: string): Promise<boolean> {
    this._recorded.push(fixText)
    return Promise.resolve(false)
  }
}

export function createGitApplyFixApplier(options: GitApplyFixApplierOptions): FixApplier {
  return new GitApplyFixApplier(options)
}

export function createDryRunFixApplier(): DryRunFixApplier {
  return new DryRunFixApplier()
}
