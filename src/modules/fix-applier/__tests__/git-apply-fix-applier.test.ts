/**
 * Tests for GitApplyFixApplier and DryRunFixApplier.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'

const mockRunProcess = vi.fn()

vi.mock('../../../utils/process.js', () => ({
  runProcess: (...args: unknown[]) => mockRunProcess(...args),
}))

import { DryRunFixApplier, GitApplyFixApplier, stripCodeFence } from '../git-apply-fix-applier.js'
import { FixApplyError } from '../../../core/errors.js'
import { createLogger } from '../../../utils/logger.js'

const logger = createLogger('fix-applier-test', { level: 'silent', pretty: false })

const DIFF = [
  '--- a/calc.py',
  '+++ b/calc.py',
  '@@ -1,2 +1,2 @@',
  ' def add(a, b):',
  '-    return a - b',
  '+    return a + b',
].join('\n')

beforeEach(() => {
  vi.clearAllMocks()
})

describe('stripCodeFence', () => {
  it('unwraps a fenced diff', () => {
    expect(stripCodeFence('```diff\n' + DIFF + '\n```')).toBe(`${DIFF}\n`)
  })

  it('leaves unfenced text alone apart from the trailing newline', () => {
    expect(stripCodeFence(DIFF)).toBe(`${DIFF}\n`)
    expect(stripCodeFence(`${DIFF}\n`)).toBe(`${DIFF}\n`)
  })
})

describe('GitApplyFixApplier', () => {
  const applier = new GitApplyFixApplier({ projectRoot: '/proj', logger })

  it('pipes the patch to git apply and reports success', async () => {
    mockRunProcess.mockResolvedValue({ code: 0, stdout: '', stderr: '', timedOut: false })

    await expect(applier.apply('```diff\n' + DIFF + '\n```', { 'calc.py': '' })).resolves.toBe(true)
    expect(mockRunProcess).toHaveBeenCalledWith('git', ['apply', '--whitespace=nowarn', '-'], {
      cwd: '/proj',
      input: `${DIFF}\n`,
    })
  })

  it('returns false when git rejects the patch', async () => {
    mockRunProcess.mockResolvedValue({ code: 1, stdout: '', stderr: 'error: corrupt patch', timedOut: false })
    await expect(applier.apply('add a null check', {})).resolves.toBe(false)
  })

  it('does not run git for an empty fix', async () => {
    await expect(applier.apply('```\n```', {})).resolves.toBe(false)
    expect(mockRunProcess).not.toHaveBeenCalled()
  })

  it('throws FixApplyError when git cannot run', async () => {
    mockRunProcess.mockRejectedValue(new Error('spawn git ENOENT'))
    await expect(applier.apply(DIFF, {})).rejects.toThrow(FixApplyError)
  })
})

describe('DryRunFixApplier', () => {
  it('records fixes and never applies them', async () => {
    const applier = new DryRunFixApplier()
    await expect(applier.apply('fix one')).resolves.toBe(false)
    await expect(applier.apply('fix two')).resolves.toBe(false)
    expect(applier.recorded).toEqual(['fix one', 'fix two'])
  })
})
