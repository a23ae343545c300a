/**
 * Tests for CommandTestRunner.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

const mockRunProcess = vi.fn()

vi.mock('../../../utils/process.js', () => ({
  runProcess: (...args: unknown[]) => mockRunProcess(...args),
}))

import { CommandTestRunner, createTestRunnerFromConfig } from '../command-test-runner.js'
import { TestRunnerError } from '../../../core/errors.js'
import { DEFAULT_REPAIR_CONFIG } from '../../config/defaults.js'
import { createLogger } from '../../../utils/logger.js'

const logger = createLogger('test-runner-test', { level: 'silent', pretty: false })

function processResult(code: number | null, stdout = '', stderr = '', timedOut = false) {
  return { code, stdout, stderr, timedOut }
}

beforeEach(() => {
  vi.clearAllMocks()
})

describe('CommandTestRunner', () => {
  it('reports a pass on exit code 0', async () => {
    mockRunProcess.mockResolvedValue(processResult(0, '2 passed'))
    const runner = new CommandTestRunner({ projectRoot: '/proj', framework: 'vitest', logger })

    await expect(runner.run(['src/a.test.ts'])).resolves.toEqual({ passed: true, failingTests: [] })
    expect(mockRunProcess).toHaveBeenCalledWith('npx', ['vitest', 'run', 'src/a.test.ts'], {
      cwd: '/proj',
      timeoutMs: 120_000,
    })
  })

  it('parses failures from a non-zero exit', async () => {
    mockRunProcess.mockResolvedValue(processResult(1, 'FAILED tests/test_calc.py::test_add - assert 3 == 4\n'))
    const runner = new CommandTestRunner({ projectRoot: '/proj', framework: 'pytest', logger })

    const outcome = await runner.run()
    expect(outcome.passed).toBe(false)
    expect(outcome.failingTests.map((f) => f.name)).toEqual(['test_add'])
  })

  it('falls back to one generic failure when nothing parses', async () => {
    mockRunProcess.mockResolvedValue(processResult(2, 'boom\n'))
    const runner = new CommandTestRunner({ projectRoot: '/proj', framework: 'pytest', logger })

    await expect(runner.run()).resolves.toEqual({
      passed: false,
      failingTests: [
        { name: 'test suite', file: '', kind: 'error', message: 'Test command exited with code 2', trace: 'boom' },
      ],
    })
  })

  it('throws TestRunnerError when the command cannot start', async () => {
    mockRunProcess.mockRejectedValue(new Error('spawn pytest ENOENT'))
    const runner = new CommandTestRunner({ projectRoot: '/proj', framework: 'pytest', logger })

    await expect(runner.run()).rejects.toThrow(TestRunnerError)
    await expect(runner.run()).rejects.toThrow('Failed to start test command "pytest -v": spawn pytest ENOENT')
  })

  it('throws TestRunnerError on timeout', async () => {
    mockRunProcess.mockResolvedValue(processResult(null, '', '', true))
    const runner = new CommandTestRunner({ projectRoot: '/proj', framework: 'jest', timeoutMs: 500, logger })

    await expect(runner.run()).rejects.toThrow('Test command timed out after 500ms')
  })

  it('forwards selectors to npm test after --', () => {
    const runner = new CommandTestRunner({ projectRoot: '/proj', framework: 'generic', logger })
    expect(runner.argv(['test/a.spec.js'])).toEqual(['npm', 'test', '--', 'test/a.spec.js'])
  })

  it('appends selectors to an explicit command as given', () => {
    const runner = new CommandTestRunner({
      projectRoot: '/proj',
      framework: 'generic',
      command: ['make', 'check'],
      logger,
    })
    expect(runner.argv(['unit'])).toEqual(['make', 'check', 'unit'])
  })

  it('rejects an empty command', () => {
    expect(() => new CommandTestRunner({ projectRoot: '/proj', framework: 'jest', command: [], logger })).toThrow(
      TestRunnerError,
    )
  })
})

describe('createTestRunnerFromConfig', () => {
  it('detects the framework when set to auto', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'fq-runner-'))
    try {
      await writeFile(join(dir, 'package.json'), JSON.stringify({ scripts: { test: 'jest --ci' } }))
      const runner = await createTestRunnerFromConfig(DEFAULT_REPAIR_CONFIG, dir, logger)
      expect(runner.framework).toBe('jest')
      expect(runner.argv()).toEqual(['npx', 'jest'])
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })

  it('uses the configured command and framework', async () => {
    const runner = await createTestRunnerFromConfig(
      { ...DEFAULT_REPAIR_CONFIG, test_framework: 'pytest', test_command: ['python', '-m', 'pytest'] },
      '/proj',
      logger,
    )
    expect(runner.framework).toBe('pytest')
    expect(runner.argv(['tests/test_calc.py'])).toEqual(['python', '-m', 'pytest', 'tests/test_calc.py'])
  })
})
