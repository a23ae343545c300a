/**
 * CommandTestRunner: runs the project's test command in a child process and
 * parses its output into a TestOutcome.
 *
 * Exit code 0 means the suite passed. A non-zero exit is a failing run even
 * when nothing could be parsed; a process that cannot start or overruns its
 * timeout is a crash and throws TestRunnerError.
 */

import type pino from 'pino'
import type { FailingTest, TestOutcome } from '../../core/types.js'
import { TestRunnerError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { runProcess } from '../../utils/process.js'
import type { ProcessResult } from '../../utils/process.js'
import type { RepairConfig } from '../config/config-schema.js'
import { detectTestFramework } from './framework-detection.js'
import { parseTestOutput, stripAnsi } from './output-parsers.js'
import type { TestFramework, TestRunner } from './types.js'

export const DEFAULT_TEST_COMMANDS: Readonly<Record<TestFramework, readonly string[]>> = {
  pytest: ['pytest', '-v'],
  jest: ['npx', 'jest'],
  vitest: ['npx', 'vitest', 'run'],
  generic: ['npm', 'test'],
}

export const DEFAULT_TEST_TIMEOUT_MS = 120_000

const OUTPUT_TAIL_LINES = 50

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface CommandTestRunnerOptions {
  projectRoot: string
  framework: TestFramework
  /** argv; defaults to the framework's default command */
  command?: readonly string[]
  timeoutMs?: number
  logger?: pino.Logger
}

/** One failure standing in for a failing run whose output could not be parsed */
export function genericFailure(code: number | null, output: string): FailingTest {
  const tail = stripAnsi(output).trimEnd().split('\n').slice(-OUTPUT_TAIL_LINES).join('\n')
  return {
    name: 'test suite',
    file: '',
    kind: 'error',
    message: `Test command exited with code ${code === null ? 'null' : String(code)}`,
    trace: tail,
  }
}

// ---------------------------------------------------------------------------
// CommandTestRunner
// ---------------------------------------------------------------------------

export class CommandTestRunner implements TestRunner {
  private readonly _projectRoot: string
  private readonly _framework: TestFramework
  private readonly _command: readonly string[]
  private readonly _usesDefaultCommand: boolean
  private readonly _timeoutMs: number
  private readonly _logger: pino.Logger

  constructor(options: CommandTestRunnerOptions) {
    this._projectRoot = options.projectRoot
    this._framework = options.framework
    this._command = options.command ?? DEFAULT_TEST_COMMANDS[options.framework]
    this._usesDefaultCommand = options.command === undefined
    this._timeoutMs = options.timeoutMs ?? DEFAULT_TEST_TIMEOUT_MS
    this._logger = options.logger ?? createLogger('test-runner')

    if (this._command.length === 0) {
      throw new TestRunnerError('Test command must not be empty')
    }
  }

  get framework(): TestFramework {
    return this._framework
  }

  /** Full argv for a run, selector included */
  argv(selector: readonly string[] = []): string[] {
    if (selector.length === 0) return [...this._command]
    // npm needs `--` to forward arguments to the test script
    const separator = this._framework === 'generic' && this._usesDefaultCommand ? ['--'] : []
    return [...this._command, ...separator, ...selector]
  }

  async run(selector: readonly string[] = []): Promise<TestOutcome> {
    const [command, ...args] = this.argv(selector)
    if (command === undefined) {
      throw new TestRunnerError('Test command must not be empty')
    }
    const commandLine = [command, ...args].join(' ')
    this._logger.debug({ command: commandLine, cwd: this._projectRoot }, 'Running tests')

    let result: ProcessResult
    try {
      result = await runProcess(command, args, { cwd: this._projectRoot, timeoutMs: this._timeoutMs })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new TestRunnerError(`Failed to start test command "${commandLine}": ${message}`, {
        command: commandLine,
      })
    }

    if (result.timedOut) {
      throw new TestRunnerError(`Test command timed out after ${String(this._timeoutMs)}ms`, {
        command: commandLine,
        timeoutMs: this._timeoutMs,
      })
    }

    if (result.code === 0) {
      this._logger.info({ command: commandLine }, 'Tests passed')
      return { passed: true, failingTests: [] }
    }

    const output = `${result.stdout}\n${result.stderr}`
    const parsed = parseTestOutput(this._framework, output)
    const failingTests = parsed.length > 0 ? parsed : [genericFailure(result.code, output)]
    this._logger.info({ command: commandLine, exitCode: result.code, failures: failingTests.length }, 'Tests failed')
    return { passed: false, failingTests }
  }
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

export function createCommandTestRunner(options: CommandTestRunnerOptions): CommandTestRunner {
  return new CommandTestRunner(options)
}

/**
 * Build a runner from the `repair` config section, detecting the framework
 * when it is set to `auto`.
 */
export async function createTestRunnerFromConfig(
  repair: RepairConfig,
  projectRoot: string,
  logger?: pino.Logger,
): Promise<CommandTestRunner> {
  const framework =
    repair.test_framework === 'auto' ? await detectTestFramework(projectRoot) : repair.test_framework
  return new CommandTestRunner({
    projectRoot,
    framework,
    ...(repair.test_command !== undefined ? { command: repair.test_command } : {}),
    timeoutMs: repair.test_timeout_ms,
    ...(logger !== undefined ? { logger } : {}),
  })
}
