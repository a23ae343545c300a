/**
 * `fixquorum repair` command
 *
 * Runs the iterative repair loop against the project in the current
 * directory: run the tests, ask every enabled provider for a fix, apply the
 * consensus fix with `git apply`, repeat until green or out of iterations.
 *
 * Usage:
 *   fixquorum repair --bug "add() subtracts"
 *   fixquorum repair --bug "add() subtracts" --tests tests/test_calc.py --providers gpt4,claude
 *   fixquorum repair --bug "add() subtracts" --dry-run --output-format json
 *
 * Exit codes:
 *   0 - tests pass
 *   1 - repair failed
 *   2 - usage or configuration error
 */

import { join, resolve } from 'node:path'
import type { Command } from 'commander'
import type pino from 'pino'
import type { ProviderId } from '../../core/types.js'
import { ProviderConfigError, isUsageError } from '../../core/errors.js'
import { createEventBus } from '../../core/event-bus.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialFixQuorumConfig } from '../../modules/config/config-schema.js'
import { providerRegistryFromConfig } from '../../modules/provider-registry/provider-registry.js'
import { createFanOutCoordinator } from '../../modules/fan-out/fan-out-coordinator.js'
import { createFetchTransport } from '../../modules/fan-out/provider-transport.js'
import type { ProviderTransport } from '../../modules/fan-out/types.js'
import { createConsensusResolver, thresholdsFromConfig } from '../../modules/consensus/consensus-resolver.js'
import { createTestRunnerFromConfig } from '../../modules/test-runner/command-test-runner.js'
import { createFsSourceReader } from '../../modules/test-runner/fs-source-reader.js'
import type { TestRunner } from '../../modules/test-runner/types.js'
import { createDryRunFixApplier, createGitApplyFixApplier } from '../../modules/fix-applier/git-apply-fix-applier.js'
import type { FixApplier } from '../../modules/fix-applier/types.js'
import { createRepairLoop } from '../../modules/repair-loop/repair-loop.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { renderRepairJson, renderRepairSummary } from '../formatters/repair-formatter.js'
import { parseChoice, parseFloatOption, parseIntOption, parseProviderList } from '../utils/options.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const REPAIR_EXIT_SUCCESS = 0
export const REPAIR_EXIT_FAILED = 1
export const REPAIR_EXIT_USAGE = 2

export type RepairOutputFormat = 'human' | 'json'

export const DRY_RUN_NOTE = 'Dry run: consensus fixes were not applied to the working tree.'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RepairActionOptions {
  bug: string
  tests?: string[]
  maxIterations?: number
  minConfidence?: number
  minAgreement?: number
  providers?: ProviderId[]
  dryRun?: boolean
  outputFormat?: RepairOutputFormat
  projectRoot?: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  /** Collaborator overrides; defaults are built from the loaded config */
  transport?: ProviderTransport
  testRunner?: TestRunner
  fixApplier?: FixApplier
  logger?: pino.Logger
}

// ---------------------------------------------------------------------------
// Progress output
// ---------------------------------------------------------------------------

function subscribeProgress(bus: TypedEventBus): void {
  const write = (line: string): void => {
    process.stdout.write(line + '\n')
  }
  bus.on('repair:iteration-started', ({ iteration, maxIterations }) => {
    write(`[iteration ${String(iteration)}/${String(maxIterations)}] running tests`)
  })
  bus.on('repair:tests-completed', ({ outcome }) => {
    write(outcome.passed ? '  tests passed' : `  ${String(outcome.failingTests.length)} failing test(s)`)
  })
  bus.on('repair:fan-out-completed', ({ succeeded, failed }) => {
    const answered = succeeded.length > 0 ? succeeded.join(', ') : 'none'
    write(`  providers answered: ${answered}${failed.length > 0 ? `; failed: ${failed.join(', ')}` : ''}`)
  })
  bus.on('repair:consensus', ({ hasConsensus, confidence, supportingProviders }) => {
    write(
      hasConsensus
        ? `  consensus (confidence ${confidence.toFixed(2)}) from ${supportingProviders.join(', ')}`
        : `  no consensus (confidence ${confidence.toFixed(2)})`,
    )
  })
  bus.on('repair:fix-applied', ({ applied }) => {
    write(applied ? '  fix applied' : '  fix not applied')
  })
}

// ---------------------------------------------------------------------------
// Action
// ---------------------------------------------------------------------------

export async function runRepairAction(opts: RepairActionOptions): Promise<number> {
  const bugDescription = opts.bug.trim()
  if (bugDescription === '') {
    process.stderr.write('  Error: --bug must describe the failure to repair\n')
    return REPAIR_EXIT_USAGE
  }

  const outputFormat = opts.outputFormat ?? 'human'
  const projectRoot = resolve(opts.projectRoot ?? process.cwd())
  const env = opts.env ?? process.env

  const cliOverrides: PartialFixQuorumConfig = {
    consensus: {
      ...(opts.minConfidence !== undefined && { min_confidence: opts.minConfidence }),
      ...(opts.minAgreement !== undefined && { min_agreement: opts.minAgreement }),
    },
    repair: {
      ...(opts.maxIterations !== undefined && { max_iterations: opts.maxIterations }),
    },
  }

  const system = createConfigSystem({
    projectConfigDir: opts.projectConfigDir ?? join(projectRoot, '.fixquorum'),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    cliOverrides,
    env,
  })

  let logger: pino.Logger = opts.logger ?? createLogger('repair-cmd', { stderr: true })

  try {
    await system.load()
    const config = system.getConfig()
    if (opts.logger === undefined) {
      logger = createLogger('repair-cmd', { level: config.global.log_level, stderr: true })
    }

    const registry = providerRegistryFromConfig(config.providers, opts.providers)
    if (registry.size === 0) {
      throw new ProviderConfigError('No enabled providers match the selection', {
        requested: opts.providers ?? 'all',
      })
    }

    const fanOut = createFanOutCoordinator({
      registry,
      transport: opts.transport ?? createFetchTransport(),
      env,
      logger: childLogger(logger, { component: 'fan-out' }),
    })
    const resolver = createConsensusResolver({
      thresholds: thresholdsFromConfig(config.consensus),
      logger: childLogger(logger, { component: 'consensus' }),
    })
    const testRunner =
      opts.testRunner ??
      (await createTestRunnerFromConfig(config.repair, projectRoot, childLogger(logger, { component: 'test-runner' })))
    const fixApplier =
      opts.fixApplier ??
      (opts.dryRun === true
        ? createDryRunFixApplier()
        : createGitApplyFixApplier({ projectRoot, logger: childLogger(logger, { component: 'fix-applier' }) }))

    const eventBus = createEventBus()
    if (outputFormat === 'human') subscribeProgress(eventBus)

    const loop = createRepairLoop({
      testRunner,
      fanOut,
      resolver,
      fixApplier,
      sourceReader: createFsSourceReader(projectRoot, logger),
      registry,
      contextSettings: {
        limit: config.repair.context_search.limit,
        scoreThreshold: config.repair.context_search.score_threshold,
        maxFailureQueries: config.repair.context_search.max_failure_queries,
      },
      defaultMaxIterations: config.repair.max_iterations,
      eventBus,
      logger,
    })

    const result = await loop.repair({
      bugDescription,
      ...(opts.tests !== undefined && opts.tests.length > 0 && { testSelector: opts.tests }),
    })

    if (outputFormat === 'json') {
      process.stdout.write(renderRepairJson(result) + '\n')
    } else {
      process.stdout.write('\n' + renderRepairSummary(result) + '\n')
      if (opts.dryRun === true) process.stdout.write(DRY_RUN_NOTE + '\n')
    }

    return result.success ? REPAIR_EXIT_SUCCESS : REPAIR_EXIT_FAILED
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    if (isUsageError(err)) {
      process.stderr.write(`  Configuration error: ${message}\n`)
      return REPAIR_EXIT_USAGE
    }
    logger.error({ err }, 'repair failed')
    process.stderr.write(`  Error: ${message}\n`)
    return REPAIR_EXIT_FAILED
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerRepairCommand(program: Command): void {
  program
    .command('repair')
    .description('Repair failing tests with fixes agreed on by several LLM providers')
    .requiredOption('--bug <text>', 'Description of the bug to repair')
    .option('--tests <selector...>', 'Test selector passed to the test command')
    .option('--max-iterations <n>', 'Maximum repair iterations', parseIntOption)
    .option('--min-confidence <x>', 'Minimum weighted confidence (0-1)', parseFloatOption)
    .option('--min-agreement <n>', 'Minimum number of agreeing providers', parseIntOption)
    .option('--providers <ids>', 'Comma-separated providers to ask (default: all enabled)', parseProviderList)
    .option('--dry-run', 'Resolve fixes without applying them', false)
    .option(
      '--output-format <format>',
      'Output format: human (default) or json',
      parseChoice<RepairOutputFormat>(['human', 'json']),
      'human',
    )
    .option('--project-root <dir>', 'Project directory (default: current directory)')
    .option('--project-config-dir <dir>', 'Path to project .fixquorum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .fixquorum/ directory')
    .action(
      async (opts: {
        bug: string
        tests?: string[]
        maxIterations?: number
        minConfidence?: number
        minAgreement?: number
        providers?: ProviderId[]
        dryRun: boolean
        outputFormat: RepairOutputFormat
        projectRoot?: string
        projectConfigDir?: string
        globalConfigDir?: string
      }) => {
        const exitCode = await runRepairAction(opts)
        process.exit(exitCode)
      },
    )
}
