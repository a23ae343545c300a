/**
 * RepairLoop: the debug → fix → retest cycle.
 *
 * Per iteration:
 *  1. run the tests; a green run ends the loop
 *  2. assemble the code context for the failures
 *  3. fan out to the providers
 *  4. resolve consensus
 *  5. apply the consensus fix, if any
 *
 * Collaborators are injected; the loop owns only the run history and the
 * list of fixes already applied.
 */

import type pino from 'pino'
import type { ProviderId, ProviderResponse, TestOutcome } from '../../core/types.js'
import { ConfigError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { generateId } from '../../utils/helpers.js'
import type { ConsensusDecision, ConsensusResolver, ConsensusThresholds } from '../consensus/types.js'
import type { FanOutCoordinator } from '../fan-out/types.js'
import type { FixApplier } from '../fix-applier/types.js'
import type { ProviderRegistry } from '../provider-registry/types.js'
import { formatFailuresForPrompt } from '../test-runner/failure-formatter.js'
import type { SourceReader, TestRunner } from '../test-runner/types.js'
import { assembleContext, DEFAULT_CONTEXT_SEARCH_SETTINGS } from './context-assembler.js'
import type {
  ContextSearch,
  ContextSearchSettings,
  IterationRecord,
  RepairLoop,
  RepairRequest,
  RepairRunResult,
} from './types.js'

export const DEFAULT_MAX_ITERATIONS = 5

export const MAX_ITERATIONS_REASON = 'Maximum iterations reached without passing tests'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RepairLoopOptions {
  testRunner: TestRunner
  fanOut: FanOutCoordinator
  resolver: ConsensusResolver
  fixApplier: FixApplier
  sourceReader: SourceReader
  /** Supplies the voting weights */
  registry: ProviderRegistry
  contextSearch?: ContextSearch
  contextSettings?: Partial<ContextSearchSettings>
  /** Provider subset to ask; defaults to every registered provider */
  providers?: readonly ProviderId[]
  /** Used when the request does not set maxIterations */
  defaultMaxIterations?: number
  eventBus?: TypedEventBus
  logger?: pino.Logger
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function validateRequest(maxIterations: number, request: RepairRequest): void {
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new ConfigError(`maxIterations must be an integer >= 1, got ${String(maxIterations)}`)
  }
  if (request.minAgreement !== undefined && (!Number.isInteger(request.minAgreement) || request.minAgreement < 1)) {
    throw new ConfigError(`minAgreement must be an integer >= 1, got ${String(request.minAgreement)}`)
  }
  if (request.minConfidence !== undefined && !(request.minConfidence >= 0 && request.minConfidence <= 1)) {
    throw new ConfigError(`minConfidence must be within [0, 1], got ${String(request.minConfidence)}`)
  }
}

// ---------------------------------------------------------------------------
// RepairLoopImpl
// ---------------------------------------------------------------------------

export class RepairLoopImpl implements RepairLoop {
  private readonly _options: RepairLoopOptions
  private readonly _contextSettings: ContextSearchSettings
  private readonly _logger: pino.Logger

  constructor(options: RepairLoopOptions) {
    this._options = options
    this._contextSettings = {
      limit: options.contextSettings?.limit ?? DEFAULT_CONTEXT_SEARCH_SETTINGS.limit,
      scoreThreshold: options.contextSettings?.scoreThreshold ?? DEFAULT_CONTEXT_SEARCH_SETTINGS.scoreThreshold,
      maxFailureQueries:
        options.contextSettings?.maxFailureQueries ?? DEFAULT_CONTEXT_SEARCH_SETTINGS.maxFailureQueries,
    }
    this._logger = options.logger ?? createLogger('repair-loop')
  }

  async repair(request: RepairRequest): Promise<RepairRunResult> {
    const maxIterations = request.maxIterations ?? this._options.defaultMaxIterations ?? DEFAULT_MAX_ITERATIONS
    validateRequest(maxIterations, request)

    const overrides: Partial<ConsensusThresholds> = {
      ...(request.minConfidence !== undefined ? { minConfidence: request.minConfidence } : {}),
      ...(request.minAgreement !== undefined ? { minAgreement: request.minAgreement } : {}),
    }

    const runId = generateId('run')
    const log = childLogger(this._logger, { runId })
    const bus = this._options.eventBus
    const startedAt = Date.now()

    const history: IterationRecord[] = []
    const priorAttempts: string[] = []
    let finalTestOutcome: TestOutcome | null = null
    let success = false
    let failureReason: string | undefined

    log.info({ maxIterations, bug: request.bugDescription }, 'Repair run started')
    bus?.emit('repair:started', { runId, bugDescription: request.bugDescription, maxIterations })

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      bus?.emit('repair:iteration-started', { runId, iteration, maxIterations })

      let outcome: TestOutcome
      try {
        outcome = await this._options.testRunner.run(request.testSelector)
      } catch (err) {
        failureReason = `Exception in iteration ${String(iteration)}: ${errorMessage(err)}`
        log.error({ iteration, err }, 'Test run crashed')
        break
      }
      finalTestOutcome = outcome
      bus?.emit('repair:tests-completed', { runId, iteration, outcome })

      if (outcome.passed) {
        history.push({
          iteration,
          testOutcome: outcome,
          responses: [],
          consensus: null,
          fixApplied: false,
          fixText: '',
          timestamp: new Date().toISOString(),
        })
        success = true
        log.info({ iteration }, 'Tests passed')
        break
      }

      let responses: ProviderResponse[] = []
      let decision: ConsensusDecision | null = null
      let fixText = ''
      let fixApplied = false

      try {
        const codeContext = await assembleContext(request.bugDescription, outcome.failingTests, {
          reader: this._options.sourceReader,
          ...(this._options.contextSearch !== undefined ? { search: this._options.contextSearch } : {}),
          settings: this._contextSettings,
          logger: log,
        })

        responses = await this._options.fanOut.analyze({
          bugDescription: request.bugDescription,
          codeContext,
          failureText: formatFailuresForPrompt(outcome),
          priorFailedAttempts: [...priorAttempts],
          ...(this._options.providers !== undefined ? { providers: this._options.providers } : {}),
        })
        bus?.emit('repair:fan-out-completed', {
          runId,
          iteration,
          contextFiles: Object.keys(codeContext).length,
          succeeded: responses.filter((r) => r.error === undefined).map((r) => r.provider),
          failed: responses.filter((r) => r.error !== undefined).map((r) => r.provider),
        })

        decision = this._options.resolver.resolve(responses, this._options.registry.weights(), overrides)
        bus?.emit('repair:consensus', {
          runId,
          iteration,
          hasConsensus: decision.hasConsensus,
          confidence: decision.confidence,
          supportingProviders: [...decision.supportingProviders],
          conflicts: [...decision.conflicts],
        })

        if (decision.hasConsensus) {
          fixText = decision.chosenFix
          fixApplied = await this._options.fixApplier.apply(fixText, codeContext)
          bus?.emit('repair:fix-applied', { runId, iteration, applied: fixApplied })
          if (fixApplied) priorAttempts.push(fixText)
        } else {
          log.warn({ iteration, reasoning: decision.reasoning }, 'No consensus')
        }
      } catch (err) {
        failureReason = `Exception in iteration ${String(iteration)}: ${errorMessage(err)}`
        log.error({ iteration, err }, 'Iteration aborted')
      }

      history.push({
        iteration,
        testOutcome: outcome,
        responses,
        consensus: decision,
        fixApplied,
        fixText,
        timestamp: new Date().toISOString(),
      })
      if (failureReason !== undefined) break
    }

    if (!success && failureReason === undefined) failureReason = MAX_ITERATIONS_REASON

    const durationMs = Date.now() - startedAt
    log.info({ success, iterations: history.length, durationMs, failureReason }, 'Repair run finished')
    bus?.emit('repair:finished', {
      runId,
      success,
      iterations: history.length,
      durationMs,
      ...(failureReason !== undefined ? { failureReason } : {}),
    })

    return {
      success,
      iterations: history.length,
      maxIterations,
      finalTestOutcome,
      history,
      durationMs,
      ...(failureReason !== undefined ? { failureReason } : {}),
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createRepairLoop(options: RepairLoopOptions): RepairLoop {
  return new RepairLoopImpl(options)
}
