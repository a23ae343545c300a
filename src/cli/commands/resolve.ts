/**
 * `fixquorum resolve` command
 *
 * Runs the consensus resolver over a recorded set of provider responses and
 * prints the decision. Useful for replaying a fan-out offline and for
 * experimenting with thresholds.
 *
 * Usage:
 *   fixquorum resolve responses.json
 *   fixquorum resolve responses.json --min-confidence 0.6 --output-format json
 */

import { readFile } from 'node:fs/promises'
import type { Command } from 'commander'
import { z } from 'zod'
import { PROVIDER_IDS } from '../../core/types.js'
import type { ProviderId, ProviderResponse } from '../../core/types.js'
import { isUsageError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { PartialFixQuorumConfig } from '../../modules/config/config-schema.js'
import { providerRegistryFromConfig } from '../../modules/provider-registry/provider-registry.js'
import { createConsensusResolver, thresholdsFromConfig } from '../../modules/consensus/consensus-resolver.js'
import type { ProviderWeights } from '../../modules/consensus/types.js'
import { createLogger } from '../../utils/logger.js'
import { explainDecision } from '../formatters/decision-formatter.js'
import { parseChoice, parseFloatOption, parseIntOption } from '../utils/options.js'

const logger = createLogger('resolve-cmd', { stderr: true })

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RESOLVE_EXIT_CONSENSUS = 0
export const RESOLVE_EXIT_NO_CONSENSUS = 1
export const RESOLVE_EXIT_INVALID = 2

export type ResolveOutputFormat = 'human' | 'json'

// ---------------------------------------------------------------------------
// Input schema
// ---------------------------------------------------------------------------

export const RecordedResponseSchema = z.object({
  provider: z.enum(PROVIDER_IDS),
  proposedFix: z.string().default(''),
  confidence: z.number().min(0).max(1),
  analysis: z.string().default(''),
  reasoning: z.string().default(''),
  error: z.string().optional(),
  rootCause: z.string().optional(),
  alternativeApproaches: z.array(z.string()).default([]),
  /** Overrides the configured weight of this provider */
  weight: z.number().min(0).optional(),
})

export const RecordedResponsesSchema = z.array(RecordedResponseSchema)

export type RecordedResponse = z.infer<typeof RecordedResponseSchema>

/**
 * Convert recorded entries into provider responses plus the weight table.
 * Configured weights apply unless an entry carries its own; the last entry
 * naming a weight for a provider wins.
 */
export function toResolverInput(
  entries: readonly RecordedResponse[],
  configuredWeights: ProviderWeights,
): { responses: ProviderResponse[]; weights: Partial<Record<ProviderId, number>> } {
  const weights: Partial<Record<ProviderId, number>> = { ...configuredWeights }
  const responses = entries.map((entry): ProviderResponse => {
    if (entry.weight !== undefined) weights[entry.provider] = entry.weight
    return {
      provider: entry.provider,
      analysis: entry.analysis,
      proposedFix: entry.proposedFix,
      confidence: entry.confidence,
      reasoning: entry.reasoning,
      ...(entry.error !== undefined && { error: entry.error }),
      ...(entry.rootCause !== undefined && { rootCause: entry.rootCause }),
      salvaged: false,
      alternativeApproaches: entry.alternativeApproaches,
      latencyMs: 0,
    }
  })
  return { responses, weights }
}

// ---------------------------------------------------------------------------
// Action
// ---------------------------------------------------------------------------

export interface ResolveActionOptions {
  responsesPath: string
  minConfidence?: number
  minAgreement?: number
  similarityThreshold?: number
  outputFormat?: ResolveOutputFormat
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

export async function runResolveAction(opts: ResolveActionOptions): Promise<number> {
  let raw: unknown
  try {
    const text = await readFile(opts.responsesPath, 'utf-8')
    raw = JSON.parse(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`  Error: cannot read responses from ${opts.responsesPath}: ${message}\n`)
    return RESOLVE_EXIT_INVALID
  }

  const parsed = RecordedResponsesSchema.safeParse(raw)
  if (!parsed.success) {
    process.stderr.write(`  Error: invalid responses file: ${formatIssues(parsed.error)}\n`)
    return RESOLVE_EXIT_INVALID
  }

  const cliOverrides: PartialFixQuorumConfig = {
    consensus: {
      ...(opts.minConfidence !== undefined && { min_confidence: opts.minConfidence }),
      ...(opts.minAgreement !== undefined && { min_agreement: opts.minAgreement }),
      ...(opts.similarityThreshold !== undefined && { similarity_threshold: opts.similarityThreshold }),
    },
  }

  const system = createConfigSystem({
    cliOverrides,
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
    const config = system.getConfig()
    const resolverLogger = createLogger('consensus', { level: config.global.log_level, stderr: true })
    const resolver = createConsensusResolver({
      thresholds: thresholdsFromConfig(config.consensus),
      logger: resolverLogger,
    })
    const registry = providerRegistryFromConfig(config.providers)
    const { responses, weights } = toResolverInput(parsed.data, registry.weights())
    const decision = resolver.resolve(responses, weights)

    if (opts.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(decision, null, 2) + '\n')
    } else {
      process.stdout.write(explainDecision(decision) + '\n')
    }
    return decision.hasConsensus ? RESOLVE_EXIT_CONSENSUS : RESOLVE_EXIT_NO_CONSENSUS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    if (isUsageError(err)) {
      process.stderr.write(`  Configuration error: ${message}\n`)
      return RESOLVE_EXIT_INVALID
    }
    logger.error({ err }, 'resolve failed')
    process.stderr.write(`  Error: ${message}\n`)
    return RESOLVE_EXIT_INVALID
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerResolveCommand(program: Command): void {
  program
    .command('resolve <responses>')
    .description('Resolve consensus over a JSON file of recorded provider responses')
    .option('--min-confidence <x>', 'Minimum weighted confidence (0-1)', parseFloatOption)
    .option('--min-agreement <n>', 'Minimum number of agreeing providers', parseIntOption)
    .option('--similarity <x>', 'Similarity threshold for grouping fixes (0-1)', parseFloatOption)
    .option(
      '--output-format <format>',
      'Output format: human (default) or json',
      parseChoice<ResolveOutputFormat>(['human', 'json']),
      'human',
    )
    .option('--project-config-dir <dir>', 'Path to project .fixquorum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .fixquorum/ directory')
    .action(
      async (
        responsesPath: string,
        opts: {
          minConfidence?: number
          minAgreement?: number
          similarity?: number
          outputFormat: ResolveOutputFormat
          projectConfigDir?: string
          globalConfigDir?: string
        },
      ) => {
        const exitCode = await runResolveAction({
          responsesPath,
          outputFormat: opts.outputFormat,
          ...(opts.minConfidence !== undefined && { minConfidence: opts.minConfidence }),
          ...(opts.minAgreement !== undefined && { minAgreement: opts.minAgreement }),
          ...(opts.similarity !== undefined && { similarityThreshold: opts.similarity }),
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.exit(exitCode)
      },
    )
}
