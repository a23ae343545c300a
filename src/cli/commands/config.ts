/**
 * `fixquorum config` command group
 *
 * Subcommands:
 *   - `fixquorum config show`  : display merged config (credentials masked)
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { isUsageError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { parseChoice } from '../utils/options.js'

const logger = createLogger('config-cmd', { stderr: true })

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

export type ConfigOutputFormat = 'yaml' | 'json'

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  outputFormat?: ConfigOutputFormat
  env?: NodeJS.ProcessEnv
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
  } catch (err) {
    if (isUsageError(err)) {
      const message = err instanceof Error ? err.message : String(err)
      process.stderr.write(`  Configuration error: ${message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }

  const masked = system.getMasked()
  const format = opts.outputFormat ?? 'yaml'

  if (format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# fixquorum configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('View fixquorum configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option(
      '--output-format <format>',
      'Output format: yaml (default) or json',
      parseChoice<ConfigOutputFormat>(['yaml', 'json']),
      'yaml',
    )
    .option('--project-config-dir <dir>', 'Path to project .fixquorum/ directory')
    .option('--global-config-dir <dir>', 'Path to global .fixquorum/ directory')
    .action(
      async (opts: { outputFormat: ConfigOutputFormat; projectConfigDir?: string; globalConfigDir?: string }) => {
        const exitCode = await runConfigShow({
          outputFormat: opts.outputFormat,
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
        process.exit(exitCode)
      },
    )
}
