#!/usr/bin/env node
/**
 * fixquorum CLI - Main entry point
 * Provides the `fixquorum` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerRepairCommand } from './commands/repair.js'
import { registerResolveCommand } from './commands/resolve.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli', { stderr: true })

const PACKAGE_NAME = 'fixquorum'

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
})

/** Resolve the package.json version relative to this file */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // Run from dist/cli or src/cli
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    try {
      const pkg = PackageJsonSchema.parse(JSON.parse(await readFile(pkgPath, 'utf-8')))
      if (pkg.name === PACKAGE_NAME && pkg.version !== undefined) return pkg.version
    } catch (err) {
      logger.debug({ err, pkgPath }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name(PACKAGE_NAME)
    .description('Repair failing tests with fixes several LLM providers agree on')
    .version(version, '-v, --version', 'Output the current version')

  registerRepairCommand(program)
  registerResolveCommand(program)
  registerConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
