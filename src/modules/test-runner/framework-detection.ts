/**
 * Test framework detection from project marker files.
 */

import { access, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import type { TestFramework } from './types.js'

const PYTEST_MARKERS = ['pytest.ini', 'setup.py', 'pyproject.toml'] as const

const PackageJsonScriptsSchema = z
  .object({
    scripts: z.record(z.unknown()).optional(),
  })
  .passthrough()

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

async function readTestScript(projectRoot: string): Promise<string | undefined> {
  let raw: string
  try {
    raw = await readFile(join(projectRoot, 'package.json'), 'utf-8')
  } catch {
    return undefined
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return undefined
  }

  const parsed = PackageJsonScriptsSchema.safeParse(json)
  if (!parsed.success) return undefined
  const test = parsed.data.scripts?.['test']
  return typeof test === 'string' ? test : undefined
}

/**
 * Pick the test framework for a project.
 *
 * Python marker files win; otherwise the `test` script in package.json is
 * inspected. Anything else runs as `generic` (`npm test`).
 */
export async function detectTestFramework(projectRoot: string): Promise<TestFramework> {
  for (const marker of PYTEST_MARKERS) {
    if (await exists(join(projectRoot, marker))) return 'pytest'
  }

  const script = await readTestScript(projectRoot)
  if (script === undefined) return 'generic'
  if (script.includes('vitest')) return 'vitest'
  if (script.includes('jest')) return 'jest'
  return 'generic'
}
