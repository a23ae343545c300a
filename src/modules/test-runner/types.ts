/**
 * Collaborator interfaces for running tests and reading source files.
 */

import type { TestOutcome } from '../../core/types.js'

/** A concrete test framework; `auto` in config resolves to one of these */
export type TestFramework = 'pytest' | 'jest' | 'vitest' | 'generic'

/**
 * Runs the test suite (or a subset of it).
 *
 * Resolves with the outcome whether tests pass or fail; rejects only when
 * the run itself could not complete.
 */
export interface TestRunner {
  run(selector?: readonly string[]): Promise<TestOutcome>
}

/**
 * Reads a source file by project-relative path.
 * Resolves `undefined` when the file does not exist or cannot be read.
 */
export interface SourceReader {
  read(path: string): Promise<string | undefined>
}
