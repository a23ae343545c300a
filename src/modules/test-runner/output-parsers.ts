/**
 * Test output parsers.
 *
 * Each parser turns the combined stdout/stderr of a test command into
 * FailingTest records. Parsers never throw; unrecognised output yields an
 * empty list and the runner falls back to a generic failure.
 */

import type { FailingTest } from '../../core/types.js'
import type { TestFramework } from './types.js'

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g

const TRACE_MAX_LINES = 40

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '')
}

/** Categorise a failure message: assertion, timeout or error */
export function classifyFailure(message: string): string {
  if (/^assert\b|AssertionError|expect\(/i.test(message)) return 'assertion'
  if (/timed? ?out/i.test(message)) return 'timeout'
  return 'error'
}

function firstNonEmpty(lines: readonly string[]): string {
  for (const line of lines) {
    const trimmed = line.trim()
    if (trimmed.length > 0) return trimmed
  }
  return ''
}

function clipTrace(lines: readonly string[]): string {
  return lines.slice(0, TRACE_MAX_LINES).join('\n').trim()
}

function dedupe(failures: FailingTest[]): FailingTest[] {
  const seen = new Set<string>()
  return failures.filter((f) => {
    const key = `${f.file}::${f.name}`
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}

function withLocation(
  failure: FailingTest,
  location: { file: string; line: number } | undefined,
): FailingTest {
  if (location === undefined) return failure
  return { ...failure, sourceFile: location.file, sourceLine: location.line }
}

// ---------------------------------------------------------------------------
// pytest
// ---------------------------------------------------------------------------

const PYTEST_FAILED_LINE = /^FAILED\s+(\S+?)::(\S+)(?:\s+-\s+(.*))?$/
const PYTEST_SECTION_HEADER = /^_{3,} (.+?) _{3,}$/
const PYTEST_LOCATION = /^([^\s:]+\.py):(\d+): /

function pytestSection(lines: readonly string[], testName: string): string[] {
  const shortName = testName.split('::').pop() ?? testName
  const start = lines.findIndex((line) => {
    const header = PYTEST_SECTION_HEADER.exec(line)
    if (header === null) return false
    const title = header[1] ?? ''
    return title === shortName || title.split('.').pop() === shortName
  })
  if (start === -1) return []

  const section: string[] = []
  for (const line of lines.slice(start + 1)) {
    if (PYTEST_SECTION_HEADER.test(line) || line.startsWith('=')) break
    section.push(line)
  }
  return section
}

function lastPytestLocation(section: readonly string[]): { file: string; line: number } | undefined {
  let found: { file: string; line: number } | undefined
  for (const line of section) {
    const match = PYTEST_LOCATION.exec(line)
    if (match !== null) found = { file: match[1] ?? '', line: Number(match[2]) }
  }
  return found
}

/** Parse `FAILED file::name - message` summary lines */
export function parsePytestOutput(output: string): FailingTest[] {
  const lines = stripAnsi(output).split('\n')
  const failures: FailingTest[] = []

  for (const line of lines) {
    const match = PYTEST_FAILED_LINE.exec(line.trim())
    if (match === null) continue
    const file = match[1] ?? ''
    const name = match[2] ?? ''
    const message = (match[3] ?? '').trim()
    const section = pytestSection(lines, name)
    failures.push(
      withLocation(
        { name, file, kind: classifyFailure(message), message, trace: clipTrace(section) },
        lastPytestLocation(section),
      ),
    )
  }

  return dedupe(failures)
}

// ---------------------------------------------------------------------------
// jest
// ---------------------------------------------------------------------------

const JEST_FILE_LINE = /^\s*(FAIL|PASS)\s+(\S+)/
const JEST_BLOCK_HEADER = /^\s*● (.+?)\s*$/
const JEST_BLOCK_END = /^\s*(Test Suites:|Tests:|Snapshots:|Time:|Summary of all failing tests)/
const STACK_FRAME = /\bat (?:[^\n(]*\()?([^\s()]+):(\d+):\d+\)?/g

function firstStackFrame(lines: readonly string[]): { file: string; line: number } | undefined {
  for (const line of lines) {
    for (const match of line.matchAll(STACK_FRAME)) {
      const file = match[1] ?? ''
      if (file.includes('node_modules') || file.startsWith('node:')) continue
      return { file, line: Number(match[2]) }
    }
  }
  return undefined
}

/** Parse jest `● Suite › test` failure blocks */
export function parseJestOutput(output: string): FailingTest[] {
  const lines = stripAnsi(output).split('\n')
  const failures: FailingTest[] = []

  let currentFile = ''
  let header: string | undefined
  let block: string[] = []

  const flush = (): void => {
    if (header === undefined) return
    const message = firstNonEmpty(block)
    failures.push(
      withLocation(
        { name: header, file: currentFile, kind: classifyFailure(message), message, trace: clipTrace(block) },
        firstStackFrame(block),
      ),
    )
    header = undefined
    block = []
  }

  for (const line of lines) {
    const fileLine = JEST_FILE_LINE.exec(line)
    if (fileLine !== null) {
      flush()
      currentFile = fileLine[2] ?? ''
      continue
    }
    const blockHeader = JEST_BLOCK_HEADER.exec(line)
    if (blockHeader !== null) {
      flush()
      header = blockHeader[1]
      continue
    }
    if (JEST_BLOCK_END.test(line)) {
      flush()
      continue
    }
    if (header !== undefined) block.push(line)
  }
  flush()

  return dedupe(failures)
}

// ---------------------------------------------------------------------------
// vitest
// ---------------------------------------------------------------------------

const VITEST_FAIL_HEADER = /^\s*FAIL\s+(\S+)\s+>\s+(.+?)\s*$/
const VITEST_DIVIDER = /^\s*⎯/
const VITEST_LOCATION = /❯\s+([^\s:]+):(\d+):\d+/

/** Parse vitest `FAIL file > suite > test` failure sections */
export function parseVitestOutput(output: string): FailingTest[] {
  const lines = stripAnsi(output).split('\n')
  const failures: FailingTest[] = []

  let current: { file: string; name: string } | undefined
  let block: string[] = []

  const flush = (): void => {
    if (current === undefined) return
    const message = firstNonEmpty(block)
    let location: { file: string; line: number } | undefined
    for (const line of block) {
      const match = VITEST_LOCATION.exec(line)
      if (match !== null) {
        location = { file: match[1] ?? '', line: Number(match[2]) }
        break
      }
    }
    failures.push(
      withLocation(
        { name: current.name, file: current.file, kind: classifyFailure(message), message, trace: clipTrace(block) },
        location,
      ),
    )
    current = undefined
    block = []
  }

  for (const line of lines) {
    const header = VITEST_FAIL_HEADER.exec(line)
    if (header !== null) {
      flush()
      current = { file: header[1] ?? '', name: header[2] ?? '' }
      continue
    }
    if (VITEST_DIVIDER.test(line)) {
      flush()
      continue
    }
    if (current !== undefined) block.push(line)
  }
  flush()

  return dedupe(failures)
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

const PARSERS: Record<Exclude<TestFramework, 'generic'>, (output: string) => FailingTest[]> = {
  pytest: parsePytestOutput,
  jest: parseJestOutput,
  vitest: parseVitestOutput,
}

/**
 * Parse failures for a framework. `generic` tries every parser and keeps the
 * first non-empty result.
 */
export function parseTestOutput(framework: TestFramework, output: string): FailingTest[] {
  if (framework !== 'generic') return PARSERS[framework](output)
  for (const parse of Object.values(PARSERS)) {
    const failures = parse(output)
    if (failures.length > 0) return failures
  }
  return []
}
