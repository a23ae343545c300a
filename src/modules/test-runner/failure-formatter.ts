import type { TestOutcome } from '../../core/types.js'

const TRACE_EXCERPT_LINES = 15

/**
 * Render failing tests as the numbered report sent to providers.
 * Never returns an empty string.
 */
export function formatFailuresForPrompt(outcome: TestOutcome): string {
  const failures = outcome.failingTests
  if (failures.length === 0) {
    return 'The test run failed but no individual test failures were reported.'
  }

  const sections = failures.map((f, i) => {
    const lines = [`${String(i + 1)}. ${f.name}${f.file ? ` (${f.file})` : ''}`, `   Kind: ${f.kind}`]
    if (f.sourceFile !== undefined) {
      const line = f.sourceLine !== undefined ? `:${String(f.sourceLine)}` : ''
      lines.push(`   Location: ${f.sourceFile}${line}`)
    }
    lines.push(`   Message: ${f.message || '(no message)'}`)
    const trace = f.trace.split('\n').slice(0, TRACE_EXCERPT_LINES)
    if (f.trace.trim().length > 0) {
      lines.push('   Trace:')
      lines.push(...trace.map((t) => `     ${t}`))
    }
    return lines.join('\n')
  })

  return `${String(failures.length)} failing test(s):\n\n${sections.join('\n\n')}`
}
