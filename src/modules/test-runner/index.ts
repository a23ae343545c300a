export {
  CommandTestRunner,
  createCommandTestRunner,
  createTestRunnerFromConfig,
  genericFailure,
  DEFAULT_TEST_COMMANDS,
  DEFAULT_TEST_TIMEOUT_MS,
} from './command-test-runner.js'
export type { CommandTestRunnerOptions } from './command-test-runner.js'
export { detectTestFramework } from './framework-detection.js'
export { formatFailuresForPrompt } from './failure-formatter.js'
export { FsSourceReader, createFsSourceReader } from './fs-source-reader.js'
export {
  parsePytestOutput,
  parseJestOutput,
  parseVitestOutput,
  parseTestOutput,
  classifyFailure,
  stripAnsi,
} from './output-parsers.js'
export type { SourceReader, TestFramework, TestRunner } from './types.js'
