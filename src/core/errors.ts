/**
 * Error definitions for fixquorum
 * Provides structured error hierarchy for configuration and collaborator failures
 */

/** Base error class for all fixquorum errors */
export class FixQuorumError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'FixQuorumError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FixQuorumError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends FixQuorumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends FixQuorumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}

/**
 * Error thrown when the provider set or weight map cannot be used.
 * Raised before any network call is made.
 */
export class ProviderConfigError extends FixQuorumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PROVIDER_CONFIG_ERROR', context)
    this.name = 'ProviderConfigError'
  }
}

/** Error thrown when a fan-out request is malformed (e.g. empty failure text) */
export class InvalidRequestError extends FixQuorumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_REQUEST', context)
    this.name = 'InvalidRequestError'
  }
}

/** Error thrown when the test runner crashes (not when tests fail) */
export class TestRunnerError extends FixQuorumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'TEST_RUNNER_ERROR', context)
    this.name = 'TestRunnerError'
  }
}

/** Error thrown when a fix applier cannot run at all */
export class FixApplyError extends FixQuorumError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'FIX_APPLY_ERROR', context)
    this.name = 'FixApplyError'
  }
}

/**
 * True for errors caused by configuration or invocation rather than by a
 * collaborator at run time. The CLI maps these to its usage exit code.
 */
export function isUsageError(err: unknown): boolean {
  return (
    err instanceof ConfigError ||
    err instanceof ConfigIncompatibleFormatError ||
    err instanceof ProviderConfigError ||
    err instanceof InvalidRequestError
  )
}
