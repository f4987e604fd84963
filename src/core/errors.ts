/**
 * Error definitions for gitscope
 * Provides the structured error hierarchy for every configuration operation
 */

/** Base error class for all gitscope errors */
export class GitScopeError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'GitScopeError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GitScopeError)
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

/** Error thrown when a caller passes malformed variables or names */
export class UsageError extends GitScopeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'USAGE_ERROR', context)
    this.name = 'UsageError'
  }
}

/** Error thrown when a local-scope write targets a location outside any repository */
export class NoRepositoryError extends GitScopeError {
  constructor(location: string) {
    super(`no git repository exists at ${location}`, 'NO_REPOSITORY', { location })
    this.name = 'NoRepositoryError'
  }
}

/** Error thrown when the store reports more than one value for a variable */
export class ConfigInvariantError extends GitScopeError {
  constructor(names: string[]) {
    super(
      `multi-valued config variables are not supported: ${names.join(', ')}`,
      'CONFIG_INVARIANT',
      { names }
    )
    this.name = 'ConfigInvariantError'
  }
}

/** Error thrown when a git invocation exits unsuccessfully */
export class GitCommandError extends GitScopeError {
  constructor(args: string[], exitCode: number, stderr: string) {
    super(
      `git ${args.join(' ')} failed with exit code ${String(exitCode)}${stderr ? `: ${stderr}` : ''}`,
      'GIT_COMMAND_ERROR',
      { args, exitCode, stderr }
    )
    this.name = 'GitCommandError'
  }
}

/** Error thrown when a multi-variable write fails part-way */
export class ConfigWriteError extends GitScopeError {
  public readonly applied: readonly string[]
  public readonly failed: string

  constructor(
    failed: string,
    applied: readonly string[],
    cause: unknown,
    context: Record<string, unknown> = {}
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      `failed to write ${failed}: ${reason}`,
      'CONFIG_WRITE_ERROR',
      { failed, applied: [...applied], ...context },
      { cause }
    )
    this.name = 'ConfigWriteError'
    this.applied = applied
    this.failed = failed
  }
}

/** Error thrown when the tool's own settings are invalid */
export class SettingsError extends GitScopeError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SETTINGS_ERROR', context)
    this.name = 'SettingsError'
  }
}
