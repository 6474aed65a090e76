/**
 * Custom error classes for the backend.
 * Provides typed errors for different failure scenarios.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when a jj invocation fails.
 */
export class VcsError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly stderr?: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'VcsError'
  }
}

/**
 * Error thrown when a revision referenced by the UI has been rewritten or
 * abandoned since the graph was loaded.
 */
export class StaleCommitError extends VcsError {
  constructor(
    public readonly commitId: string,
    operation: string,
    cause?: unknown
  ) {
    super(
      `Commit ${commitId} is no longer valid or has been rewritten/abandoned.`,
      operation,
      undefined,
      cause
    )
    this.name = 'StaleCommitError'
  }
}

/**
 * Error thrown when the working directory is not inside a jj workspace.
 */
export class NoRepositoryError extends AppError {
  constructor(public readonly path: string) {
    super(`No jj repository found at ${path}`)
    this.name = 'NoRepositoryError'
  }
}

/**
 * Error thrown when configuration values are invalid.
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Renders any thrown value as the single-line text shown to the user.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
