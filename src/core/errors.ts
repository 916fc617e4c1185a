/**
 * Error definitions for Shipline
 * Structured error hierarchy for pipeline, VCS and code-host operations
 */

/** Base error class for all Shipline errors */
export class ShiplineError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'ShiplineError'
    this.code = code
    this.context = context
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ShiplineError)
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

/** Error thrown when a git command fails in a way the caller cannot absorb */
export class GitError extends ShiplineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'GIT_ERROR', context)
    this.name = 'GitError'
  }
}

/** Error thrown when the code-hosting API (gh) fails or returns malformed data */
export class CodeHostError extends ShiplineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CODE_HOST_ERROR', context)
    this.name = 'CodeHostError'
  }
}

/** Error thrown when configuration is invalid or cannot be loaded */
export class ConfigError extends ShiplineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a fatal precondition does not hold (not a repository, no issue) */
export class PreconditionError extends ShiplineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PRECONDITION_FAILED', context)
    this.name = 'PreconditionError'
  }
}

/** Error thrown when the AI agent process cannot be started */
export class AgentError extends ShiplineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'AGENT_ERROR', context)
    this.name = 'AgentError'
  }
}

/** Error thrown when interrupt recovery or snapshot restore fails */
export class RecoveryError extends ShiplineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RECOVERY_ERROR', context)
    this.name = 'RecoveryError'
  }
}

/** Extract a printable message from an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
