export type ErrorCode =
  | 'configuration'
  | 'retrieval_failed'
  | 'model_call_failed'
  | 'summarization_failed'
  | 'concurrency_conflict'
  | 'invalid_request'
  | 'identity_mismatch'
  | 'session_closed'

/**
 * Base class for every failure the daemon reports with a stable code.
 * Anything that is not an AttuneError is reported as `internal`.
 */
export abstract class AttuneError extends Error {
  abstract readonly code: ErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Bad or incomplete runtime configuration. Recovered locally by falling back to defaults. */
export class ConfigurationError extends AttuneError {
  readonly code = 'configuration'
}

/** Knowledge retrieval failed or timed out. The turn continues without sources. */
export class RetrievalError extends AttuneError {
  readonly code = 'retrieval_failed'
  readonly timedOut: boolean

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, options)
    this.timedOut = options?.timedOut ?? false
  }
}

/** The primary model call failed. The turn is aborted and nothing is persisted. */
export class ModelCallError extends AttuneError {
  readonly code = 'model_call_failed'
  readonly timedOut: boolean

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, options)
    this.timedOut = options?.timedOut ?? false
  }
}

/** Condensation or the summary commit failed. Session memory is left as it was. */
export class SummarizationError extends AttuneError {
  readonly code = 'summarization_failed'
  readonly timedOut: boolean

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, options)
    this.timedOut = options?.timedOut ?? false
  }
}

/** Two writers raced on the same record; the loser may retry. */
export class ConcurrencyConflict extends AttuneError {
  readonly code = 'concurrency_conflict'
}

export class InvalidRequestError extends AttuneError {
  readonly code = 'invalid_request'
}

/** A session key was presented with a user key that does not own it. */
export class IdentityMismatchError extends AttuneError {
  readonly code = 'identity_mismatch'
}

/** The session was expired and cannot take new turns. */
export class SessionClosedError extends AttuneError {
  readonly code = 'session_closed'
}

export function errorMessage(e: unknown, fallback: string): string {
  return e instanceof Error ? e.message : fallback
}
