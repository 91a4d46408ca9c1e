/**
 * Program Domain Errors - Structured error types for hosts of state programs
 *
 * The replicated core (state machines, programs, adapters, replay) is
 * infallible by contract and defines no errors. Everything that can fail lives
 * around it: admitting transitions into the ordered stream, looking up
 * sessions, receiving the replicated stream on a follower, and loading
 * configuration. Those collaborators throw the errors defined here.
 *
 * Error Categories:
 * - **Session Errors**: unknown, duplicate, closed or too many sessions
 * - **Transition Errors**: refused at admission, malformed on the wire
 * - **Replication Errors**: gaps or foreign envelopes in a follower's stream
 * - **Internal Errors**: a program broke its contract, bad configuration
 *
 * Usage:
 * ```typescript
 * import { ProgramError, ProgramErrorCode, SessionNotFoundError } from './ProgramDomainErrors';
 *
 * throw new SessionNotFoundError('room-42');
 *
 * if (error instanceof ProgramError) {
 *   console.log(error.code, error.context);
 * }
 * ```
 *
 * @module ProgramDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error codes are prefixed by category:
 * - SESSION_*: session lifecycle errors
 * - TRANSITION_*: admission and wire validation errors
 * - REPLICATION_*: follower stream errors
 */
export enum ProgramErrorCode {
  // Session Errors
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  SESSION_ALREADY_EXISTS = 'SESSION_ALREADY_EXISTS',
  SESSION_CLOSED = 'SESSION_CLOSED',
  SESSION_LIMIT_REACHED = 'SESSION_LIMIT_REACHED',

  // Transition Errors
  TRANSITION_REJECTED = 'TRANSITION_REJECTED',
  TRANSITION_MALFORMED = 'TRANSITION_MALFORMED',

  // Replication Errors
  REPLICATION_GAP = 'REPLICATION_GAP',
  REPLICATION_SESSION_MISMATCH = 'REPLICATION_SESSION_MISMATCH',

  // Internal Errors
  PROGRAM_INVARIANT_VIOLATED = 'PROGRAM_INVARIANT_VIOLATED',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all program host errors.
 */
export class ProgramError extends Error {
  /** Error code for programmatic handling */
  readonly code: ProgramErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether this error is fatal (the session cannot continue) */
  readonly isFatal: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: ProgramErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'ProgramError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, ProgramError.prototype);
  }

  /** Serialize to a JSON-safe object for transports and logs */
  toJSON(): ProgramErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /** Create from a JSON representation */
  static fromJSON(json: ProgramErrorJSON): ProgramError {
    const code = isProgramErrorCode(json.code) ? json.code : ProgramErrorCode.INTERNAL_ERROR;
    return new ProgramError(code, json.message, json.context, json.isFatal);
  }
}

/**
 * JSON representation of a ProgramError.
 */
export interface ProgramErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

function isProgramErrorCode(code: string): code is ProgramErrorCode {
  return Object.values(ProgramErrorCode).some((value) => value === code);
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

export class SessionNotFoundError extends ProgramError {
  constructor(sessionId: string, context: Record<string, unknown> = {}) {
    super(
      ProgramErrorCode.SESSION_NOT_FOUND,
      `Session not found: ${sessionId}`,
      { sessionId, ...context },
      false
    );
    this.name = 'SessionNotFoundError';
    Object.setPrototypeOf(this, SessionNotFoundError.prototype);
  }
}

export class SessionAlreadyExistsError extends ProgramError {
  constructor(sessionId: string, context: Record<string, unknown> = {}) {
    super(
      ProgramErrorCode.SESSION_ALREADY_EXISTS,
      `Session already exists: ${sessionId}`,
      { sessionId, ...context },
      false
    );
    this.name = 'SessionAlreadyExistsError';
    Object.setPrototypeOf(this, SessionAlreadyExistsError.prototype);
  }
}

/**
 * Error when a transition is submitted to a session that was closed.
 */
export class SessionClosedError extends ProgramError {
  constructor(sessionId: string, status: string, context: Record<string, unknown> = {}) {
    super(
      ProgramErrorCode.SESSION_CLOSED,
      `Session ${sessionId} is not accepting transitions (status: ${status})`,
      { sessionId, status, ...context },
      false
    );
    this.name = 'SessionClosedError';
    Object.setPrototypeOf(this, SessionClosedError.prototype);
  }
}

export class SessionLimitReachedError extends ProgramError {
  constructor(limit: number, context: Record<string, unknown> = {}) {
    super(
      ProgramErrorCode.SESSION_LIMIT_REACHED,
      `Session limit of ${limit} reached`,
      { limit, ...context },
      false
    );
    this.name = 'SessionLimitReachedError';
    Object.setPrototypeOf(this, SessionLimitReachedError.prototype);
  }
}

/**
 * Error when a transition is refused before it enters the ordered stream.
 */
export class TransitionRejectedError extends ProgramError {
  constructor(sessionId: string, reason: string, context: Record<string, unknown> = {}) {
    super(
      ProgramErrorCode.TRANSITION_REJECTED,
      `Transition rejected for session ${sessionId}: ${reason}`,
      { sessionId, reason, ...context },
      false
    );
    this.name = 'TransitionRejectedError';
    Object.setPrototypeOf(this, TransitionRejectedError.prototype);
  }
}

/**
 * Error when wire input does not describe a valid event.
 */
export class MalformedTransitionError extends ProgramError {
  constructor(issues: Array<{ path: string; message: string }>, context: Record<string, unknown> = {}) {
    const summary = issues.map((issue) => `${issue.path || 'root'}: ${issue.message}`).join('; ');
    super(
      ProgramErrorCode.TRANSITION_MALFORMED,
      `Malformed transition event: ${summary}`,
      { issues, ...context },
      false
    );
    this.name = 'MalformedTransitionError';
    Object.setPrototypeOf(this, MalformedTransitionError.prototype);
  }
}

/**
 * Error when a follower receives an event beyond the next expected sequence
 * number; applying it would skip events and diverge from the other replicas.
 */
export class ReplicationGapError extends ProgramError {
  constructor(
    sessionId: string,
    expectedSeq: number,
    receivedSeq: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      ProgramErrorCode.REPLICATION_GAP,
      `Replication gap in session ${sessionId}: expected seq ${expectedSeq}, received ${receivedSeq}`,
      { sessionId, expectedSeq, receivedSeq, ...context },
      false
    );
    this.name = 'ReplicationGapError';
    Object.setPrototypeOf(this, ReplicationGapError.prototype);
  }
}

export class ReplicationSessionMismatchError extends ProgramError {
  constructor(expectedSessionId: string, receivedSessionId: string, context: Record<string, unknown> = {}) {
    super(
      ProgramErrorCode.REPLICATION_SESSION_MISMATCH,
      `Replica of session ${expectedSessionId} received an event for session ${receivedSessionId}`,
      { expectedSessionId, receivedSessionId, ...context },
      false
    );
    this.name = 'ReplicationSessionMismatchError';
    Object.setPrototypeOf(this, ReplicationSessionMismatchError.prototype);
  }
}

/**
 * Error when a program breaks its contract (for example `apply` threw). The
 * session's state can no longer be trusted to match its replicas.
 */
export class ProgramInvariantError extends ProgramError {
  constructor(sessionId: string, detail: string, context: Record<string, unknown> = {}) {
    super(
      ProgramErrorCode.PROGRAM_INVARIANT_VIOLATED,
      `Program invariant violated in session ${sessionId}: ${detail}`,
      { sessionId, detail, ...context },
      true
    );
    this.name = 'ProgramInvariantError';
    Object.setPrototypeOf(this, ProgramInvariantError.prototype);
  }
}

export class ConfigurationError extends ProgramError {
  constructor(issues: Array<{ path: string; message: string }>, context: Record<string, unknown> = {}) {
    const summary = issues.map((issue) => `${issue.path || 'root'}: ${issue.message}`).join('; ');
    super(
      ProgramErrorCode.CONFIGURATION_ERROR,
      `Invalid configuration: ${summary}`,
      { issues, ...context },
      true
    );
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isProgramError(error: unknown): error is ProgramError {
  return error instanceof ProgramError;
}

export function isFatalError(error: unknown): boolean {
  return isProgramError(error) && error.isFatal;
}

/**
 * Wrap an unknown error in a ProgramError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): ProgramError {
  if (isProgramError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new ProgramError(ProgramErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
