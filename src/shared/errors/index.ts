/**
 * Shared Errors Module
 *
 * Structured error types thrown by the collaborators around the replicated
 * core: session drivers, follower replicas, wire validation and configuration.
 *
 * @module errors
 */

export {
  // Error codes
  ProgramErrorCode,
  // Base class
  ProgramError,
  type ProgramErrorJSON,
  // Specific errors
  SessionNotFoundError,
  SessionAlreadyExistsError,
  SessionClosedError,
  SessionLimitReachedError,
  TransitionRejectedError,
  MalformedTransitionError,
  ReplicationGapError,
  ReplicationSessionMismatchError,
  ProgramInvariantError,
  ConfigurationError,
  // Utilities
  isProgramError,
  isFatalError,
  wrapError,
} from './ProgramDomainErrors';
