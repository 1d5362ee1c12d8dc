/**
 * Shared Errors Module
 *
 * Structured error types for the rules engine and protocol session.
 *
 * @module errors
 */

export {
  // Error codes
  EngineErrorCode,
  type InvalidMoveSequenceReason,
  // Base class
  EngineError,
  type EngineErrorJSON,
  // Specific errors
  MalformedMessageError,
  OutOfOrderMessageError,
  InvalidMoveSequenceError,
  ProtocolMismatchError,
  IllegalMoveError,
  SearchTimeoutError,
  PeerError,
  type PeerErrorCode,
  ConfigurationError,
  // Utilities
  isEngineError,
  wrapError,
} from './EngineDomainErrors';
