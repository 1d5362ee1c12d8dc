/**
 * Engine Domain Errors - Structured error types for the rules engine and
 * the reversi_v1 protocol session.
 *
 * None of these errors is fatal to the engine process. The session reports
 * them (logger + optional callback) and keeps accepting messages:
 *
 * - **Protocol errors**: unparseable lines, messages arriving in the wrong
 *   phase, UI/engine disagreement about the position.
 * - **Move errors**: an illegal move applied to a board, an invalid move
 *   list in a `position` message.
 * - **Search errors**: the decision task overran its budget.
 *
 * Usage:
 * ```typescript
 * import { InvalidMoveSequenceError, isEngineError } from './EngineDomainErrors';
 *
 * throw new InvalidMoveSequenceError('Square d4 is occupied', {
 *   moveIndex: 0,
 *   token: 'd4b',
 *   reason: 'square_occupied',
 * });
 * ```
 *
 * @module EngineDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all engine error codes.
 *
 * Error codes are prefixed by category:
 * - PROTOCOL_*: message grammar and ordering errors
 * - MOVE_*: move legality and replay errors
 * - SEARCH_*: decision task errors
 * - PEER_*: engine peers misbehaving towards the arena referee
 */
export enum EngineErrorCode {
  // Protocol Errors
  PROTOCOL_MALFORMED_MESSAGE = 'PROTOCOL_MALFORMED_MESSAGE',
  PROTOCOL_OUT_OF_ORDER = 'PROTOCOL_OUT_OF_ORDER',
  PROTOCOL_MISMATCH = 'PROTOCOL_MISMATCH',

  // Move Errors
  MOVE_ILLEGAL = 'MOVE_ILLEGAL',
  MOVE_INVALID_SEQUENCE = 'MOVE_INVALID_SEQUENCE',

  // Search Errors
  SEARCH_TIMEOUT = 'SEARCH_TIMEOUT',
  SEARCH_FAILED = 'SEARCH_FAILED',

  // Arena Errors
  PEER_TIMEOUT = 'PEER_TIMEOUT',
  PEER_CLOSED = 'PEER_CLOSED',
  PEER_UNEXPECTED_RESPONSE = 'PEER_UNEXPECTED_RESPONSE',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Why a move list in a `position` message was rejected.
 */
export type InvalidMoveSequenceReason =
  | 'malformed_token'
  | 'square_occupied'
  | 'no_flips'
  | 'wrong_color'
  | 'game_over';

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(code: EngineErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Serialize to a JSON-safe object for structured logs */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  code: EngineErrorCode;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A line that does not match the reversi_v1 grammar.
 */
export class MalformedMessageError extends EngineError {
  readonly line: string;

  constructor(line: string, detail: string, context: Record<string, unknown> = {}) {
    super(
      EngineErrorCode.PROTOCOL_MALFORMED_MESSAGE,
      `Malformed message "${line}": ${detail}`,
      { line, detail, ...context }
    );
    this.name = 'MalformedMessageError';
    this.line = line;
    Object.setPrototypeOf(this, MalformedMessageError.prototype);
  }
}

/**
 * A well-formed message that is not accepted in the current session phase.
 */
export class OutOfOrderMessageError extends EngineError {
  readonly messageKind: string;
  readonly phase: string;

  constructor(messageKind: string, phase: string, context: Record<string, unknown> = {}) {
    super(
      EngineErrorCode.PROTOCOL_OUT_OF_ORDER,
      `Message '${messageKind}' is not allowed in phase '${phase}'`,
      { messageKind, phase, ...context }
    );
    this.name = 'OutOfOrderMessageError';
    this.messageKind = messageKind;
    this.phase = phase;
    Object.setPrototypeOf(this, OutOfOrderMessageError.prototype);
  }
}

/**
 * A move list that cannot be replayed from the start position.
 */
export class InvalidMoveSequenceError extends EngineError {
  readonly moveIndex: number;
  readonly token: string;
  readonly reason: InvalidMoveSequenceReason;

  constructor(
    message: string,
    details: { moveIndex: number; token: string; reason: InvalidMoveSequenceReason },
    context: Record<string, unknown> = {}
  ) {
    super(EngineErrorCode.MOVE_INVALID_SEQUENCE, message, { ...details, ...context });
    this.name = 'InvalidMoveSequenceError';
    this.moveIndex = details.moveIndex;
    this.token = details.token;
    this.reason = details.reason;
    Object.setPrototypeOf(this, InvalidMoveSequenceError.prototype);
  }
}

/**
 * Advisory: the UI and the engine disagree about the derived position.
 */
export class ProtocolMismatchError extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(EngineErrorCode.PROTOCOL_MISMATCH, message, context);
    this.name = 'ProtocolMismatchError';
    Object.setPrototypeOf(this, ProtocolMismatchError.prototype);
  }
}

/**
 * A move applied to a board where it flips nothing or lands on a token.
 */
export class IllegalMoveError extends EngineError {
  constructor(move: string, context: Record<string, unknown> = {}) {
    super(EngineErrorCode.MOVE_ILLEGAL, `Illegal move: ${move}`, { move, ...context });
    this.name = 'IllegalMoveError';
    Object.setPrototypeOf(this, IllegalMoveError.prototype);
  }
}

/**
 * The decision task did not produce a move within its budget.
 */
export class SearchTimeoutError extends EngineError {
  constructor(budgetMs: number, context: Record<string, unknown> = {}) {
    super(EngineErrorCode.SEARCH_TIMEOUT, `Search exceeded its budget of ${budgetMs}ms`, {
      budgetMs,
      ...context,
    });
    this.name = 'SearchTimeoutError';
    Object.setPrototypeOf(this, SearchTimeoutError.prototype);
  }
}

export type PeerErrorCode =
  | EngineErrorCode.PEER_TIMEOUT
  | EngineErrorCode.PEER_CLOSED
  | EngineErrorCode.PEER_UNEXPECTED_RESPONSE;

/**
 * An engine peer did not answer, went away, or answered out of protocol.
 */
export class PeerError extends EngineError {
  readonly peer: string;

  constructor(
    code: PeerErrorCode,
    peer: string,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(code, `[${peer}] ${message}`, { peer, ...context });
    this.name = 'PeerError';
    this.peer = peer;
    Object.setPrototypeOf(this, PeerError.prototype);
  }
}

export class ConfigurationError extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(EngineErrorCode.CONFIGURATION_ERROR, message, context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Wrap an unknown error in an EngineError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(EngineErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
