/**
 * reversi_v1 session phases as an explicit state machine.
 *
 * All valid (phase, event) → nextPhase transitions are declared here;
 * anything else is an {@link OutOfOrderMessageError} and leaves the state
 * untouched. The transition function is pure: it returns the next state
 * plus the effects the host must carry out (send a line, start or cancel
 * the decision task, report an error).
 *
 *   uninitialized ──reversi_v1──▶ ready ──newgame──▶ idle
 *   idle | position_loaded | committed ──position──▶ position_loaded
 *   position_loaded ──go──▶ searching ──search_completed──▶ committed
 *   any game phase ──newgame──▶ idle        (cancels a running search)
 *   any game phase ──isready──▶ unchanged   (readyok)
 *
 * Once `bestmove` has been sent (committed) nothing can start a new search
 * until a fresh `position` or `newgame` is followed by `go`.
 *
 * @module protocolSession
 */

import type { Color, Move, Position } from '../types/game';
import type {
  ClockModel,
  EngineIdentity,
  InboundMessage,
  OutboundMessage,
  SearchSnapshot,
} from '../types/protocol';
import {
  InvalidMoveSequenceError,
  OutOfOrderMessageError,
  ProtocolMismatchError,
  type EngineError,
} from '../errors';
import { getLegalMoves } from '../engine/moveGeneration';
import { formatColor } from '../engine/notation';
import { replayTokens } from '../replay/positionReplay';
import {
  clockFromGo,
  computeDeadline,
  computeSearchBudget,
  type SearchBudgetPolicy,
} from '../protocol/clockModel';

// ═══════════════════════════════════════════════════════════════════════════
// STATES
// ═══════════════════════════════════════════════════════════════════════════

export interface UninitializedState {
  readonly phase: 'uninitialized';
}

/** Handshake done; no game yet. */
export interface ReadyState {
  readonly phase: 'ready';
}

export interface IdleState {
  readonly phase: 'idle';
  readonly color: Color;
}

export type LoadedPosition =
  | { readonly valid: true; readonly position: Position }
  | { readonly valid: false; readonly error: InvalidMoveSequenceError };

export interface PositionLoadedState {
  readonly phase: 'position_loaded';
  readonly color: Color;
  readonly loaded: LoadedPosition;
}

export interface SearchingState {
  readonly phase: 'searching';
  readonly color: Color;
  readonly position: Position;
  readonly clock: ClockModel;
  readonly searchId: number;
}

export interface CommittedState {
  readonly phase: 'committed';
  readonly color: Color;
  readonly position: Position;
  readonly bestMove: Move | null;
}

export type ProtocolSessionState =
  | UninitializedState
  | ReadyState
  | IdleState
  | PositionLoadedState
  | SearchingState
  | CommittedState;

export type SessionPhase = ProtocolSessionState['phase'];

export type GameActiveState = IdleState | PositionLoadedState | SearchingState | CommittedState;

export const initialSessionState: ProtocolSessionState = { phase: 'uninitialized' };

export function isGameActive(state: ProtocolSessionState): state is GameActiveState {
  return (
    state.phase === 'idle' ||
    state.phase === 'position_loaded' ||
    state.phase === 'searching' ||
    state.phase === 'committed'
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS & EFFECTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Internal event raised by the host when the decision task has produced
 * (or fallen back to) a move.
 */
export interface SearchCompletedEvent {
  readonly kind: 'search_completed';
  readonly searchId: number;
  readonly move: Move | null;
}

export type SessionEvent = InboundMessage | SearchCompletedEvent;

export type SessionEffect =
  | { readonly type: 'send'; readonly message: OutboundMessage }
  | { readonly type: 'start_search'; readonly snapshot: SearchSnapshot }
  | { readonly type: 'cancel_search'; readonly searchId: number }
  | { readonly type: 'report'; readonly error: EngineError };

export interface TransitionContext {
  readonly identity: EngineIdentity;
  /** Id the host will use for the next decision task. */
  readonly nextSearchId: number;
  /** Current time in epoch ms; anchors the search deadline. */
  readonly now: number;
  readonly budgetPolicy: SearchBudgetPolicy;
}

export type TransitionResult =
  | {
      readonly ok: true;
      readonly state: ProtocolSessionState;
      readonly effects: ReadonlyArray<SessionEffect>;
    }
  | { readonly ok: false; readonly error: OutOfOrderMessageError };

// ═══════════════════════════════════════════════════════════════════════════
// TRANSITION FUNCTION
// ═══════════════════════════════════════════════════════════════════════════

export function transition(
  state: ProtocolSessionState,
  event: SessionEvent,
  context: TransitionContext
): TransitionResult {
  switch (event.kind) {
    case 'reversi_v1':
      if (state.phase !== 'uninitialized') {
        return outOfOrder(state, event);
      }
      return ok({ phase: 'ready' }, [
        send({ kind: 'id', field: 'name', value: context.identity.name }),
        send({ kind: 'id', field: 'author', value: context.identity.author }),
        send({ kind: 'reversi_v1_ok' }),
      ]);

    case 'newgame': {
      if (state.phase === 'uninitialized') {
        return outOfOrder(state, event);
      }
      const effects: SessionEffect[] =
        state.phase === 'searching' ? [{ type: 'cancel_search', searchId: state.searchId }] : [];
      return ok({ phase: 'idle', color: event.color }, effects);
    }

    case 'isready':
      if (!isGameActive(state)) {
        return outOfOrder(state, event);
      }
      return ok(state, [send({ kind: 'readyok' })]);

    case 'position':
      if (state.phase !== 'idle' && state.phase !== 'position_loaded' && state.phase !== 'committed') {
        return outOfOrder(state, event);
      }
      return handlePosition(state, event.tokens);

    case 'go':
      if (state.phase !== 'position_loaded') {
        return outOfOrder(state, event);
      }
      return handleGo(state, clockFromGo(event.fields), context);

    case 'search_completed':
      // A result for a search that was canceled or superseded is dropped.
      if (state.phase !== 'searching' || state.searchId !== event.searchId) {
        return ok(state, []);
      }
      return ok(
        {
          phase: 'committed',
          color: state.color,
          position: state.position,
          bestMove: event.move,
        },
        [send({ kind: 'bestmove', move: event.move })]
      );
  }
}

function handlePosition(
  state: IdleState | PositionLoadedState | CommittedState,
  tokens: ReadonlyArray<string>
): TransitionResult {
  try {
    const position = replayTokens(tokens);
    return ok({ phase: 'position_loaded', color: state.color, loaded: { valid: true, position } }, []);
  } catch (error) {
    if (!(error instanceof InvalidMoveSequenceError)) {
      throw error;
    }
    return ok(
      { phase: 'position_loaded', color: state.color, loaded: { valid: false, error } },
      [{ type: 'report', error }]
    );
  }
}

function handleGo(
  state: PositionLoadedState,
  clock: ClockModel,
  context: TransitionContext
): TransitionResult {
  if (!state.loaded.valid) {
    // Search on an invalid position is refused until a new position arrives.
    return ok(state, [{ type: 'report', error: state.loaded.error }]);
  }

  const { position } = state.loaded;
  const effects: SessionEffect[] = [];

  if (position.sideToMove !== state.color) {
    effects.push({
      type: 'report',
      error: new ProtocolMismatchError(
        `Received go for ${state.color} but the replayed position has ${
          position.sideToMove ?? 'nobody'
        } to move`,
        {
          engineColor: formatColor(state.color),
          sideToMove: position.sideToMove,
          historyLength: position.history.length,
        }
      ),
    });
  }

  // Forced pass or finished game: commit a bare bestmove without searching.
  if (getLegalMoves(position.board, state.color).length === 0) {
    effects.push(send({ kind: 'bestmove', move: null }));
    return ok({ phase: 'committed', color: state.color, position, bestMove: null }, effects);
  }

  const budgetMs = computeSearchBudget(clock, state.color, context.budgetPolicy);
  const snapshot: SearchSnapshot = {
    searchId: context.nextSearchId,
    color: state.color,
    position,
    clock,
    budgetMs,
    deadlineAt: computeDeadline(context.now, budgetMs),
  };
  effects.push({ type: 'start_search', snapshot });

  return ok(
    {
      phase: 'searching',
      color: state.color,
      position,
      clock,
      searchId: context.nextSearchId,
    },
    effects
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function ok(state: ProtocolSessionState, effects: ReadonlyArray<SessionEffect>): TransitionResult {
  return { ok: true, state, effects };
}

function send(message: OutboundMessage): SessionEffect {
  return { type: 'send', message };
}

function outOfOrder(state: ProtocolSessionState, event: SessionEvent): TransitionResult {
  return { ok: false, error: new OutOfOrderMessageError(event.kind, state.phase) };
}
