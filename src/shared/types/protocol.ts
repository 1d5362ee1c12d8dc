import type { Color, Move, Position } from './game';
import type { GoFields } from '../validation/protocolSchemas';

export type { GoFields } from '../validation/protocolSchemas';

/**
 * Remaining time and increment for one colour, in milliseconds.
 */
export interface ClockEntry {
  readonly remainingMs: number;
  readonly incrementMs: number;
}

/**
 * Per-colour clock values as last reported by the UI in a `go` message.
 * Pure data: nothing in the engine decrements it.
 */
export interface ClockModel {
  readonly black: ClockEntry;
  readonly white: ClockEntry;
}

/**
 * The name and author announced during the handshake.
 */
export interface EngineIdentity {
  readonly name: string;
  readonly author: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// UI → engine
// ═══════════════════════════════════════════════════════════════════════════

export type InboundMessage =
  | { readonly kind: 'reversi_v1' }
  | { readonly kind: 'newgame'; readonly color: Color }
  | { readonly kind: 'isready' }
  | {
      readonly kind: 'position';
      /** Raw move tokens after `startpos`, validated during replay. */
      readonly tokens: ReadonlyArray<string>;
    }
  | { readonly kind: 'go'; readonly fields: GoFields };

export type InboundMessageKind = InboundMessage['kind'];

// ═══════════════════════════════════════════════════════════════════════════
// engine → UI
// ═══════════════════════════════════════════════════════════════════════════

export type OutboundMessage =
  | { readonly kind: 'id'; readonly field: 'name' | 'author'; readonly value: string }
  | { readonly kind: 'reversi_v1_ok' }
  | { readonly kind: 'readyok' }
  | {
      readonly kind: 'bestmove';
      /** Null when the engine's colour has no legal move. */
      readonly move: Move | null;
    };

/**
 * Immutable input handed to the decision task. The task never sees the
 * session itself.
 */
export interface SearchSnapshot {
  readonly searchId: number;
  readonly color: Color;
  readonly position: Position;
  readonly clock: ClockModel;
  /** Time the task may spend, from the clock entry for `color`. */
  readonly budgetMs: number;
  /** Epoch ms by which a bestmove must be committed. */
  readonly deadlineAt: number;
}
