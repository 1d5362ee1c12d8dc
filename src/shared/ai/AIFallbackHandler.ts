/**
 * AI Fallback Handler - fallback move selection for the decision task.
 *
 * The protocol session must emit a `bestmove` by the deadline even when
 * the agent times out, throws, or answers with an illegal move. In those
 * cases it asks this module for a legal move chosen with a seed derived
 * from the position, so the same position always yields the same fallback.
 *
 * @module AIFallbackHandler
 */

import type { Color, Move, Position } from '../types/game';
import { isLegalMove } from '../engine/flipLogic';
import { getLegalMoves } from '../engine/moveGeneration';
import { chooseRandomMove, type LocalAIRng } from '../engine/localAIMoveSelection';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Reasons why fallback was triggered.
 */
export type FallbackReason =
  | 'search_timeout'
  | 'search_error'
  | 'no_move_returned'
  | 'move_rejected';

export interface FallbackContext {
  reason: FallbackReason;
  color: Color;
  position: Position;
  rng: LocalAIRng;
}

export interface FallbackResult {
  /** Selected move (null if the colour has no legal move) */
  move: Move | null;
  reason: FallbackReason;
  validMoveCount: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// FALLBACK SELECTION
// ═══════════════════════════════════════════════════════════════════════════

export function selectFallbackMove(context: FallbackContext): FallbackResult {
  const { position, color } = context;
  return {
    move: chooseRandomMove(position.board, color, context.rng),
    reason: context.reason,
    validMoveCount: getLegalMoves(position.board, color).length,
  };
}

/**
 * True when `move` is a legal answer for `color` on the position.
 */
export function isAcceptableMove(position: Position, color: Color, move: Move): boolean {
  return move.color === color && isLegalMove(position.board, move.square, color);
}

// ═══════════════════════════════════════════════════════════════════════════
// RNG UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create a deterministic RNG from a seed (mulberry32).
 */
export function createLocalAIRng(seed: number): LocalAIRng {
  let state = seed;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Derive a fallback seed from the position so that server restarts and
 * replays choose the same fallback move.
 */
export function deriveFallbackSeed(position: Position, color: Color, baseSeed: number = 0): number {
  const colorTerm = color === 'black' ? 1 : 2;
  return (baseSeed * 31 + colorTerm * 17 + position.history.length * 13) >>> 0;
}
