/**
 * Test Fixtures and Utilities
 * Common test data and helper functions for engine and protocol tests
 */

import fc from 'fast-check';
import type { Board, Color, Move, Position, Square } from '../../src/shared/types/game';
import { boardFromRows } from '../../src/shared/engine/board';
import { getLegalMoves } from '../../src/shared/engine/moveGeneration';
import { formatSquare, parseMoveToken, parseSquare } from '../../src/shared/engine/notation';
import { createStartPosition, playMove } from '../../src/shared/replay/positionReplay';

/**
 * Square from algebraic text; throws on bad input so fixtures fail loudly.
 */
export function sq(text: string): Square {
  const square = parseSquare(text);
  if (!square) {
    throw new Error(`Bad square fixture "${text}"`);
  }
  return square;
}

export function mv(token: string): Move {
  const move = parseMoveToken(token);
  if (!move) {
    throw new Error(`Bad move fixture "${token}"`);
  }
  return move;
}

export function names(squares: ReadonlyArray<Square>): string[] {
  return squares.map(formatSquare);
}

/**
 * Board from rank lines, rank 8 first (as printed on a diagram).
 */
export function diagram(...ranksTopDown: string[]): Board {
  return boardFromRows([...ranksTopDown].reverse());
}

export function positionOf(board: Board, sideToMove: Color | null): Position {
  return { board, history: [], sideToMove, passes: [] };
}

/**
 * Run `fn` and return what it threw (undefined when it returned).
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/** Black's legal replies from the fixed start, in index order. */
export const START_BLACK_MOVES = ['e3', 'f4', 'c5', 'd6'];

/**
 * Play a game from the start, choosing among the legal moves with `choices`
 * (each value taken modulo the number of legal moves). Stops when the
 * choices run out or the game ends.
 */
export function playChoices(choices: ReadonlyArray<number>): Position {
  let position = createStartPosition();
  for (const choice of choices) {
    const color = position.sideToMove;
    if (color === null) {
      break;
    }
    const legal = getLegalMoves(position.board, color);
    position = playMove(position, { square: legal[choice % legal.length], color });
  }
  return position;
}

/** Arbitrary for {@link playChoices} inputs. */
export const gameChoicesArb = fc.array(fc.nat({ max: 1000 }), { maxLength: 70 });
