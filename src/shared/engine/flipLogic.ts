import type { Board, Color, Move, Square } from '../types/game';
import { opponentOf } from '../types/game';
import { IllegalMoveError } from '../errors';
import { getCell, withCells } from './board';
import { isInBounds, SQUARE_MOORE_DIRECTIONS, type Direction } from './core';
import { formatMove } from './notation';

/**
 * Flip engine: the sandwich rule.
 *
 * From the target square, each of the 8 directions is walked one step at a
 * time while cells hold the opposing colour. The run flips only when it is
 * non-empty and ends on a cell of the mover's colour inside the board. An
 * empty cell or the board edge ends the walk with nothing flipped for that
 * direction. Only the placed token triggers flips; flipped tokens are never
 * re-examined.
 */

export interface MoveApplication {
  board: Board;
  flipped: Square[];
}

/**
 * Squares flipped in a single direction, or [] when the run is not
 * bracketed by one of `color`'s tokens.
 */
export function findFlipsInDirection(
  board: Board,
  from: Square,
  direction: Direction,
  color: Color
): Square[] {
  const opponent = opponentOf(color);
  const run: Square[] = [];
  let x = from.x + direction.x;
  let y = from.y + direction.y;

  while (isInBounds(x, y)) {
    const cell = getCell(board, { x, y });
    if (cell === opponent) {
      run.push({ x, y });
    } else if (cell === color) {
      return run;
    } else {
      return [];
    }
    x += direction.x;
    y += direction.y;
  }

  return [];
}

/**
 * All squares that placing `color` on `square` would flip, in direction
 * order. Occupied targets flip nothing.
 */
export function findFlips(board: Board, square: Square, color: Color): Square[] {
  if (getCell(board, square) !== 'empty') {
    return [];
  }
  const flips: Square[] = [];
  for (const direction of SQUARE_MOORE_DIRECTIONS) {
    flips.push(...findFlipsInDirection(board, square, direction, color));
  }
  return flips;
}

export function isLegalMove(board: Board, square: Square, color: Color): boolean {
  if (getCell(board, square) !== 'empty') {
    return false;
  }
  return SQUARE_MOORE_DIRECTIONS.some(
    (direction) => findFlipsInDirection(board, square, direction, color).length > 0
  );
}

/**
 * Place `move.color` on `move.square` and flip every bracketed run.
 * Returns a new board; the input is left untouched.
 *
 * @throws IllegalMoveError when the square is occupied or nothing flips.
 */
export function applyMove(board: Board, move: Move): MoveApplication {
  const flipped = findFlips(board, move.square, move.color);
  if (flipped.length === 0) {
    throw new IllegalMoveError(formatMove(move), {
      occupied: getCell(board, move.square) !== 'empty',
    });
  }

  const updates: Array<readonly [Square, Color]> = [[move.square, move.color]];
  for (const square of flipped) {
    updates.push([square, move.color]);
  }

  return { board: withCells(board, updates), flipped };
}
