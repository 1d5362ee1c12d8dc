import { BOARD_SIZE, SQUARE_COUNT, type Square } from '../types/game';

/**
 * Shared, side-effect free coordinate helpers for the Reversi rules engine.
 *
 * Everything in `src/shared/engine/**` is pure and depends only on shared
 * types so it can be used by the protocol session, the arena referee and
 * tests alike.
 */

/**
 * A single step in board-local coordinates.
 */
export interface Direction {
  x: number;
  y: number;
}

/**
 * The 8-direction Moore neighbourhood, clockwise from east.
 */
export const SQUARE_MOORE_DIRECTIONS: ReadonlyArray<Direction> = [
  { x: 1, y: 0 }, // E
  { x: 1, y: 1 }, // SE
  { x: 0, y: 1 }, // S
  { x: -1, y: 1 }, // SW
  { x: -1, y: 0 }, // W
  { x: -1, y: -1 }, // NW
  { x: 0, y: -1 }, // N
  { x: 1, y: -1 }, // NE
];

export function isInBounds(x: number, y: number): boolean {
  return x >= 0 && x < BOARD_SIZE && y >= 0 && y < BOARD_SIZE;
}

export function squareIndex(square: Square): number {
  return square.y * BOARD_SIZE + square.x;
}

export function squareFromIndex(index: number): Square {
  if (!Number.isInteger(index) || index < 0 || index >= SQUARE_COUNT) {
    throw new RangeError(`Square index out of range: ${index}`);
  }
  return { x: index % BOARD_SIZE, y: Math.floor(index / BOARD_SIZE) };
}

/**
 * All 64 squares in index order (a1, b1, ..., h1, a2, ..., h8).
 */
export const ALL_SQUARES: ReadonlyArray<Square> = Array.from({ length: SQUARE_COUNT }, (_, i) =>
  squareFromIndex(i)
);
