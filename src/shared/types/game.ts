/**
 * Core Reversi domain types shared by the rules engine, the protocol
 * session and the arena.
 *
 * Boards are plain read-only arrays indexed by square index
 * (`y * BOARD_SIZE + x`, so a1 = 0, b1 = 1, ..., h8 = 63). Nothing in the
 * engine mutates a board in place; every application returns a copy.
 */

export const BOARD_SIZE = 8;
export const SQUARE_COUNT = BOARD_SIZE * BOARD_SIZE;

export type Color = 'black' | 'white';
export type CellState = 'empty' | Color;

/**
 * A board coordinate. `x` is the file (0 = a, 7 = h) and `y` the rank
 * (0 = rank 1, 7 = rank 8).
 */
export interface Square {
  readonly x: number;
  readonly y: number;
}

export type Board = ReadonlyArray<CellState>;

export interface Move {
  readonly square: Square;
  readonly color: Color;
}

/** A turn skipped because the side to move had no legal placement. */
export interface ImplicitPass {
  readonly color: Color;
  /** Index in the history of the last explicit move before the pass. */
  readonly afterMoveIndex: number;
}

/**
 * A replayed game: the history of explicit moves plus everything derived
 * from it. `sideToMove` is null once neither colour can move.
 */
export interface Position {
  readonly board: Board;
  readonly history: ReadonlyArray<Move>;
  readonly sideToMove: Color | null;
  readonly passes: ReadonlyArray<ImplicitPass>;
}

export type GameOutcome = Color | 'draw';

export interface DiscCount {
  black: number;
  white: number;
  empty: number;
}

export const COLORS: ReadonlyArray<Color> = ['black', 'white'];

export const opponentOf = (color: Color): Color => (color === 'black' ? 'white' : 'black');

export const squaresEqual = (a: Square, b: Square): boolean => a.x === b.x && a.y === b.y;

export const movesEqual = (a: Move, b: Move): boolean =>
  a.color === b.color && squaresEqual(a.square, b.square);
