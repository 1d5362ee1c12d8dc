import {
  BOARD_SIZE,
  SQUARE_COUNT,
  type Board,
  type CellState,
  type Color,
  type DiscCount,
  type Square,
} from '../types/game';
import { isInBounds, squareIndex } from './core';

/**
 * Board accessors. A board is pure data; legality lives in flipLogic.ts.
 */

export function createEmptyBoard(): Board {
  return Array.from({ length: SQUARE_COUNT }, (): CellState => 'empty');
}

/**
 * The fixed starting configuration: d4 and e5 black, e4 and d5 white.
 */
export function createStartBoard(): Board {
  return withCells(createEmptyBoard(), [
    [{ x: 3, y: 3 }, 'black'],
    [{ x: 4, y: 3 }, 'white'],
    [{ x: 3, y: 4 }, 'white'],
    [{ x: 4, y: 4 }, 'black'],
  ]);
}

export function getCell(board: Board, square: Square): CellState {
  if (!isInBounds(square.x, square.y)) {
    throw new RangeError(`Square out of bounds: (${square.x}, ${square.y})`);
  }
  return board[squareIndex(square)];
}

export function isEmptyCell(board: Board, square: Square): boolean {
  return getCell(board, square) === 'empty';
}

/**
 * Return a copy of `board` with the given cells overwritten.
 */
export function withCells(
  board: Board,
  updates: ReadonlyArray<readonly [Square, CellState]>
): Board {
  const next = board.slice();
  for (const [square, state] of updates) {
    if (!isInBounds(square.x, square.y)) {
      throw new RangeError(`Square out of bounds: (${square.x}, ${square.y})`);
    }
    next[squareIndex(square)] = state;
  }
  return next;
}

export function countDiscs(board: Board): DiscCount {
  const count: DiscCount = { black: 0, white: 0, empty: 0 };
  for (const cell of board) {
    count[cell] += 1;
  }
  return count;
}

export function discsFor(board: Board, color: Color): number {
  return countDiscs(board)[color];
}

const CELL_GLYPHS: Record<CellState, string> = { empty: '.', black: 'B', white: 'W' };

/**
 * Render a board for logs and test failure output:
 *
 * ```
 *  abcdefgh
 * 1........
 * ...
 * 4...BW...
 * ```
 */
export function boardToString(board: Board): string {
  const lines = [' abcdefgh'];
  for (let y = 0; y < BOARD_SIZE; y++) {
    let row = String(y + 1);
    for (let x = 0; x < BOARD_SIZE; x++) {
      row += CELL_GLYPHS[board[y * BOARD_SIZE + x]];
    }
    lines.push(row);
  }
  return lines.join('\n');
}

/**
 * Build a board from the rendered form (rank lines only, rank 1 first).
 * Accepts `.`, `B` and `W`; mainly used to set up fixtures.
 */
export function boardFromRows(rows: ReadonlyArray<string>): Board {
  if (rows.length !== BOARD_SIZE) {
    throw new Error(`Expected ${BOARD_SIZE} rows, got ${rows.length}`);
  }
  const cells: CellState[] = [];
  for (const row of rows) {
    if (row.length !== BOARD_SIZE) {
      throw new Error(`Row must have ${BOARD_SIZE} cells: "${row}"`);
    }
    for (const glyph of row) {
      switch (glyph.toUpperCase()) {
        case '.':
          cells.push('empty');
          break;
        case 'B':
          cells.push('black');
          break;
        case 'W':
          cells.push('white');
          break;
        default:
          throw new Error(`Unknown cell glyph "${glyph}" in row "${row}"`);
      }
    }
  }
  return cells;
}
