import type { Color, Move, Square } from '../types/game';
import { isInBounds } from './core';

/**
 * Move notation for the reversi_v1 wire format.
 *
 * A square is written file letter + rank digit (`e3`); a move appends the
 * colour letter (`e3b`, `f5w`). Parsing is case-insensitive, formatting
 * always produces lowercase.
 */

const COLOR_LETTERS: Record<Color, 'b' | 'w'> = { black: 'b', white: 'w' };

const SQUARE_PATTERN = /^([a-h])([1-8])$/i;
const MOVE_TOKEN_PATTERN = /^([a-h])([1-8])([bw])$/i;

export function formatSquare(square: Square): string {
  if (!isInBounds(square.x, square.y)) {
    throw new RangeError(`Square out of bounds: (${square.x}, ${square.y})`);
  }
  return `${String.fromCharCode('a'.charCodeAt(0) + square.x)}${square.y + 1}`;
}

export function formatColor(color: Color): 'b' | 'w' {
  return COLOR_LETTERS[color];
}

export function formatMove(move: Move): string {
  return `${formatSquare(move.square)}${formatColor(move.color)}`;
}

/**
 * Parse a square such as `e3` or `E3`. Returns null for anything else.
 */
export function parseSquare(text: string): Square | null {
  const match = SQUARE_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  return toSquare(match[1], match[2]);
}

/**
 * Parse a colour letter (`b`/`w`, any case).
 */
export function parseColor(text: string): Color | null {
  switch (text.toLowerCase()) {
    case 'b':
      return 'black';
    case 'w':
      return 'white';
    default:
      return null;
  }
}

/**
 * Parse a 3-character move token such as `e3b` or `F5W`.
 */
export function parseMoveToken(token: string): Move | null {
  const match = MOVE_TOKEN_PATTERN.exec(token);
  if (!match) {
    return null;
  }
  const color = parseColor(match[3]);
  if (color === null) {
    return null;
  }
  return { square: toSquare(match[1], match[2]), color };
}

function toSquare(file: string, rank: string): Square {
  return {
    x: file.toLowerCase().charCodeAt(0) - 'a'.charCodeAt(0),
    y: Number(rank) - 1,
  };
}
