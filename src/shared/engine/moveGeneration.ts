import type { Board, Color, GameOutcome, Square } from '../types/game';
import { opponentOf } from '../types/game';
import { countDiscs } from './board';
import { ALL_SQUARES } from './core';
import { isLegalMove } from './flipLogic';

/**
 * Legal squares for `color`, in index order (a1, b1, ..., h8).
 */
export function getLegalMoves(board: Board, color: Color): Square[] {
  return ALL_SQUARES.filter((square) => isLegalMove(board, square, color));
}

export function hasLegalMove(board: Board, color: Color): boolean {
  return ALL_SQUARES.some((square) => isLegalMove(board, square, color));
}

export function mustPass(board: Board, color: Color): boolean {
  return !hasLegalMove(board, color);
}

/**
 * The game ends when neither colour can place a token on the same board.
 */
export function isGameOver(board: Board): boolean {
  return mustPass(board, 'black') && mustPass(board, 'white');
}

/**
 * Who moves after `lastMover` played: the opponent if it can move, the
 * same colour again if only it can move (the opponent passes), or null
 * when the game is over.
 */
export function getNextToMove(board: Board, lastMover: Color): Color | null {
  const opponent = opponentOf(lastMover);
  if (hasLegalMove(board, opponent)) {
    return opponent;
  }
  if (hasLegalMove(board, lastMover)) {
    return lastMover;
  }
  return null;
}

/**
 * Winner by disc count. Only meaningful once {@link isGameOver} holds.
 */
export function getWinner(board: Board): GameOutcome {
  const { black, white } = countDiscs(board);
  if (black > white) return 'black';
  if (white > black) return 'white';
  return 'draw';
}
