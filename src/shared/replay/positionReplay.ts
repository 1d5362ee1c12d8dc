/**
 * Position replay - derives a Position from a move list.
 *
 * The wire format carries no pass tokens. After every explicit move the
 * next mover is re-derived from board legality ({@link getNextToMove});
 * when the opponent cannot move an implicit pass is recorded and the same
 * colour is expected again. The history index only advances on explicit
 * moves.
 *
 * Replay is deterministic: the same move list always produces the same
 * board, side to move and pass list.
 *
 * @module positionReplay
 */

import type { Color, ImplicitPass, Move, Position } from '../types/game';
import { opponentOf } from '../types/game';
import { InvalidMoveSequenceError } from '../errors';
import { createStartBoard, getCell } from '../engine/board';
import { findFlips, applyMove } from '../engine/flipLogic';
import { getNextToMove } from '../engine/moveGeneration';
import { formatMove, formatSquare, parseMoveToken } from '../engine/notation';

/** Black always moves first from the fixed start. */
export const FIRST_MOVER: Color = 'black';

export function createStartPosition(): Position {
  return {
    board: createStartBoard(),
    history: [],
    sideToMove: FIRST_MOVER,
    passes: [],
  };
}

/**
 * Apply one explicit move to a position.
 *
 * @throws InvalidMoveSequenceError when the game is over, the declared
 *   colour is not the derived side to move, the square is occupied or the
 *   move flips nothing.
 */
export function playMove(position: Position, move: Move): Position {
  const moveIndex = position.history.length;
  const token = formatMove(move);

  if (position.sideToMove === null) {
    throw new InvalidMoveSequenceError(`Move ${token} played after the game ended`, {
      moveIndex,
      token,
      reason: 'game_over',
    });
  }

  if (move.color !== position.sideToMove) {
    throw new InvalidMoveSequenceError(
      `Move ${token} declares ${move.color} but ${position.sideToMove} is to move`,
      { moveIndex, token, reason: 'wrong_color' },
      { expected: position.sideToMove }
    );
  }

  if (getCell(position.board, move.square) !== 'empty') {
    throw new InvalidMoveSequenceError(`Square ${formatSquare(move.square)} is occupied`, {
      moveIndex,
      token,
      reason: 'square_occupied',
    });
  }

  if (findFlips(position.board, move.square, move.color).length === 0) {
    throw new InvalidMoveSequenceError(`Move ${token} flips no tokens`, {
      moveIndex,
      token,
      reason: 'no_flips',
    });
  }

  const { board } = applyMove(position.board, move);
  const sideToMove = getNextToMove(board, move.color);

  const passes: ImplicitPass[] = [...position.passes];
  if (sideToMove === move.color) {
    passes.push({ color: opponentOf(move.color), afterMoveIndex: moveIndex });
  }

  return {
    board,
    history: [...position.history, move],
    sideToMove,
    passes,
  };
}

/**
 * Replay a move list from the start position.
 */
export function replayMoves(moves: ReadonlyArray<Move>): Position {
  return moves.reduce(playMove, createStartPosition());
}

/**
 * Parse and replay raw move tokens as they appear after `position startpos`.
 */
export function replayTokens(tokens: ReadonlyArray<string>): Position {
  const moves = tokens.map((token, moveIndex) => {
    const move = parseMoveToken(token);
    if (move === null) {
      throw new InvalidMoveSequenceError(`Malformed move token "${token}"`, {
        moveIndex,
        token,
        reason: 'malformed_token',
      });
    }
    return move;
  });
  return replayMoves(moves);
}

export function historyTokens(position: Position): string[] {
  return position.history.map(formatMove);
}
