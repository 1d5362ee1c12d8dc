/**
 * Property-based tests for the flip engine and replay using fast-check
 */

import fc from 'fast-check';
import { applyMove, findFlips } from '../../../src/shared/engine/flipLogic';
import { getLegalMoves, isGameOver } from '../../../src/shared/engine/moveGeneration';
import { ALL_SQUARES, squareIndex } from '../../../src/shared/engine/core';
import { createStartBoard } from '../../../src/shared/engine/board';
import { formatMove, parseMoveToken } from '../../../src/shared/engine/notation';
import { replayMoves } from '../../../src/shared/replay/positionReplay';
import { gameChoicesArb, playChoices } from '../../utils/fixtures';

describe('flip engine properties', () => {
  it('applying a legal move changes exactly the target and the flipped squares', () => {
    fc.assert(
      fc.property(gameChoicesArb, fc.nat(), (choices, pick) => {
        const position = playChoices(choices);
        const color = position.sideToMove;
        if (color === null) {
          return;
        }
        const legal = getLegalMoves(position.board, color);
        const square = legal[pick % legal.length];
        const flips = findFlips(position.board, square, color);

        const { board, flipped } = applyMove(position.board, { square, color });
        expect(flipped).toEqual(flips);

        const changed = new Set([squareIndex(square), ...flips.map(squareIndex)]);
        for (const other of ALL_SQUARES) {
          const index = squareIndex(other);
          if (changed.has(index)) {
            expect(board[index]).toBe(color);
          } else {
            expect(board[index]).toBe(position.board[index]);
          }
        }
      }),
      { numRuns: 100 }
    );
  });

  it('flipped squares always held the opposing colour', () => {
    fc.assert(
      fc.property(gameChoicesArb, (choices) => {
        const position = playChoices(choices);
        const color = position.sideToMove;
        if (color === null) {
          return;
        }
        for (const square of getLegalMoves(position.board, color)) {
          for (const flip of findFlips(position.board, square, color)) {
            expect(position.board[squareIndex(flip)]).not.toBe(color);
            expect(position.board[squareIndex(flip)]).not.toBe('empty');
          }
        }
      }),
      { numRuns: 50 }
    );
  });

  it('replaying a history reproduces the board of sequential application', () => {
    fc.assert(
      fc.property(gameChoicesArb, (choices) => {
        const position = playChoices(choices);
        const sequential = position.history.reduce(
          (board, move) => applyMove(board, move).board,
          createStartBoard()
        );
        const replayed = replayMoves(position.history);
        expect(replayed.board).toEqual(sequential);
        expect(replayed.board).toEqual(position.board);
        expect(replayed.sideToMove).toBe(position.sideToMove);
        expect(replayed.passes).toEqual(position.passes);
      }),
      { numRuns: 100 }
    );
  });

  it('the side to move is null exactly when the game is over', () => {
    fc.assert(
      fc.property(gameChoicesArb, (choices) => {
        const position = playChoices(choices);
        expect(position.sideToMove === null).toBe(isGameOver(position.board));
      }),
      { numRuns: 100 }
    );
  });

  it('move tokens round-trip through formatting, case-insensitively', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...ALL_SQUARES),
        fc.constantFrom('black' as const, 'white' as const),
        fc.boolean(),
        (square, color, upper) => {
          const token = formatMove({ square, color });
          const parsed = parseMoveToken(upper ? token.toUpperCase() : token);
          expect(parsed).toEqual({ square, color });
        }
      )
    );
  });
});
