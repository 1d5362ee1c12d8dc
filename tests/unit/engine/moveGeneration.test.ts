import {
  getLegalMoves,
  getNextToMove,
  getWinner,
  hasLegalMove,
  isGameOver,
  mustPass,
} from '../../../src/shared/engine/moveGeneration';
import { applyMove } from '../../../src/shared/engine/flipLogic';
import { createEmptyBoard, createStartBoard } from '../../../src/shared/engine/board';
import { diagram, mv, names, START_BLACK_MOVES } from '../../utils/fixtures';

describe('moveGeneration', () => {
  // White's only move before black plays is d1; after a1b white has none.
  const passSetup = diagram(
    '......WB',
    '........',
    '........',
    '........',
    '........',
    '........',
    '........',
    '.WB.....'
  );

  describe('getLegalMoves', () => {
    it('lists black replies from the start in index order', () => {
      expect(names(getLegalMoves(createStartBoard(), 'black'))).toEqual(START_BLACK_MOVES);
    });

    it('lists white replies from the start in index order', () => {
      expect(names(getLegalMoves(createStartBoard(), 'white'))).toEqual(['d3', 'c4', 'f5', 'e6']);
    });

    it('is empty on an empty board', () => {
      expect(getLegalMoves(createEmptyBoard(), 'black')).toEqual([]);
      expect(hasLegalMove(createEmptyBoard(), 'white')).toBe(false);
    });

    it('finds moves near the edges', () => {
      expect(names(getLegalMoves(passSetup, 'black'))).toEqual(['a1', 'f8']);
      expect(names(getLegalMoves(passSetup, 'white'))).toEqual(['d1']);
    });
  });

  describe('mustPass / isGameOver', () => {
    it('requires a pass only when no legal move exists', () => {
      const { board } = applyMove(passSetup, mv('a1b'));
      expect(mustPass(board, 'white')).toBe(true);
      expect(mustPass(board, 'black')).toBe(false);
      expect(isGameOver(board)).toBe(false);
    });

    it('ends the game when both colours must pass', () => {
      const afterA1 = applyMove(passSetup, mv('a1b')).board;
      const { board } = applyMove(afterA1, mv('f8b'));
      expect(isGameOver(board)).toBe(true);
    });

    it('is not over at the start', () => {
      expect(isGameOver(createStartBoard())).toBe(false);
    });
  });

  describe('getNextToMove', () => {
    it('alternates when the opponent can move', () => {
      const { board } = applyMove(createStartBoard(), mv('e3b'));
      expect(getNextToMove(board, 'black')).toBe('white');
    });

    it('returns the same colour when the opponent must pass', () => {
      const { board } = applyMove(passSetup, mv('a1b'));
      expect(getNextToMove(board, 'black')).toBe('black');
    });

    it('returns null when nobody can move', () => {
      const afterA1 = applyMove(passSetup, mv('a1b')).board;
      const { board } = applyMove(afterA1, mv('f8b'));
      expect(getNextToMove(board, 'black')).toBeNull();
    });
  });

  describe('getWinner', () => {
    it('counts discs', () => {
      const afterA1 = applyMove(passSetup, mv('a1b')).board;
      const { board } = applyMove(afterA1, mv('f8b'));
      expect(getWinner(board)).toBe('black');
    });

    it('reports a draw on equal counts', () => {
      expect(getWinner(createStartBoard())).toBe('draw');
    });
  });
});
