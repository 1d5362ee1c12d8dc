import {
  boardFromRows,
  boardToString,
  countDiscs,
  createEmptyBoard,
  createStartBoard,
  discsFor,
  getCell,
  isEmptyCell,
  withCells,
} from '../../../src/shared/engine/board';
import { ALL_SQUARES, squareFromIndex, squareIndex } from '../../../src/shared/engine/core';
import { sq } from '../../utils/fixtures';

describe('board', () => {
  describe('createStartBoard', () => {
    it('places the four centre tokens', () => {
      const board = createStartBoard();
      expect(getCell(board, sq('d4'))).toBe('black');
      expect(getCell(board, sq('e4'))).toBe('white');
      expect(getCell(board, sq('d5'))).toBe('white');
      expect(getCell(board, sq('e5'))).toBe('black');
    });

    it('leaves every other square empty', () => {
      expect(countDiscs(createStartBoard())).toEqual({ black: 2, white: 2, empty: 60 });
    });
  });

  describe('coordinates', () => {
    it('indexes squares rank by rank from a1', () => {
      expect(squareIndex(sq('a1'))).toBe(0);
      expect(squareIndex(sq('h1'))).toBe(7);
      expect(squareIndex(sq('a2'))).toBe(8);
      expect(squareIndex(sq('h8'))).toBe(63);
    });

    it('round-trips every index', () => {
      for (let index = 0; index < 64; index++) {
        expect(squareIndex(squareFromIndex(index))).toBe(index);
      }
      expect(ALL_SQUARES).toHaveLength(64);
    });

    it('rejects indexes outside the board', () => {
      expect(() => squareFromIndex(64)).toThrow(RangeError);
      expect(() => squareFromIndex(-1)).toThrow(RangeError);
    });

    it('rejects out-of-bounds squares on access', () => {
      expect(() => getCell(createEmptyBoard(), { x: 8, y: 0 })).toThrow(RangeError);
    });
  });

  describe('withCells', () => {
    it('returns a copy and leaves the input untouched', () => {
      const board = createEmptyBoard();
      const next = withCells(board, [[sq('a1'), 'black']]);
      expect(getCell(next, sq('a1'))).toBe('black');
      expect(isEmptyCell(board, sq('a1'))).toBe(true);
      expect(next).not.toBe(board);
    });
  });

  describe('countDiscs / discsFor', () => {
    it('counts each colour', () => {
      const board = withCells(createStartBoard(), [[sq('e3'), 'black'], [sq('e4'), 'black']]);
      expect(discsFor(board, 'black')).toBe(4);
      expect(discsFor(board, 'white')).toBe(1);
    });
  });

  describe('boardToString / boardFromRows', () => {
    it('renders the start board', () => {
      expect(boardToString(createStartBoard())).toBe(
        [
          ' abcdefgh',
          '1........',
          '2........',
          '3........',
          '4...BW...',
          '5...WB...',
          '6........',
          '7........',
          '8........',
        ].join('\n')
      );
    });

    it('parses rank lines, rank 1 first', () => {
      const rows = ['B.......', '', '', '', '', '', '', '.......w'].map((row) =>
        row === '' ? '........' : row
      );
      const board = boardFromRows(rows);
      expect(getCell(board, sq('a1'))).toBe('black');
      expect(getCell(board, sq('h8'))).toBe('white');
      expect(countDiscs(board).empty).toBe(62);
    });

    it('rejects malformed diagrams', () => {
      expect(() => boardFromRows(['........'])).toThrow('Expected 8 rows, got 1');
      expect(() => boardFromRows(Array.from({ length: 8 }, () => '...x....'))).toThrow(
        'Unknown cell glyph "x"'
      );
    });
  });
});
