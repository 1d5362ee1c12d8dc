// =============================================================================
// REVERSI RULES ENGINE - PUBLIC API
// =============================================================================
// Entry point for code outside src/shared (the session host, the arena
// referee). Modules inside src/shared import each other directly.
//
// - PURE: boards and positions are passed in and new ones returned
// - NARROW: only what the hosts need is exported
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Board,
  CellState,
  Color,
  DiscCount,
  GameOutcome,
  ImplicitPass,
  Move,
  Position,
  Square,
} from '../types/game';

export { BOARD_SIZE, COLORS, opponentOf, squaresEqual, movesEqual } from '../types/game';

// =============================================================================
// BOARD
// =============================================================================

export {
  createEmptyBoard,
  createStartBoard,
  getCell,
  isEmptyCell,
  withCells,
  countDiscs,
  discsFor,
  boardToString,
  boardFromRows,
} from './board';

export { ALL_SQUARES, SQUARE_MOORE_DIRECTIONS, isInBounds, squareIndex, squareFromIndex } from './core';

// =============================================================================
// FLIPS & MOVE GENERATION
// =============================================================================

export { findFlips, findFlipsInDirection, isLegalMove, applyMove } from './flipLogic';
export type { MoveApplication } from './flipLogic';

export {
  getLegalMoves,
  hasLegalMove,
  mustPass,
  isGameOver,
  getNextToMove,
  getWinner,
} from './moveGeneration';

// =============================================================================
// NOTATION & REPLAY
// =============================================================================

export {
  formatSquare,
  formatColor,
  formatMove,
  parseSquare,
  parseColor,
  parseMoveToken,
} from './notation';

export {
  FIRST_MOVER,
  createStartPosition,
  playMove,
  replayMoves,
  replayTokens,
  historyTokens,
} from '../replay/positionReplay';
