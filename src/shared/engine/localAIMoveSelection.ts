import type { Board, Color, Move, Square } from '../types/game';
import { findFlips } from './flipLogic';
import { getLegalMoves } from './moveGeneration';

/**
 * Local move-selection policies shared by the engine's agents and the
 * fallback path. Both take an injected RNG so a seeded run is fully
 * reproducible.
 *
 * Move selection quality is not a goal here; these policies exist so the
 * engine always has a legal answer.
 */
export type LocalAIRng = () => number;

/**
 * Pick uniformly among the given candidates. Returns null for an empty list.
 */
export function pickRandom<T>(candidates: ReadonlyArray<T>, rng: LocalAIRng): T | null {
  if (candidates.length === 0) {
    return null;
  }
  const index = Math.min(candidates.length - 1, Math.floor(rng() * candidates.length));
  return candidates[index];
}

export function chooseRandomMove(board: Board, color: Color, rng: LocalAIRng): Move | null {
  const square = pickRandom(getLegalMoves(board, color), rng);
  return square === null ? null : { square, color };
}

/**
 * Corners can never be flipped back; edges rarely are.
 */
function squareWeight(square: Square): number {
  const onEdgeX = square.x === 0 || square.x === 7;
  const onEdgeY = square.y === 0 || square.y === 7;
  if (onEdgeX && onEdgeY) return 10;
  if (onEdgeX || onEdgeY) return 2;
  return 0;
}

/**
 * Greedy policy: maximise flips plus a small corner/edge bonus, breaking
 * ties at random.
 */
export function chooseGreedyMove(board: Board, color: Color, rng: LocalAIRng): Move | null {
  let best: Square[] = [];
  let bestScore = Number.NEGATIVE_INFINITY;

  for (const square of getLegalMoves(board, color)) {
    const score = findFlips(board, square, color).length + squareWeight(square);
    if (score > bestScore) {
      bestScore = score;
      best = [square];
    } else if (score === bestScore) {
      best.push(square);
    }
  }

  const square = pickRandom(best, rng);
  return square === null ? null : { square, color };
}
