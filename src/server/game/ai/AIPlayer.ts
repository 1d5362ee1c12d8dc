/**
 * AI Player Interface and Base Class
 *
 * An AI player is the engine's external move-selection collaborator. The
 * protocol session hands it an immutable {@link SearchSnapshot} and a
 * cancellation token and awaits a single move; it never sees or mutates
 * the session.
 */

import type { Color, Move } from '../../../shared/types/game';
import type { SearchSnapshot } from '../../../shared/types/protocol';
import type { CancellationToken } from '../../../shared/utils/cancellation';
import type { AgentKind } from '../../config';
import { createLocalAIRng } from '../../../shared/ai';
import {
  chooseGreedyMove,
  chooseRandomMove,
  type LocalAIRng,
} from '../../../shared/engine/localAIMoveSelection';

export interface AIConfig {
  /** Seed for reproducible tie-breaking; Math.random when omitted. */
  seed?: number;
}

/**
 * Base AI Player class
 * All AI implementations should extend this class
 */
export abstract class AIPlayer {
  readonly color: Color;
  protected readonly rng: LocalAIRng;

  constructor(color: Color, config: AIConfig = {}) {
    this.color = color;
    this.rng = config.seed === undefined ? Math.random : createLocalAIRng(config.seed);
  }

  /**
   * Select a move for the snapshot's colour. Implementations should check
   * the token at their own boundaries; the session enforces the deadline
   * regardless.
   */
  abstract search(snapshot: SearchSnapshot, token: CancellationToken): Promise<Move | null>;
}

/**
 * Uniformly random legal move.
 */
export class RandomAIPlayer extends AIPlayer {
  async search(snapshot: SearchSnapshot, token: CancellationToken): Promise<Move | null> {
    token.throwIfCanceled('before random selection');
    return chooseRandomMove(snapshot.position.board, snapshot.color, this.rng);
  }
}

/**
 * Most flips plus a corner/edge bonus.
 */
export class GreedyAIPlayer extends AIPlayer {
  async search(snapshot: SearchSnapshot, token: CancellationToken): Promise<Move | null> {
    token.throwIfCanceled('before greedy selection');
    return chooseGreedyMove(snapshot.position.board, snapshot.color, this.rng);
  }
}

/**
 * Creates a player for the colour assigned by `newgame`.
 */
export type AIPlayerFactory = (color: Color) => AIPlayer;

export function createAIPlayerFactory(kind: AgentKind, config: AIConfig = {}): AIPlayerFactory {
  switch (kind) {
    case 'random':
      return (color) => new RandomAIPlayer(color, config);
    case 'greedy':
      return (color) => new GreedyAIPlayer(color, config);
  }
}
