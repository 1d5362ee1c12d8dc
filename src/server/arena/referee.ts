/**
 * Arena referee: plays engines against each other over reversi_v1.
 *
 * The referee owns the authoritative position and the clocks. Each turn it
 * sends `position` and `isready` to the side to move, then `go`, and checks
 * the `bestmove` against its own move generator. An illegal or missing
 * move, a flag fall, or a protocol failure forfeits the game to the
 * opponent. A client that has not been started is handshaken first.
 */

import {
  countDiscs,
  createStartPosition,
  formatMove,
  getWinner,
  opponentOf,
  parseMoveToken,
  playMove,
  type Color,
  type DiscCount,
  type GameOutcome,
  type Move,
} from '../../shared/engine';
import type { ClockModel } from '../../shared/types/protocol';
import { isAcceptableMove } from '../../shared/ai';
import { EngineErrorCode, PeerError } from '../../shared/errors';
import { engineLogger } from '../utils/logger';
import type { EngineClient } from './EngineClient';

const logger = engineLogger('referee');

export type GameEndReason =
  | 'completed'
  | 'illegal_move'
  | 'missing_move'
  | 'time_forfeit'
  | 'engine_error';

export interface GameRecord {
  winner: GameOutcome;
  reason: GameEndReason;
  moves: Move[];
  discs: DiscCount;
  /** Colour that lost by forfeit, when reason is not 'completed'. */
  forfeitedBy?: Color;
  detail?: string;
}

export interface GameOptions {
  initialTimeMs: number;
  incrementMs: number;
  /** Extra wait beyond the mover's remaining time before giving up on `go`. */
  responseGraceMs?: number;
  now?: () => number;
}

export const DEFAULT_GAME_OPTIONS: GameOptions = {
  initialTimeMs: 60000,
  incrementMs: 1000,
  responseGraceMs: 1000,
};

export async function playGame(
  black: EngineClient,
  white: EngineClient,
  options: GameOptions = DEFAULT_GAME_OPTIONS
): Promise<GameRecord> {
  const now = options.now ?? Date.now;
  const grace = options.responseGraceMs ?? 1000;
  const clients: Record<Color, EngineClient> = { black, white };

  let position = createStartPosition();
  let clock: ClockModel = {
    black: { remainingMs: options.initialTimeMs, incrementMs: options.incrementMs },
    white: { remainingMs: options.initialTimeMs, incrementMs: options.incrementMs },
  };

  const forfeit = (color: Color, reason: GameEndReason, detail: string): GameRecord => {
    logger.info('Game forfeited', { color, reason, detail, client: clients[color].name });
    return {
      winner: opponentOf(color),
      reason,
      moves: [...position.history],
      discs: countDiscs(position.board),
      forfeitedBy: color,
      detail,
    };
  };

  for (const color of ['black', 'white'] as const) {
    const client = clients[color];
    try {
      if (!client.started) {
        await client.start();
      }
      client.newGame(color);
      await client.isReady();
    } catch (error) {
      return forfeit(color, 'engine_error', describe(error));
    }
  }

  while (position.sideToMove !== null) {
    const color = position.sideToMove;
    const client = clients[color];

    try {
      client.sendPosition(position.history);
      await client.isReady();
    } catch (error) {
      return forfeit(color, 'engine_error', describe(error));
    }

    let token: string | null;
    const startedAt = now();
    try {
      token = await client.go(clock, clock[color].remainingMs + grace);
    } catch (error) {
      // No answer within the remaining time plus grace is a flag fall.
      const flagged = error instanceof PeerError && error.code === EngineErrorCode.PEER_TIMEOUT;
      return forfeit(color, flagged ? 'time_forfeit' : 'engine_error', describe(error));
    }
    const elapsedMs = now() - startedAt;

    const remainingMs = clock[color].remainingMs - elapsedMs;
    if (remainingMs < 0) {
      return forfeit(color, 'time_forfeit', `exceeded clock by ${-remainingMs}ms`);
    }
    const entry = { ...clock[color], remainingMs: remainingMs + clock[color].incrementMs };
    clock = color === 'black' ? { ...clock, black: entry } : { ...clock, white: entry };

    // The referee only asks a colour that has a legal move.
    if (token === null) {
      return forfeit(color, 'missing_move', 'bestmove without a move');
    }

    const move = parseMoveToken(token);
    if (!move || !isAcceptableMove(position, color, move)) {
      return forfeit(color, 'illegal_move', `illegal move "${token}"`);
    }

    logger.debug('Move played', { color, move: formatMove(move), elapsedMs });
    position = playMove(position, move);
  }

  return {
    winner: getWinner(position.board),
    reason: 'completed',
    moves: [...position.history],
    discs: countDiscs(position.board),
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════
// MATCH
// ═══════════════════════════════════════════════════════════════════════════

export interface MatchOptions extends GameOptions {
  games: number;
  onGame?: (index: number, record: GameRecord, blackName: string, whiteName: string) => void;
}

export interface MatchResult {
  p1Wins: number;
  p2Wins: number;
  draws: number;
  games: GameRecord[];
}

/**
 * Handshakes with both engines, then plays `games` games: the first half
 * with p1 as black, the rest with colours swapped.
 */
export async function runMatch(
  p1: EngineClient,
  p2: EngineClient,
  options: MatchOptions
): Promise<MatchResult> {
  await p1.start();
  await p2.start();
  logger.info('Match starting', { p1: p1.toString(), p2: p2.toString(), games: options.games });

  const result: MatchResult = { p1Wins: 0, p2Wins: 0, draws: 0, games: [] };
  const firstHalf = Math.ceil(options.games / 2);

  for (let index = 0; index < options.games; index++) {
    const p1IsBlack = index < firstHalf;
    const black = p1IsBlack ? p1 : p2;
    const white = p1IsBlack ? p2 : p1;

    const record = await playGame(black, white, options);
    result.games.push(record);

    if (record.winner === 'draw') {
      result.draws++;
    } else if ((record.winner === 'black') === p1IsBlack) {
      result.p1Wins++;
    } else {
      result.p2Wins++;
    }

    logger.info('Game finished', {
      game: index,
      black: black.name,
      white: white.name,
      winner: record.winner,
      reason: record.reason,
      discs: record.discs,
    });
    options.onGame?.(index, record, black.name, white.name);
  }

  return result;
}
