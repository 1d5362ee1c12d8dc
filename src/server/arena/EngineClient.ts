import type { Color, Move } from '../../shared/types/game';
import type { ClockModel, EngineIdentity } from '../../shared/types/protocol';
import { EngineErrorCode, PeerError } from '../../shared/errors';
import { formatColor, formatMove } from '../../shared/engine/notation';
import type { EnginePeer } from './EnginePeer';

export const DEFAULT_RESPONSE_TIMEOUT_MS = 5000;

/**
 * UI side of reversi_v1: drives one engine peer and checks its answers.
 */
export class EngineClient {
  private identity: EngineIdentity | null = null;
  /** `go` requests whose bestmove never arrived in time. */
  private unansweredGoCount = 0;

  constructor(
    readonly peer: EnginePeer,
    private readonly responseTimeoutMs: number = DEFAULT_RESPONSE_TIMEOUT_MS
  ) {}

  get tag(): string {
    return this.peer.tag;
  }

  /** True once the handshake has completed. */
  get started(): boolean {
    return this.identity !== null;
  }

  get name(): string {
    return this.identity?.name ?? this.peer.tag;
  }

  /**
   * Handshake. Collects `id` lines until `reversi_v1_ok`.
   */
  async start(): Promise<EngineIdentity> {
    this.peer.send('reversi_v1');

    let name = '';
    let author = '';
    for (;;) {
      const line = (await this.peer.readLine(this.responseTimeoutMs)).trim();
      if (line === 'reversi_v1_ok') {
        break;
      }
      const [keyword, field, ...value] = line.split(/\s+/);
      if (keyword !== 'id' || (field !== 'name' && field !== 'author')) {
        throw this.unexpected(line, 'an id line or reversi_v1_ok');
      }
      if (field === 'name') {
        name = value.join(' ');
      } else {
        author = value.join(' ');
      }
    }

    this.identity = { name, author };
    return this.identity;
  }

  newGame(color: Color): void {
    this.peer.send(`newgame ${formatColor(color)}`);
  }

  /**
   * Sends `isready` and waits for `readyok`. A late bestmove for a `go` that
   * timed out earlier is read and dropped on the way.
   */
  async isReady(): Promise<void> {
    this.peer.send('isready');
    for (;;) {
      const line = (await this.peer.readLine(this.responseTimeoutMs)).trim();
      if (line === 'readyok') {
        return;
      }
      if (this.unansweredGoCount > 0 && line.split(/\s+/)[0] === 'bestmove') {
        this.unansweredGoCount--;
        continue;
      }
      throw this.unexpected(line, 'readyok');
    }
  }

  sendPosition(moves: ReadonlyArray<Move>): void {
    const tokens = moves.map(formatMove);
    this.peer.send(['position', 'startpos', ...tokens].join(' '));
  }

  /**
   * Sends `go` and waits up to `timeoutMs` for `bestmove`. Returns the raw
   * move token, or null for a bare `bestmove`.
   */
  async go(clock: ClockModel, timeoutMs: number): Promise<string | null> {
    this.peer.send(
      `go btime=${clock.black.remainingMs} wtime=${clock.white.remainingMs} ` +
        `binc=${clock.black.incrementMs} winc=${clock.white.incrementMs}`
    );
    this.unansweredGoCount++;
    const line = (await this.peer.readLine(timeoutMs)).trim();
    const [keyword, token, ...rest] = line.split(/\s+/);
    if (keyword === 'bestmove') {
      this.unansweredGoCount--;
    }
    if (keyword !== 'bestmove' || rest.length > 0) {
      throw this.unexpected(line, 'bestmove');
    }
    return token ?? null;
  }

  async close(): Promise<void> {
    await this.peer.close();
  }

  toString(): string {
    return this.identity ? `${this.identity.name} by ${this.identity.author}` : this.peer.tag;
  }

  private unexpected(line: string, expected: string): PeerError {
    return new PeerError(
      EngineErrorCode.PEER_UNEXPECTED_RESPONSE,
      this.peer.tag,
      `Expected ${expected}, got "${line}"`,
      { line, expected }
    );
  }
}
