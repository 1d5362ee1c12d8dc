import {
  EngineClient,
  InProcessPeer,
  playGame,
  runMatch,
  type GameRecord,
} from '../../../src/server/arena';
import { createAIPlayerFactory } from '../../../src/server/game/ai/AIPlayer';
import type { AgentKind } from '../../../src/server/config';
import { countDiscs } from '../../../src/shared/engine/board';
import { getWinner } from '../../../src/shared/engine/moveGeneration';
import { replayMoves } from '../../../src/shared/replay/positionReplay';
import { ScriptedPeer, scriptedEngine } from '../../utils/scriptedPeer';

function builtin(tag: string, agent: AgentKind, seed: number): EngineClient {
  return new EngineClient(
    new InProcessPeer(tag, {
      identity: { name: `builtin ${agent}`, author: 'Test Author' },
      playerFactory: createAIPlayerFactory(agent, { seed }),
      fallbackSeed: seed,
    }),
    1000
  );
}

function scripted(tag: string, goReply: string[], timeoutMs = 1000): EngineClient {
  return new EngineClient(new ScriptedPeer(tag, scriptedEngine(tag, goReply)), timeoutMs);
}

const OPTIONS = { initialTimeMs: 60000, incrementMs: 0 };

describe('referee', () => {
  const clients: EngineClient[] = [];
  const track = (client: EngineClient): EngineClient => {
    clients.push(client);
    return client;
  };

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
  });

  it('plays a complete game between two built-in engines', async () => {
    const record = await playGame(
      track(builtin('p1', 'greedy', 1)),
      track(builtin('p2', 'random', 2)),
      OPTIONS
    );

    expect(record.reason).toBe('completed');
    expect(record.forfeitedBy).toBeUndefined();

    const final = replayMoves(record.moves);
    expect(final.sideToMove).toBeNull();
    expect(record.discs).toEqual(countDiscs(final.board));
    expect(record.winner).toBe(getWinner(final.board));
  });

  it('forfeits an illegal move', async () => {
    const peer = new ScriptedPeer('bad', scriptedEngine('bad', ['bestmove a1b']));
    const record = await playGame(
      track(new EngineClient(peer, 1000)),
      track(builtin('p2', 'greedy', 1)),
      OPTIONS
    );
    expect(record).toMatchObject({
      winner: 'white',
      reason: 'illegal_move',
      forfeitedBy: 'black',
      detail: 'illegal move "a1b"',
      moves: [],
    });
    expect(peer.sent).toEqual([
      'reversi_v1',
      'newgame b',
      'isready',
      'position startpos',
      'isready',
      'go btime=60000 wtime=60000 binc=0 winc=0',
    ]);
  });

  it('forfeits a bare bestmove when a move exists', async () => {
    const record = await playGame(
      track(builtin('p1', 'greedy', 1)),
      track(scripted('bad', ['bestmove'])),
      OPTIONS
    );
    expect(record).toMatchObject({
      winner: 'black',
      reason: 'missing_move',
      forfeitedBy: 'white',
    });
    expect(record.moves).toHaveLength(1);
  });

  it('forfeits an engine that never answers the handshake', async () => {
    const silent = new EngineClient(new ScriptedPeer('mute', () => []), 20);
    const record = await playGame(track(silent), track(builtin('p2', 'greedy', 1)), OPTIONS);
    expect(record).toMatchObject({
      winner: 'white',
      reason: 'engine_error',
      forfeitedBy: 'black',
      detail: '[mute] No response within 20ms',
    });
  });

  it('forfeits on time when the clock runs out', async () => {
    let clock = 0;
    const record = await playGame(
      track(scripted('slow', ['bestmove e3b'])),
      track(builtin('p2', 'greedy', 1)),
      { initialTimeMs: 1000, incrementMs: 0, now: () => (clock += 5000) }
    );
    expect(record).toMatchObject({
      winner: 'white',
      reason: 'time_forfeit',
      forfeitedBy: 'black',
      detail: 'exceeded clock by 4000ms',
    });
  });

  it('treats a go without an answer as a flag fall and skips its late bestmove next game', async () => {
    let goCount = 0;
    const answer = scriptedEngine('slow', []);
    const peer = new ScriptedPeer('slow', (line) => {
      if (line.startsWith('go')) {
        goCount++;
        return goCount === 1 ? [] : ['bestmove e3b'];
      }
      return answer(line);
    });
    const slow = track(new EngineClient(peer, 1000));
    const white = track(builtin('p2', 'greedy', 1));

    const first = await playGame(slow, white, {
      initialTimeMs: 20,
      incrementMs: 0,
      responseGraceMs: 0,
    });
    expect(first).toMatchObject({
      winner: 'white',
      reason: 'time_forfeit',
      forfeitedBy: 'black',
      detail: '[slow] No response within 20ms',
    });

    // The first game's answer arrives after the referee gave up on it.
    peer.deliver('bestmove e3b');

    // e3b is legal on move 1 and occupied by move 3.
    const second = await playGame(slow, white, OPTIONS);
    expect(second).toMatchObject({
      reason: 'illegal_move',
      forfeitedBy: 'black',
      detail: 'illegal move "e3b"',
    });
    expect(second.moves).toHaveLength(2);
    expect(peer.sent.filter((line) => line === 'reversi_v1')).toHaveLength(1);
  });

  it('runs a match with colours swapped after the first half', async () => {
    const p1 = track(builtin('p1', 'greedy', 3));
    const p2 = track(scripted('p2', ['bestmove a1b']));
    const blacks: string[] = [];

    const result = await runMatch(p1, p2, {
      ...OPTIONS,
      games: 3,
      onGame: (_index: number, _record: GameRecord, blackName: string) => blacks.push(blackName),
    });

    expect(blacks).toEqual(['builtin greedy', 'builtin greedy', 'p2']);
    expect(result).toMatchObject({ p1Wins: 3, p2Wins: 0, draws: 0 });
    expect(result.games.map((game) => game.reason)).toEqual([
      'illegal_move',
      'illegal_move',
      'illegal_move',
    ]);
  });
});
