#!/usr/bin/env node
/**
 * Arena: play two reversi_v1 engines against each other and print the tally.
 *
 * Usage:
 *   node dist/scripts/run-arena.js <engine1> <engine2> [options]
 *
 * An engine is either a command line (run as a child process) or
 * `builtin:<agent>` for an in-process engine (agent: random, greedy).
 *
 * Options:
 *   --games <n>        Number of games, colours swapped at half time (default: 100)
 *   --time <ms>        Initial clock per side (default: 60000)
 *   --inc <ms>         Increment per move (default: 1000)
 *   --seed <n>         Seed for built-in engines
 *
 * Examples:
 *   node dist/scripts/run-arena.js builtin:greedy builtin:random --games 20
 *   node dist/scripts/run-arena.js "node dist/src/server/index.js" builtin:random
 */

import { AgentKindSchema } from '../src/server/config';
import { createAIPlayerFactory } from '../src/server/game/ai/AIPlayer';
import {
  ChildProcessPeer,
  EngineClient,
  InProcessPeer,
  runMatch,
  type EnginePeer,
} from '../src/server/arena';
import { logger } from '../src/server/utils/logger';

const BUILTIN_PREFIX = 'builtin:';

interface ArenaArgs {
  engines: string[];
  games: number;
  initialTimeMs: number;
  incrementMs: number;
  seed?: number;
}

function printUsage(): void {
  console.log(`
Arena

Usage:
  node dist/scripts/run-arena.js <engine1> <engine2> [options]

Options:
  --games <n>        Number of games, colours swapped at half time (default: 100)
  --time <ms>        Initial clock per side (default: 60000)
  --inc <ms>         Increment per move (default: 1000)
  --seed <n>         Seed for built-in engines
  `);
}

function parseArgs(): ArenaArgs {
  const args = process.argv.slice(2);
  const config: ArenaArgs = {
    engines: [],
    games: 100,
    initialTimeMs: 60000,
    incrementMs: 1000,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--games':
        config.games = parseInt(nextArg, 10) || 100;
        i++;
        break;
      case '--time':
        config.initialTimeMs = parseInt(nextArg, 10) || 60000;
        i++;
        break;
      case '--inc':
        config.incrementMs = parseInt(nextArg, 10) || 0;
        i++;
        break;
      case '--seed':
        config.seed = parseInt(nextArg, 10);
        i++;
        break;
      case '--help':
        printUsage();
        process.exit(0);
      default:
        config.engines.push(arg);
    }
  }

  if (config.engines.length !== 2) {
    printUsage();
    process.exit(2);
  }
  return config;
}

function createPeer(tag: string, spec: string, seed: number | undefined): EnginePeer {
  if (!spec.startsWith(BUILTIN_PREFIX)) {
    return new ChildProcessPeer(tag, spec);
  }
  const agent = AgentKindSchema.parse(spec.slice(BUILTIN_PREFIX.length));
  return new InProcessPeer(tag, {
    identity: { name: `builtin ${agent}`, author: 'arena' },
    playerFactory: createAIPlayerFactory(agent, { seed }),
    fallbackSeed: seed,
  });
}

async function main(): Promise<void> {
  const args = parseArgs();
  const p1 = new EngineClient(createPeer('p1', args.engines[0], args.seed));
  const p2 = new EngineClient(createPeer('p2', args.engines[1], args.seed));

  try {
    const result = await runMatch(p1, p2, {
      games: args.games,
      initialTimeMs: args.initialTimeMs,
      incrementMs: args.incrementMs,
    });
    console.log(`${p1.toString()} vs ${p2.toString()}`);
    console.log(`P1: ${result.p1Wins} P2: ${result.p2Wins} Draw: ${result.draws}`);
  } finally {
    await Promise.all([p1.close(), p2.close()]);
  }
}

main().catch((error: unknown) => {
  logger.error('Arena failed', { error: error instanceof Error ? error : String(error) });
  process.exit(1);
});
