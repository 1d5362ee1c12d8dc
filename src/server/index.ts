#!/usr/bin/env node
import { config } from './config';
import { ENGINE_USAGE, parseEngineArgs } from './cliArgs';
import { ProtocolSession } from './game/ProtocolSession';
import { createAIPlayerFactory } from './game/ai/AIPlayer';
import { createLineWriter, readLines } from './transport/lineTransport';
import { logger } from './utils/logger';

/**
 * Engine process entry point: reversi_v1 on stdin/stdout, logs on stderr.
 */
async function main(): Promise<void> {
  const parsed = parseEngineArgs(process.argv.slice(2), {
    agent: config.engine.agent,
    name: config.engine.name,
    author: config.engine.author,
    seed: config.engine.seed,
  });

  if (!parsed.ok) {
    process.stderr.write(`${parsed.error}\n${ENGINE_USAGE}`);
    process.exitCode = 2;
    return;
  }
  const { options } = parsed;
  if (options.help) {
    process.stdout.write(ENGINE_USAGE);
    return;
  }

  const session = new ProtocolSession({
    identity: { name: options.name, author: options.author },
    playerFactory: createAIPlayerFactory(options.agent, { seed: options.seed }),
    send: createLineWriter(process.stdout),
    budgetPolicy: config.search,
    fallbackSeed: options.seed,
  });

  logger.info('Engine started', {
    version: config.version,
    agent: options.agent,
    name: options.name,
  });

  await readLines(process.stdin, (line) => session.receive(line));

  // Input closed: let a running search commit its bestmove before exiting.
  await session.whenIdle();
  logger.info('Input closed, engine exiting');
}

main().catch((error: unknown) => {
  logger.error('Engine terminated unexpectedly', {
    error: error instanceof Error ? error : String(error),
  });
  process.exit(1);
});
