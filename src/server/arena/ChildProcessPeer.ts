import { spawn, type ChildProcessByStdio } from 'child_process';
import readline from 'readline';
import type { Readable, Writable } from 'stream';
import { engineLogger } from '../utils/logger';
import { LineQueue, type EnginePeer } from './EnginePeer';

const logger = engineLogger('engine-process');

const EXIT_GRACE_MS = 2000;

/**
 * Split an engine command line on whitespace: `"node dist/server/index.js --agent random"`.
 */
export function splitCommand(command: string): { file: string; args: string[] } {
  const [file, ...args] = command.trim().split(/\s+/);
  if (!file) {
    throw new Error('Engine command is empty');
  }
  return { file, args };
}

/**
 * Engine peer running as a child process, speaking reversi_v1 over its
 * stdin/stdout. The child's stderr is passed through.
 */
export class ChildProcessPeer implements EnginePeer {
  private readonly queue: LineQueue;
  private readonly child: ChildProcessByStdio<Writable, Readable, null>;
  private readonly exited: Promise<void>;

  constructor(
    readonly tag: string,
    command: string
  ) {
    const { file, args } = splitCommand(command);
    this.queue = new LineQueue(tag);
    this.child = spawn(file, args, { stdio: ['pipe', 'pipe', 'inherit'] });

    const rl = readline.createInterface({ input: this.child.stdout, crlfDelay: Infinity });
    rl.on('line', (line) => {
      logger.debug('recv', { peer: tag, line });
      this.queue.push(line);
    });

    this.exited = new Promise<void>((resolve) => {
      this.child.once('exit', (code, signal) => {
        logger.info('Engine process exited', { peer: tag, code, signal });
        this.queue.close(`process exited (code ${String(code)}, signal ${String(signal)})`);
        resolve();
      });
      this.child.once('error', (error) => {
        logger.error('Engine process failed', { peer: tag, error });
        this.queue.close(`process failed: ${error.message}`);
        resolve();
      });
    });
  }

  send(line: string): void {
    logger.debug('send', { peer: this.tag, line });
    this.child.stdin.write(`${line}\n`);
  }

  readLine(timeoutMs: number): Promise<string> {
    return this.queue.next(timeoutMs);
  }

  async close(): Promise<void> {
    this.child.stdin.end();
    const timer = setTimeout(() => this.child.kill(), EXIT_GRACE_MS);
    try {
      await this.exited;
    } finally {
      clearTimeout(timer);
    }
  }
}
