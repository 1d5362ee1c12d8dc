import { ProtocolSession, type ProtocolSessionOptions } from '../game/ProtocolSession';
import { LineQueue, type EnginePeer } from './EnginePeer';

/**
 * Engine peer backed by a ProtocolSession in the same process. Lines go
 * through the full grammar in both directions, exactly as over a pipe.
 */
export class InProcessPeer implements EnginePeer {
  private readonly queue: LineQueue;
  private readonly session: ProtocolSession;

  constructor(
    readonly tag: string,
    options: Omit<ProtocolSessionOptions, 'send'>
  ) {
    this.queue = new LineQueue(tag);
    this.session = new ProtocolSession({
      ...options,
      send: (line) => this.queue.push(line),
    });
  }

  send(line: string): void {
    this.session.receive(line);
  }

  readLine(timeoutMs: number): Promise<string> {
    return this.queue.next(timeoutMs);
  }

  async close(): Promise<void> {
    this.session.dispose();
    await this.session.whenIdle();
    this.queue.close('session closed');
  }
}
