import { EngineErrorCode, PeerError } from '../../shared/errors';

/**
 * One engine as seen from the referee: a bidirectional line channel.
 */
export interface EnginePeer {
  /** Short label used in logs and errors ("p1", "p2"). */
  readonly tag: string;
  send(line: string): void;
  /** Next line from the engine; rejects with a PeerError on timeout or close. */
  readLine(timeoutMs: number): Promise<string>;
  close(): Promise<void>;
}

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: PeerError) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * FIFO of lines produced by an engine, with timed reads.
 */
export class LineQueue {
  private readonly lines: string[] = [];
  private readonly pending: PendingRead[] = [];
  private closedWith: PeerError | null = null;

  constructor(private readonly tag: string) {}

  push(line: string): void {
    const reader = this.pending.shift();
    if (reader) {
      clearTimeout(reader.timer);
      reader.resolve(line);
      return;
    }
    this.lines.push(line);
  }

  /**
   * No more lines will arrive. Buffered lines stay readable.
   */
  close(detail: string): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = new PeerError(EngineErrorCode.PEER_CLOSED, this.tag, detail);
    for (const reader of this.pending.splice(0)) {
      clearTimeout(reader.timer);
      reader.reject(this.closedWith);
    }
  }

  next(timeoutMs: number): Promise<string> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }

    return new Promise<string>((resolve, reject) => {
      const reader: PendingRead = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.pending.indexOf(reader);
          if (index >= 0) {
            this.pending.splice(index, 1);
          }
          reject(
            new PeerError(
              EngineErrorCode.PEER_TIMEOUT,
              this.tag,
              `No response within ${timeoutMs}ms`,
              { timeoutMs }
            )
          );
        }, timeoutMs),
      };
      this.pending.push(reader);
    });
  }
}
