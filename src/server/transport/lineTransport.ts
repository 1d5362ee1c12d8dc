import readline from 'readline';
import type { Readable, Writable } from 'stream';

/**
 * Line framing over byte streams. The protocol core only ever sees whole
 * lines; this module is the only place that knows about `\n`.
 */

export type LineHandler = (line: string) => void;

/**
 * Feed every line of `input` to `onLine`, in order. Resolves when the
 * input ends.
 */
export function readLines(input: Readable, onLine: LineHandler): Promise<void> {
  return new Promise((resolve, reject) => {
    const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });
    rl.on('line', onLine);
    rl.once('close', () => resolve());
    // readline re-emits input errors on the interface.
    rl.once('error', (error) => {
      reject(error);
      rl.close();
    });
  });
}

/**
 * Returns a sink that writes one line (plus `\n`) per call.
 */
export function createLineWriter(output: Writable): (line: string) => void {
  return (line: string) => {
    output.write(`${line}\n`);
  };
}
