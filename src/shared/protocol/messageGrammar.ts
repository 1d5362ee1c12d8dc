/**
 * reversi_v1 line grammar.
 *
 * Each message is one line. Fields are separated by any run of whitespace;
 * leading and trailing whitespace (including a `\r` left by CRLF
 * transports) is ignored.
 *
 * UI → engine:
 *   reversi_v1
 *   newgame (b|w)
 *   isready
 *   position startpos <move>*
 *   go btime=<int> wtime=<int> binc=<int> winc=<int>   (any order)
 *
 * engine → UI:
 *   id name <string> | id author <string> | reversi_v1_ok | readyok
 *   bestmove <move> | bestmove
 *
 * @module messageGrammar
 */

import { MalformedMessageError } from '../errors';
import { formatMove } from '../engine/notation';
import type { InboundMessage, OutboundMessage } from '../types/protocol';
import { GoFieldsSchema, NewGameColorSchema } from '../validation/protocolSchemas';

export type ParseResult =
  | { readonly ok: true; readonly message: InboundMessage }
  | { readonly ok: false; readonly error: MalformedMessageError };

/**
 * Split a line into whitespace-separated fields.
 */
export function tokenizeLine(line: string): string[] {
  const trimmed = line.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

export function parseInboundMessage(line: string): ParseResult {
  const fields = tokenizeLine(line);
  const fail = (detail: string): ParseResult => ({
    ok: false,
    error: new MalformedMessageError(line.trim(), detail),
  });

  if (fields.length === 0) {
    return fail('empty message');
  }
  const [command, ...args] = fields;

  switch (command) {
    case 'reversi_v1':
      return args.length > 0
        ? fail(`'reversi_v1' takes no arguments`)
        : { ok: true, message: { kind: 'reversi_v1' } };

    case 'isready':
      return args.length > 0
        ? fail(`'isready' takes no arguments`)
        : { ok: true, message: { kind: 'isready' } };

    case 'newgame': {
      if (args.length !== 1) {
        return fail(`'newgame' expects exactly one colour argument, got ${args.length}`);
      }
      const color = NewGameColorSchema.safeParse(args[0]);
      if (!color.success) {
        return fail(`invalid colour "${args[0]}", expected b or w`);
      }
      return { ok: true, message: { kind: 'newgame', color: color.data } };
    }

    case 'position': {
      const [origin, ...tokens] = args;
      if (origin !== 'startpos') {
        return fail(`'position' must start with 'startpos'`);
      }
      return { ok: true, message: { kind: 'position', tokens } };
    }

    case 'go':
      return parseGo(args, fail);

    default:
      return fail(`unknown command "${command}"`);
  }
}

function parseGo(args: string[], fail: (detail: string) => ParseResult): ParseResult {
  const fields = new Map<string, string>();
  for (const arg of args) {
    const separator = arg.indexOf('=');
    if (separator <= 0 || separator === arg.length - 1) {
      return fail(`expected key=value, got "${arg}"`);
    }
    const key = arg.slice(0, separator);
    if (fields.has(key)) {
      return fail(`duplicate key "${key}"`);
    }
    fields.set(key, arg.slice(separator + 1));
  }

  // fromEntries defines own properties, so a "__proto__" key stays a key.
  const parsed = GoFieldsSchema.safeParse(Object.fromEntries(fields));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'go'}: ${issue.message}`)
      .join('; ');
    return fail(detail);
  }
  return { ok: true, message: { kind: 'go', fields: parsed.data } };
}

/**
 * Render an outbound message as a single line (no trailing newline).
 * Embedded line breaks in id values are collapsed so framing stays intact.
 */
export function formatOutboundMessage(message: OutboundMessage): string {
  switch (message.kind) {
    case 'id':
      return `id ${message.field} ${message.value.replace(/\s+/g, ' ').trim()}`;
    case 'reversi_v1_ok':
      return 'reversi_v1_ok';
    case 'readyok':
      return 'readyok';
    case 'bestmove':
      return message.move === null ? 'bestmove' : `bestmove ${formatMove(message.move)}`;
  }
}
