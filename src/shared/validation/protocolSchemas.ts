import { z } from 'zod';

/**
 * Zod schemas for the argument sections of inbound reversi_v1 messages.
 *
 * The line grammar (command word, field splitting, `key=value` pairs) is
 * handled in messageGrammar.ts; these schemas validate the values once the
 * fields have been pulled apart.
 */

// --- newgame ---

export const NewGameColorSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['b', 'w']))
  .transform((letter) => (letter === 'b' ? ('black' as const) : ('white' as const)));

export type NewGameColor = z.infer<typeof NewGameColorSchema>;

// --- go ---

const MillisecondsSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer number of milliseconds')
  .transform((value) => Number(value))
  .pipe(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER));

export const GoFieldsSchema = z
  .object({
    btime: MillisecondsSchema,
    wtime: MillisecondsSchema,
    binc: MillisecondsSchema,
    winc: MillisecondsSchema,
  })
  .strict();

export type GoFields = z.infer<typeof GoFieldsSchema>;
