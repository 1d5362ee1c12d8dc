import { AgentKindSchema, type AgentKind } from './config';

/**
 * Command line options for the engine process. Environment variables
 * (see config/env.ts) provide the defaults; flags override them.
 */
export interface EngineCliOptions {
  agent: AgentKind;
  name: string;
  author: string;
  seed?: number;
  help: boolean;
}

export type EngineCliParseResult =
  | { ok: true; options: EngineCliOptions }
  | { ok: false; error: string };

export const ENGINE_USAGE = `
Reversi engine (reversi_v1 over stdin/stdout)

Usage:
  reversi-engine [options]

Options:
  --agent <kind>     Move selection agent: random, greedy (default: ENGINE_AGENT or greedy)
  --name <string>    Name announced in the handshake (default: ENGINE_NAME)
  --author <string>  Author announced in the handshake (default: ENGINE_AUTHOR)
  --seed <n>         Seed for reproducible tie-breaking (default: AGENT_SEED)
  --help             Show this help
`;

export function parseEngineArgs(
  args: ReadonlyArray<string>,
  defaults: Omit<EngineCliOptions, 'help'>
): EngineCliParseResult {
  const options: EngineCliOptions = { ...defaults, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--agent': {
        const agent = AgentKindSchema.safeParse(nextArg);
        if (!agent.success) {
          return { ok: false, error: `--agent expects random or greedy, got "${nextArg ?? ''}"` };
        }
        options.agent = agent.data;
        i++;
        break;
      }
      case '--name':
      case '--author':
        if (nextArg === undefined || nextArg.trim().length === 0) {
          return { ok: false, error: `${arg} expects a value` };
        }
        if (arg === '--name') {
          options.name = nextArg;
        } else {
          options.author = nextArg;
        }
        i++;
        break;
      case '--seed': {
        const seed = nextArg === undefined || nextArg.trim() === '' ? NaN : Number(nextArg);
        if (!Number.isInteger(seed)) {
          return { ok: false, error: `--seed expects an integer, got "${nextArg ?? ''}"` };
        }
        options.seed = seed;
        i++;
        break;
      }
      case '--help':
        options.help = true;
        break;
      default:
        return { ok: false, error: `Unknown option "${arg}"` };
    }
  }

  return { ok: true, options };
}
