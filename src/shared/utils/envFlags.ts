// Helpers for reading environment flags. Kept outside the config module so
// shared code can check them without pulling in config validation.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * has been set to something else.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}
