/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables the
 * engine reads, validates them at startup, and exports a typed env object.
 */

import { z } from 'zod';
import { ConfigurationError } from '../../shared/errors';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Move-selection agents shipped with the engine.
 */
export const AgentKindSchema = z.enum(['random', 'greedy']);
export type AgentKind = z.infer<typeof AgentKindSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional log file; stdout is reserved for protocol traffic. */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // ENGINE IDENTITY & AGENT
  // ===================================================================

  ENGINE_NAME: z.string().min(1).default('Reversi Engine 1.0'),

  ENGINE_AUTHOR: z.string().min(1).default('Reversi Engine Contributors'),

  ENGINE_AGENT: AgentKindSchema.default('greedy'),

  /** Seed for reproducible random tie-breaking. */
  AGENT_SEED: z.coerce.number().int().optional(),

  // ===================================================================
  // SEARCH BUDGET
  // ===================================================================

  SEARCH_MOVES_TO_GO: z.coerce.number().int().min(1).default(20),

  SEARCH_SAFETY_MARGIN_MS: z.coerce.number().int().min(0).default(50),

  SEARCH_MIN_BUDGET_MS: z.coerce.number().int().min(1).default(10),

  SEARCH_MAX_BUDGET_MS: z.coerce.number().int().min(1).default(5000),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  if (result.data.SEARCH_MIN_BUDGET_MS > result.data.SEARCH_MAX_BUDGET_MS) {
    return {
      success: false,
      errors: [
        {
          path: 'SEARCH_MIN_BUDGET_MS',
          message: 'must not exceed SEARCH_MAX_BUDGET_MS',
        },
      ],
    };
  }

  return { success: true, data: result.data };
}

/**
 * Parse env, throwing a {@link ConfigurationError} that lists every problem.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success) {
    const lines = result.errors.map((error) => `  - ${error.path || 'root'}: ${error.message}`);
    throw new ConfigurationError(['Invalid environment configuration:', ...lines].join('\n'), {
      paths: result.errors.map((error) => error.path),
    });
  }

  return result.data;
}

/**
 * Parse env or terminate the process with a readable list of problems.
 */
export function loadEnvOrExit(env: NodeJS.ProcessEnv = process.env): RawEnv {
  try {
    return loadEnv(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
