/**
 * Unified Engine Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all server code should use.
 *
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed engine config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import {
  AgentKindSchema,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  loadEnvOrExit,
} from './env';

// Load .env into process.env before we read anything from it. Skipped under
// Jest so a developer's .env cannot leak into tests.
if (!isJestRuntime()) {
  dotenv.config();
}

const env = loadEnvOrExit(process.env);
const nodeEnv = getEffectiveNodeEnv(env);

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isTest: z.boolean(),
  version: z.string(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  engine: z.object({
    name: z.string().min(1),
    author: z.string().min(1),
    agent: AgentKindSchema,
    seed: z.number().int().optional(),
  }),
  search: z.object({
    movesToGo: z.number().int().min(1),
    safetyMarginMs: z.number().int().min(0),
    minBudgetMs: z.number().int().min(1),
    maxBudgetMs: z.number().int().min(1),
  }),
});

const preliminaryConfig = {
  nodeEnv,
  isTest: nodeEnv === 'test',
  version: env.npm_package_version ?? '0.0.0',
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  engine: {
    name: env.ENGINE_NAME,
    author: env.ENGINE_AUTHOR,
    agent: env.ENGINE_AGENT,
    seed: env.AGENT_SEED,
  },
  search: {
    movesToGo: env.SEARCH_MOVES_TO_GO,
    safetyMarginMs: env.SEARCH_SAFETY_MARGIN_MS,
    minBudgetMs: env.SEARCH_MIN_BUDGET_MS,
    maxBudgetMs: env.SEARCH_MAX_BUDGET_MS,
  },
};

/**
 * Engine configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
