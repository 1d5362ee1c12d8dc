/**
 * Configuration Module - Canonical Entry Point
 *
 * All server code should import from this module:
 *
 *   import { config } from './config';
 *
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly and validation
 * - `index.ts` (this file) - Canonical re-export point
 */

export { config } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  AgentKindSchema,
  parseEnv,
  loadEnv,
  loadEnvOrExit,
  getEffectiveNodeEnv,
} from './env';

export type {
  RawEnv,
  EnvValidationResult,
  NodeEnv,
  LogLevel,
  LogFormat,
  AgentKind,
} from './env';
