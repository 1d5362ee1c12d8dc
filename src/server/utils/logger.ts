import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

// ============================================================================
// Winston Logger Configuration
// ============================================================================
//
// stdout carries reversi_v1 protocol lines and nothing else, so the console
// transport routes every level to stderr.

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = 'reversi-engine';
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (used for files and LOG_FORMAT=json).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    stderrLevels: LEVELS,
    // Tests assert on the session, not on log output.
    silent: config.isTest,
  }),
];

if (config.logging.file) {
  const logFile = path.resolve(config.logging.file);
  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  transports.push(
    new winston.transports.File({
      filename: logFile,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

/**
 * Create the Winston logger instance.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: 'reversi-engine',
    environment: config.nodeEnv,
  },
  transports,
});

/**
 * Child logger tagged with a component name, e.g. `engineLogger('session')`.
 */
export const engineLogger = (component: string): winston.Logger => logger.child({ component });

export { logger };
