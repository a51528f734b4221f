/**
 * Centralized Logging System
 *
 * Structured logging using Winston
 *
 * - JSON format for log aggregation (production)
 * - Console format for development readability
 * - Rotated file logs under LOGS_DIR (production)
 * - In-memory buffer of the most recent lines, served at `GET /?showlog=1`
 *
 * Usage:
 * ```typescript
 * import { logger } from './utils/logger';
 *
 * logger.info('Server started successfully');
 * logger.error('Renshuu call failed', { error: err.message });
 *
 * const requestLogger = logger.child({ requestId });
 * requestLogger.debug('Dispatching action', { action });
 * ```
 */

import winston from 'winston';
import { mkdirSync } from 'fs';
import { join, resolve } from 'path';
import { LOG_CONSTANTS } from '../../../shared/src';
import { RecentLogTransport } from './recent-log-transport';

const VALID_LEVELS: readonly string[] = LOG_CONSTANTS.LEVELS;

/**
 * LOG_LEVEL when it names a known level, otherwise the default
 *
 * Config validation warns about invalid values; winston would silently
 * drop every line under an unknown level.
 */
export function resolveLogLevel(value: string | undefined): string {
  return value !== undefined && VALID_LEVELS.includes(value) ? value : LOG_CONSTANTS.DEFAULT_LEVEL;
}

// Read straight from the environment: config validation logs through console
const LOG_LEVEL = resolveLogLevel(process.env.LOG_LEVEL);
const NODE_ENV = process.env.NODE_ENV || 'development';
const LOGS_DIR = resolve(process.env.LOGS_DIR || './logs');

/**
 * Development console format: human-readable with colors
 */
const developmentFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;

    const cleanMetadata = Object.fromEntries(
      Object.entries(metadata).filter(([key]) =>
        !['timestamp', 'level', 'message', 'splat', 'service', 'environment'].includes(key)
      )
    );

    if (Object.keys(cleanMetadata).length > 0) {
      msg += `\n  ${JSON.stringify(cleanMetadata, null, 2)}`;
    }

    return msg;
  })
);

/**
 * Production format: JSON with timestamp
 */
const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Recent lines for the log view
 */
export const recentLogs = new RecentLogTransport({
  format: winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
});

export const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: NODE_ENV === 'production' ? productionFormat : developmentFormat,
  defaultMeta: {
    service: 'renshuu-connect',
    environment: NODE_ENV,
  },
  transports: [
    new winston.transports.Console({
      format: NODE_ENV === 'production' ? productionFormat : developmentFormat,
      silent: NODE_ENV === 'test',
    }),
    recentLogs,
  ],
});

if (NODE_ENV === 'production') {
  mkdirSync(LOGS_DIR, { recursive: true });

  // Error log: only errors
  logger.add(
    new winston.transports.File({
      filename: join(LOGS_DIR, 'error.log'),
      level: 'error',
      maxsize: LOG_CONSTANTS.MAX_FILE_SIZE_BYTES,
      maxFiles: LOG_CONSTANTS.MAX_FILES,
      tailable: true,
    })
  );

  // Combined log: all levels
  logger.add(
    new winston.transports.File({
      filename: join(LOGS_DIR, 'combined.log'),
      maxsize: LOG_CONSTANTS.MAX_FILE_SIZE_BYTES,
      maxFiles: LOG_CONSTANTS.MAX_FILES,
      tailable: true,
    })
  );
}

/**
 * Stream interface for Morgan HTTP logging
 * Redirects Morgan output to Winston
 */
export const morganStream = {
  write: (message: string) => {
    // Remove trailing newline from Morgan
    logger.info(message.trim());
  },
};

logger.debug('Logger initialized', {
  level: LOG_LEVEL,
  environment: NODE_ENV,
  logsDirectory: LOGS_DIR,
  productionFileLogging: NODE_ENV === 'production',
});
