/**
 * Logger Standards for renshuu-connect
 *
 * Operation names, request identifiers and helpers that keep log
 * entries consistent across routes and services.
 *
 * @packageDocumentation
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Standard log context fields
 */
export interface LogContext {
  /** Unique request identifier for tracing one HTTP request */
  requestId?: string;

  /** Operation name (see OPERATIONS) */
  operation?: string;

  /** AnkiConnect action being served */
  action?: string;

  /** Renshuu schedule id */
  listId?: string;

  [key: string]: unknown;
}

/**
 * Standard operation names
 */
export const OPERATIONS = {
  // AnkiConnect
  ACTION_DISPATCH: 'anki:dispatch',
  ACTION_FAILED: 'anki:failed',

  // Renshuu API
  API_REQUEST: 'renshuu:request',
  API_RETRY: 'renshuu:retry',

  // Cache
  LIST_SYNC: 'cache:list_sync',
  LIST_DROP: 'cache:list_drop',
  WORD_LOOKUP: 'cache:word_lookup',

  // Server lifecycle
  SERVER_START: 'server:start',
  SERVER_STOP: 'server:stop',
} as const;

/**
 * Generate a request identifier
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Create standardized log context
 *
 * @example
 * ```typescript
 * logger.info('List cached', createLogContext(OPERATIONS.LIST_SYNC, { listId, pages }));
 * ```
 */
export function createLogContext(
  operation: string,
  additionalContext?: Record<string, unknown>
): LogContext {
  return {
    operation,
    ...additionalContext,
  };
}

/**
 * Format duration for logging
 *
 * @example
 * ```typescript
 * const start = Date.now();
 * // ... operation ...
 * logger.info('Operation completed', { operation, ...formatDuration(Date.now() - start) });
 * // Logs: { operation: '...', durationMs: 1234, durationSeconds: 1.234 }
 * ```
 */
export function formatDuration(durationMs: number): {
  durationMs: number;
  durationSeconds: number;
} {
  return {
    durationMs,
    durationSeconds: Number((durationMs / 1000).toFixed(3)),
  };
}

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'apikey', 'api_key', 'authorization', 'cookie'];

// Exact names only: "key" is the Renshuu API key in AnkiConnect requests
const SENSITIVE_EXACT_KEYS = ['key'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sanitize sensitive data for logging
 *
 * @example
 * ```typescript
 * logger.debug('Request body', sanitizeForLogging({ action: 'version', key: 'abc' }));
 * // Logs: { action: 'version', key: '[REDACTED]' }
 * ```
 */
export function sanitizeForLogging(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase();

    if (
      SENSITIVE_EXACT_KEYS.includes(lowerKey) ||
      SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))
    ) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeForLogging(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
