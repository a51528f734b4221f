/**
 * Shared Constants for renshuu-connect
 *
 * Protocol values, container contract values and limits used by the
 * server and its tests.
 *
 * @packageDocumentation
 */

/**
 * AnkiConnect Protocol Constants
 */
export const ANKI_CONSTANTS = {
  /** Protocol version reported by the `version` action */
  PROTOCOL_VERSION: 2,

  /** Note types offered to clients */
  MODEL_NAMES: ['Default', 'with jmdictId'],

  /** Fields every note type carries */
  MODEL_FIELD_NAMES: ['Japanese', 'English', 'jmdictId'],

  /** Error detail for notes already present in their schedule */
  DUPLICATE_NOTE_ERROR: 'cannot create note because it is a duplicate',
} as const;

/**
 * Renshuu API Constants
 */
export const RENSHUU_CONSTANTS = {
  /** Public REST API root */
  DEFAULT_API_URL: 'https://api.renshuu.org/v1/',

  /** Per-call timeout in milliseconds (15 seconds) */
  DEFAULT_TIMEOUT_MS: 15_000,

  /** Error text Renshuu returns when re-adding a word to a schedule */
  ALREADY_IN_SCHEDULE_ERROR: 'This term is already present in the schedule.',

  /** Term type of vocabulary schedules */
  VOCAB_TERMTYPE: 'vocab',

  /** Retry attempts for read calls */
  RETRY_MAX_ATTEMPTS: 3,

  /** Initial retry delay in milliseconds */
  RETRY_INITIAL_DELAY_MS: 500,
} as const;

/**
 * Server and Container Contract Constants
 */
export const SERVER_CONSTANTS = {
  /** Default HTTP port (the AnkiConnect port) */
  DEFAULT_PORT: 8_765,

  /** Liveness route polled by the container health check */
  HEALTH_CHECK_PATH: '/about',

  /** Cache database file name inside DATA_DIR */
  DATABASE_FILENAME: 'renshuu_cache.db',

  /** Maximum accepted request body */
  MAX_BODY_SIZE: '50mb',
} as const;

/**
 * Logging Constants
 */
export const LOG_CONSTANTS = {
  /** Accepted LOG_LEVEL values */
  LEVELS: ['error', 'warn', 'info', 'debug'],

  /** Level used when LOG_LEVEL is unset or invalid */
  DEFAULT_LEVEL: 'info',

  /** Lines kept for the `/?showlog=1` view */
  RECENT_LOG_LINES: 100,

  /** Rotated log file size in bytes (10MB) */
  MAX_FILE_SIZE_BYTES: 10 * 1024 * 1024,

  /** Rotated log files kept */
  MAX_FILES: 5,
} as const;

/**
 * Rate Limiting Constants
 */
export const RATE_LIMIT_CONSTANTS = {
  /** Rate limit window in milliseconds (1 minute) */
  WINDOW_MS: 60_000,

  /** Default requests per window per IP */
  DEFAULT_MAX_REQUESTS: 300,
} as const;
