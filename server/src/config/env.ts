import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { LOG_CONSTANTS, RATE_LIMIT_CONSTANTS, RENSHUU_CONSTANTS, SERVER_CONSTANTS } from '../../../shared/src';

// Load .env file from the working directory
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

/**
 * Application configuration interface
 */
export interface Config {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;

  /** Directory holding the SQLite cache */
  dataDir: string;
  logsDir: string;
  databasePath: string;

  renshuuApiUrl: string;
  renshuuTimeoutMs: number;
  rateLimitPerMinute: number;
}

type Env = Record<string, string | undefined>;

const VALID_LEVELS: readonly string[] = LOG_CONSTANTS.LEVELS;

/**
 * Validate and parse environment variables
 * @throws {Error} If required variables are invalid
 */
export function validateConfig(env: Env = process.env): Config {
  const port = parsePort(env.PORT);

  const nodeEnv = env.NODE_ENV || 'development';
  const validEnvs = ['development', 'production', 'test'];
  if (!validEnvs.includes(nodeEnv)) {
    // Use console.warn here as logger is not yet initialized during config validation
    console.warn(
      `⚠️  Warning: NODE_ENV "${nodeEnv}" is not standard (expected: ${validEnvs.join(', ')}). Using anyway.`
    );
  }

  let logLevel = env.LOG_LEVEL || LOG_CONSTANTS.DEFAULT_LEVEL;
  if (!VALID_LEVELS.includes(logLevel)) {
    console.warn(
      `⚠️  Warning: LOG_LEVEL "${logLevel}" is not valid (expected: ${VALID_LEVELS.join(', ')}). Defaulting to "${LOG_CONSTANTS.DEFAULT_LEVEL}".`
    );
    logLevel = LOG_CONSTANTS.DEFAULT_LEVEL;
  }

  const dataDir = ensureDirectory('DATA_DIR', env.DATA_DIR || './data');
  const logsDir = ensureDirectory('LOGS_DIR', env.LOGS_DIR || './logs');

  return {
    port,
    host: env.HOST || '127.0.0.1',
    nodeEnv,
    logLevel,
    dataDir,
    logsDir,
    databasePath: path.join(dataDir, SERVER_CONSTANTS.DATABASE_FILENAME),
    renshuuApiUrl: parseApiUrl(env.RENSHUU_API_URL),
    renshuuTimeoutMs: parsePositiveInt(
      'RENSHUU_TIMEOUT_MS',
      env.RENSHUU_TIMEOUT_MS,
      RENSHUU_CONSTANTS.DEFAULT_TIMEOUT_MS
    ),
    rateLimitPerMinute: parsePositiveInt(
      'RATE_LIMIT_PER_MINUTE',
      env.RATE_LIMIT_PER_MINUTE,
      RATE_LIMIT_CONSTANTS.DEFAULT_MAX_REQUESTS
    ),
  };
}

function parsePort(value: string | undefined): number {
  const portStr = value || String(SERVER_CONSTANTS.DEFAULT_PORT);
  const port = Number(portStr);

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(
      `Invalid PORT environment variable: "${portStr}". Must be a number between 1 and 65535.`
    );
  }

  return port;
}

/**
 * Parse RENSHUU_API_URL
 * The base must end with a slash so relative endpoint paths resolve below it.
 */
function parseApiUrl(value: string | undefined): string {
  const raw = value || RENSHUU_CONSTANTS.DEFAULT_API_URL;

  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Invalid RENSHUU_API_URL: "${raw}" is not a URL.`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid RENSHUU_API_URL: "${raw}" must use http or https.`);
  }

  return url.href.endsWith('/') ? url.href : `${url.href}/`;
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name} environment variable: "${value}". Must be a positive integer.`);
  }

  return parsed;
}

/**
 * Resolve a writable directory, creating it when missing
 *
 * @param envVarName - Name of environment variable (for error messages)
 * @returns Absolute directory path
 * @throws {Error} If the path exists but is not a directory
 */
function ensureDirectory(envVarName: string, configuredPath: string): string {
  const resolvedPath = path.resolve(configuredPath);

  try {
    fs.mkdirSync(resolvedPath, { recursive: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      throw new Error(`${envVarName}: Path exists but is not a directory: "${resolvedPath}"`);
    }
    if (error instanceof Error && 'code' in error && error.code === 'EACCES') {
      throw new Error(
        `${envVarName}: Permission denied creating directory: "${resolvedPath}". ` +
        `Ensure the server process has write access.`
      );
    }
    throw error;
  }

  if (!fs.statSync(resolvedPath).isDirectory()) {
    throw new Error(`${envVarName}: Path exists but is not a directory: "${resolvedPath}"`);
  }

  return resolvedPath;
}

let loaded: Config | undefined;

/**
 * Validated application configuration
 * Loaded on first use, then reused
 */
export function getConfig(): Config {
  if (!loaded) {
    loaded = validateConfig();
  }
  return loaded;
}
