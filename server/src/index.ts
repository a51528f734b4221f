// Config first: it loads .env before the logger reads the environment
import { Config, getConfig } from './config/env';
import { createServer, Server } from 'http';
import { createApp } from './app';
import { openDatabase, CacheDatabase } from './db/database';
import { CacheRepository } from './db/CacheRepository';
import { RenshuuApi } from './renshuu/RenshuuApi';
import { logger } from './utils/logger';
import { OPERATIONS } from './utils/logger-standards';

export interface RunningServer {
  server: Server;
  db: CacheDatabase;
}

/**
 * Stop accepting connections, close the cache, exit
 */
export function shutdown(
  { server, db }: RunningServer,
  signal: string,
  exit: (code: number) => void = (code) => process.exit(code)
): void {
  logger.info('Shutting down', { operation: OPERATIONS.SERVER_STOP, signal });

  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', { error });
    }
    db.close();
    exit(0);
  });

  // Keep-alive connections would hold close() open
  server.closeAllConnections();
}

/**
 * Start the HTTP server
 */
export async function start(config: Config = getConfig()): Promise<RunningServer> {
  const db = openDatabase(config.databasePath);
  const cache = new CacheRepository(db);

  const app = createApp({
    cache,
    createApi: (apiKey) =>
      new RenshuuApi({
        apiKey,
        baseUrl: config.renshuuApiUrl,
        timeoutMs: config.renshuuTimeoutMs,
      }),
    rateLimitPerMinute: config.rateLimitPerMinute,
    logLevel: config.logLevel,
  });

  const server = createServer(app);

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.port, config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    db.close();
    throw error;
  }

  const running = { server, db };
  process.once('SIGINT', () => shutdown(running, 'SIGINT'));
  process.once('SIGTERM', () => shutdown(running, 'SIGTERM'));

  logger.info('Server started successfully', {
    operation: OPERATIONS.SERVER_START,
    host: config.host,
    port: config.port,
    healthCheckUrl: `http://${config.host}:${config.port}/about`,
    databasePath: config.databasePath,
    logsDir: config.logsDir,
    environment: config.nodeEnv,
    logLevel: config.logLevel,
  });

  return running;
}

// Start server if this file is run directly
if (require.main === module) {
  start().catch((error: unknown) => {
    logger.error('Fatal error during startup', { error });
    process.exit(1);
  });
}
