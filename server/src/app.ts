import express, { Application } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { SERVER_CONSTANTS } from '../../shared/src';
import { ActionDispatcher } from './anki/ActionDispatcher';
import { CacheRepository } from './db/CacheRepository';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createAnkiRateLimiter } from './middleware/rate-limit';
import { requestContext } from './middleware/request-context';
import aboutRouter from './routes/about';
import { createAnkiRouter } from './routes/anki';
import { createCacheRouter } from './routes/cache';
import { RenshuuClient, RenshuuService } from './services/RenshuuService';
import { morganStream } from './utils/logger';

export interface AppOptions {
  cache: CacheRepository;

  /** Renshuu client for a caller's API key */
  createApi: (apiKey: string) => RenshuuClient;

  /** AnkiConnect requests per minute per IP */
  rateLimitPerMinute?: number;

  /** 'debug' switches access logs to the short dev format */
  logLevel?: string;
}

/**
 * Create Express application with middleware and routes
 */
export function createApp(options: AppOptions): Application {
  const app: Application = express();

  app.disable('x-powered-by');

  // CORS: AnkiConnect clients run in browser extensions and web pages
  // of any origin
  app.use(
    cors({
      origin: true,
      credentials: true,
    })
  );

  app.use(requestContext);

  // Request logging; health checks would flood the log view
  app.use(
    morgan(options.logLevel === 'debug' ? 'dev' : 'combined', {
      stream: morganStream,
      skip: (req) => (req.url ?? '').startsWith(SERVER_CONSTANTS.HEALTH_CHECK_PATH),
    })
  );

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    next();
  });

  app.use(createAnkiRateLimiter(options.rateLimitPerMinute));

  const dispatcher = new ActionDispatcher(
    (apiKey) => new RenshuuService(options.createApi(apiKey), options.cache)
  );

  // Routes
  app.use('/', aboutRouter);
  app.use('/', createAnkiRouter(dispatcher));
  app.use('/cache', createCacheRouter(options.cache));

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // 500 handler (must be last)
  app.use(errorHandler);

  return app;
}
