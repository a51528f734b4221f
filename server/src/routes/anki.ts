import express, { Router, Request, Response, NextFunction } from 'express';
import { SERVER_CONSTANTS } from '../../../shared/src';
import { ActionDispatcher } from '../anki/ActionDispatcher';
import { ankiErrorHandler } from '../middleware/errorHandler';
import { requestLogger } from '../middleware/request-context';
import { sanitizeForLogging } from '../utils/logger-standards';

/**
 * AnkiConnect endpoint
 * POST /
 *
 * Clients do not reliably send a JSON content type, so the body is
 * parsed as JSON whatever the header says.
 */
export function createAnkiRouter(dispatcher: ActionDispatcher): Router {
  const router: Router = Router();

  router.post(
    '/',
    express.json({ type: () => true, limit: SERVER_CONSTANTS.MAX_BODY_SIZE }),
    async (req: Request, res: Response, next: NextFunction) => {
      const log = requestLogger(res);
      if (typeof req.body === 'object' && req.body !== null && !Array.isArray(req.body)) {
        log.debug('AnkiConnect request', { body: sanitizeForLogging(req.body) });
      }

      try {
        const result = await dispatcher.handle(req.body, log);
        res.status(200).json(result);
      } catch (error) {
        next(error);
      }
    }
  );

  router.use(ankiErrorHandler);

  return router;
}
