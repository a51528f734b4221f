import { Router, Request, Response } from 'express';
import { CacheRepository } from '../db/CacheRepository';
import { requestLogger } from '../middleware/request-context';
import { OPERATIONS, createLogContext } from '../utils/logger-standards';

/**
 * Cache administration
 *
 * GET    /cache/lists/:listId  cached membership count of a schedule
 * DELETE /cache/lists/:listId  forget a schedule's memberships, so the
 *                              next addNote re-reads it from Renshuu
 */
export function createCacheRouter(cache: CacheRepository): Router {
  const router: Router = Router();

  router.get('/lists/:listId', (req: Request, res: Response) => {
    const { listId } = req.params;
    res.json({ list_id: listId, cached_count: cache.countMemberships(listId) });
  });

  router.delete('/lists/:listId', (req: Request, res: Response) => {
    const { listId } = req.params;
    const deleted = cache.dropList(listId);

    requestLogger(res).info('Dropped list cache', createLogContext(OPERATIONS.LIST_DROP, { listId, deleted }));
    res.json({ deleted_count: deleted, list_id: listId });
  });

  return router;
}
