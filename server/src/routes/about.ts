import { Router, Request, Response } from 'express';
import { LOG_CONSTANTS } from '../../../shared/src';
import { recentLogs } from '../utils/logger';

const router: Router = Router();

// Repeated parameters arrive as arrays; the last one wins
function lastQueryValue(value: unknown): string | undefined {
  const last = Array.isArray(value) ? value[value.length - 1] : value;
  return typeof last === 'string' ? last : undefined;
}

/**
 * Liveness endpoint, polled by the container health check
 * GET /about
 * Returns: "renshuu-connect is running!\nPID = <pid>"
 *
 * Must stay free of database and Renshuu calls.
 */
router.get('/about', (_req: Request, res: Response) => {
  res.type('text/plain').send(`renshuu-connect is running!\nPID = ${process.pid}`);
});

/**
 * Log view
 * GET /?showlog=1
 * Returns the most recent log lines, or an empty body without `showlog`
 */
router.get('/', (req: Request, res: Response) => {
  const showlog = lastQueryValue(req.query.showlog) ?? '0';
  res.type('text/plain');

  if (showlog === '0') {
    res.send('');
    return;
  }

  const lines = recentLogs.getLines();
  res.send(`Last ${LOG_CONSTANTS.RECENT_LOG_LINES} log messages:\n\n${lines.map((line) => `${line}\n`).join('')}`);
});

export default router;
