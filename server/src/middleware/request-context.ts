import { Request, Response, NextFunction } from 'express';
import type { Logger } from 'winston';
import { logger } from '../utils/logger';
import { generateRequestId } from '../utils/logger-standards';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Tag every request with an id, echoed in the response headers
 */
export function requestContext(_req: Request, res: Response, next: NextFunction): void {
  res.setHeader(REQUEST_ID_HEADER, generateRequestId());
  next();
}

/**
 * Child logger carrying the request id of the response
 */
export function requestLogger(res: Response): Logger {
  const requestId = res.getHeader(REQUEST_ID_HEADER);
  return typeof requestId === 'string' ? logger.child({ requestId }) : logger;
}
