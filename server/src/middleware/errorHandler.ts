import { Request, Response, NextFunction } from 'express';
import { errorEnvelope } from '../../../shared/src';
import { RequestValidationError, toConnectError } from '../errors';
import { requestLogger } from './request-context';

/**
 * body-parser marks malformed JSON with this type
 */
function isBodyParseError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * 404 Not Found handler
 * Catches all unmatched routes
 */
export function notFoundHandler(
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  res.status(404).json({
    error: 'Not Found',
    message: `Cannot ${req.method} ${req.path}`,
    path: req.path,
  });
}

/**
 * AnkiConnect error handler
 *
 * AnkiConnect clients only read the body, so every failure is answered
 * with HTTP 200 and `{ result: null, error }`.
 */
export function ankiErrorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const connectError = isBodyParseError(err)
    ? new RequestValidationError([`body: ${err.message}`])
    : toConnectError(err);

  const log = requestLogger(res);
  if (connectError instanceof RequestValidationError) {
    log.warn('Rejected AnkiConnect request', { issues: connectError.issues });
  } else {
    log.error('AnkiConnect request failed', { error: connectError.toLogData() });
  }

  res.status(200).json(errorEnvelope(connectError.toUserMessage()));
}

/**
 * Global error handler
 * AnkiConnect errors never reach it; anything else is a 500
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  requestLogger(res).error('Request error', { error: err });

  const isDevelopment = process.env.NODE_ENV !== 'production';

  res.status(500).json({
    error: 'Internal Server Error',
    message: isDevelopment
      ? err.message
      : 'An unexpected error occurred. Please try again.',
    ...(isDevelopment && { stack: err.stack }),
  });
}
