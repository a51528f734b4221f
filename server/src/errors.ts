/**
 * Custom Error Classes for renshuu-connect
 *
 * Typed errors for the failure modes of an AnkiConnect request:
 * malformed requests, unsupported actions, and failing Renshuu API calls.
 * Every error knows the message shown to the AnkiConnect client.
 */

/**
 * Base class for all renshuu-connect errors
 */
export abstract class ConnectError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly statusCode: number;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    retryable: boolean = false,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = retryable;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Message for the AnkiConnect error envelope
   */
  public toUserMessage(): string {
    return this.message;
  }

  /**
   * Get structured error data for logging
   */
  public toLogData(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      retryable: this.retryable,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown when a request body does not match the protocol
 */
export class RequestValidationError extends ConnectError {
  public readonly issues: string[];

  constructor(issues: string[], context: Record<string, unknown> = {}) {
    super(`Invalid request: ${issues.join('; ')}`, 'REQUEST_VALIDATION_FAILED', 400, false, context);
    this.issues = issues;
  }
}

/**
 * Error thrown for actions this server does not implement
 */
export class UnsupportedActionError extends ConnectError {
  constructor(action: string, context: Record<string, unknown> = {}) {
    super(`Unsupported action: ${action}`, 'UNSUPPORTED_ACTION', 400, false, { action, ...context });
  }
}

/**
 * Error reported by the Renshuu API itself
 *
 * Either an HTTP error status or a JSON body carrying an `error` field.
 */
export class RenshuuApiError extends ConnectError {
  public readonly httpStatus: number;

  constructor(message: string, httpStatus: number, context: Record<string, unknown> = {}) {
    super(message, 'RENSHUU_API_ERROR', 502, httpStatus >= 500 || httpStatus === 429, {
      httpStatus,
      ...context,
    });
    this.httpStatus = httpStatus;
  }

  public toUserMessage(): string {
    if (this.httpStatus === 401 || this.httpStatus === 403) {
      return `Renshuu rejected the API key: ${this.message}`;
    }
    return `Renshuu API error: ${this.message}`;
  }
}

/**
 * Error thrown when Renshuu cannot be reached or does not answer in time
 */
export class RenshuuNetworkError extends ConnectError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RENSHUU_UNREACHABLE', 503, true, context);
  }

  public toUserMessage(): string {
    return 'Renshuu is temporarily unreachable. Please try again later.';
  }
}

/**
 * Error thrown for failures inside the server
 */
export class InternalError extends ConnectError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INTERNAL_ERROR', 500, false, context);
  }

  public toUserMessage(): string {
    return `${this.context.originalName ?? 'Error'}: ${this.message}`;
  }
}

/**
 * Utility to detect if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ConnectError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('timeout') ||
      message.includes('socket hang up') ||
      message.includes('fetch failed')
    );
  }

  return false;
}

/**
 * Utility to convert unknown errors to ConnectError
 */
export function toConnectError(error: unknown, defaultMessage: string = 'Unknown error'): ConnectError {
  if (error instanceof ConnectError) {
    return error;
  }

  if (error instanceof Error) {
    if (isRetryableError(error)) {
      return new RenshuuNetworkError(error.message);
    }
    return new InternalError(error.message, { originalName: error.name });
  }

  return new InternalError(defaultMessage, { originalError: String(error) });
}
