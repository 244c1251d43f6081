/**
 * Structured error classes for the API server.
 */

/**
 * Error codes used throughout the server.
 */
export const ErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  COMMAND_ERROR: 'COMMAND_ERROR',
  WEB_REQUEST_ERROR: 'WEB_REQUEST_ERROR',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  UNKNOWN_ENDPOINT: 'UNKNOWN_ENDPOINT',
  DUPLICATE_ENDPOINT: 'DUPLICATE_ENDPOINT',
  MULTIPLE_RESPONSE: 'MULTIPLE_RESPONSE',
  SOCKET_ERROR: 'SOCKET_ERROR',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Wire shape of an error reported to a client.
 */
export interface ErrorPayload {
  error: 'WebRequestError';
  message: string;
}

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging.
   */
  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a request envelope fails structural validation.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Recoverable domain error.
 *
 * Host modules and endpoint handlers throw this (or a subclass) to report a
 * failure to the requesting client without escalating to a host shutdown.
 */
export class CommandError extends BaseError {
  readonly code: ErrorCodeType = ErrorCode.COMMAND_ERROR;
}

/**
 * Error reported back to a client as `{ error: 'WebRequestError', message }`.
 */
export class WebRequestError extends CommandError {
  readonly code: ErrorCodeType = ErrorCode.WEB_REQUEST_ERROR;

  toDict(): ErrorPayload {
    return {
      error: 'WebRequestError',
      message: this.message,
    };
  }
}

/**
 * Thrown when a request argument is missing or has the wrong type.
 */
export class InvalidArgumentError extends WebRequestError {
  readonly code: ErrorCodeType = ErrorCode.INVALID_ARGUMENT;

  constructor(message: string) {
    super(message);
  }
}

/**
 * Thrown when a request targets a path with no registered handler.
 */
export class UnknownEndpointError extends WebRequestError {
  readonly code: ErrorCodeType = ErrorCode.UNKNOWN_ENDPOINT;

  constructor(path: string) {
    super(`No registered callback for path '${path}'`);
  }
}

/**
 * Thrown when a path is registered twice.
 */
export class DuplicateEndpointError extends WebRequestError {
  readonly code: ErrorCodeType = ErrorCode.DUPLICATE_ENDPOINT;

  constructor(path: string) {
    super(`Path already registered to an endpoint: ${path}`);
  }
}

/**
 * Thrown when a handler sends more than one response.
 */
export class MultipleResponseError extends WebRequestError {
  readonly code: ErrorCodeType = ErrorCode.MULTIPLE_RESPONSE;

  constructor() {
    super('Multiple calls to send not allowed');
  }
}

/**
 * Non-blocking socket failure, tagged with an errno-style name.
 */
export class SocketError extends BaseError {
  readonly code = 'SOCKET_ERROR' as const;
  readonly errno: string;

  constructor(errno: string, message = errno) {
    super(message);
    this.errno = errno;
  }
}

const RETRYABLE_ERRNOS = new Set(['EAGAIN', 'EWOULDBLOCK', 'ENOBUFS', 'EINTR']);

/**
 * Whether a send/recv failure may succeed if attempted again later.
 */
export function isRetryableSocketError(err: unknown): boolean {
  return err instanceof SocketError && RETRYABLE_ERRNOS.has(err.errno);
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}
