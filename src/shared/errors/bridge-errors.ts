/**
 * Error hierarchy for upstream failures.
 * Every HTTP-level failure surfaces as an APIError tagged with a `kind`.
 */

export type APIErrorKind =
  | 'bad_request'
  | 'authentication'
  | 'permission_denied'
  | 'not_found'
  | 'conflict'
  | 'unprocessable_entity'
  | 'rate_limit'
  | 'internal_server'
  | 'generic';

/**
 * Raw upstream response kept on the error for callers that need it.
 */
export interface ErrorResponse {
  status: number;
  body?: unknown;
}

export const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

export class APIError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly kind: APIErrorKind = 'generic',
    public readonly response?: ErrorResponse
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  get body(): unknown {
    return this.response?.body;
  }

  toJSON() {
    return {
      error: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

export class BadRequestError extends APIError {
  constructor(message: string, response?: ErrorResponse) {
    super(message, 400, 'bad_request', response);
  }
}

export class AuthenticationError extends APIError {
  constructor(message: string, response?: ErrorResponse) {
    super(message, 401, 'authentication', response);
  }
}

export class PermissionDeniedError extends APIError {
  constructor(message: string, response?: ErrorResponse) {
    super(message, 403, 'permission_denied', response);
  }
}

export class NotFoundError extends APIError {
  constructor(message: string, response?: ErrorResponse) {
    super(message, 404, 'not_found', response);
  }
}

export class ConflictError extends APIError {
  constructor(message: string, response?: ErrorResponse) {
    super(message, 409, 'conflict', response);
  }
}

export class UnprocessableEntityError extends APIError {
  constructor(message: string, response?: ErrorResponse) {
    super(message, 422, 'unprocessable_entity', response);
  }
}

export class RateLimitError extends APIError {
  constructor(message: string, response?: ErrorResponse) {
    super(message, 429, 'rate_limit', response);
  }
}

export class InternalServerError extends APIError {
  constructor(message: string, statusCode: number = 500, response?: ErrorResponse) {
    super(message, statusCode, 'internal_server', response);
  }
}

/**
 * A stream ended (or was cut) before the terminal `message_stop` event.
 */
export class StreamIncompleteError extends Error {
  constructor(message = 'Stream ended before message_stop was received') {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Pull a human-readable message out of an upstream error body:
 * `{error: {message}}`, `{error: "..."}` or `{message}`.
 */
export function extractErrorMessage(body: unknown): string {
  if (!body || typeof body !== 'object') return UNKNOWN_ERROR_MESSAGE;

  if ('error' in body) {
    const error = body.error;
    if (error && typeof error === 'object') {
      return 'message' in error && typeof error.message === 'string' ? error.message : UNKNOWN_ERROR_MESSAGE;
    }
    if (error !== undefined && error !== null) {
      return String(error);
    }
  }

  if ('message' in body && typeof body.message === 'string') {
    return body.message;
  }

  return UNKNOWN_ERROR_MESSAGE;
}

export function mapError(statusCode: number, body?: unknown, response?: ErrorResponse): APIError {
  const message = extractErrorMessage(body);
  const raw = response ?? { status: statusCode, body };

  switch (statusCode) {
    case 400: return new BadRequestError(message, raw);
    case 401: return new AuthenticationError(message, raw);
    case 403: return new PermissionDeniedError(message, raw);
    case 404: return new NotFoundError(message, raw);
    case 409: return new ConflictError(message, raw);
    case 422: return new UnprocessableEntityError(message, raw);
    case 429: return new RateLimitError(message, raw);
  }

  if (statusCode >= 500) {
    return new InternalServerError(message, statusCode, raw);
  }
  return new APIError(message, statusCode, 'generic', raw);
}

/**
 * Transport-level failures (connection refused, timeout, reset) become
 * InternalServerError; APIErrors pass through.
 */
export function toAPIError(error: unknown): APIError {
  if (error instanceof APIError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalServerError(message);
}

export function isAPIError(error: unknown): error is APIError {
  return error instanceof APIError;
}
