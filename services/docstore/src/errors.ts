/** Error codes reported to clients in the `error` field of a failure body. */
export type DocumentErrorCode =
  | 'routing_error'
  | 'validation_error'
  | 'not_found'
  | 'store_error'
  | 'store_timeout'
  | 'internal_error';

/** Standard failure body: `{ error, detail }`. */
export interface ErrorBody {
  error: DocumentErrorCode | string;
  detail: string;
}

export abstract class DocumentError extends Error {
  abstract readonly code: DocumentErrorCode;
  abstract readonly statusCode: number;

  toBody(): ErrorBody {
    return { error: this.code, detail: this.message };
  }
}

/** Malformed resource address. Raised before the store is touched. */
export class RoutingError extends DocumentError {
  readonly code = 'routing_error' as const;
  readonly statusCode = 400;
  name = 'RoutingError';
}

/** Missing or unparseable request body. */
export class ValidationError extends DocumentError {
  readonly code = 'validation_error' as const;
  readonly statusCode = 400;
  name = 'ValidationError';
}

export class NotFoundError extends DocumentError {
  readonly code = 'not_found' as const;
  readonly statusCode = 404;
  name = 'NotFoundError';
}

export class StoreError extends DocumentError {
  readonly code: 'store_error' | 'store_timeout';
  readonly statusCode = 500;
  name = 'StoreError';

  constructor(message: string, options: { timeout?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.code = options.timeout ? 'store_timeout' : 'store_error';
  }
}

export class InternalError extends DocumentError {
  readonly code = 'internal_error' as const;
  readonly statusCode = 500;
  name = 'InternalError';
}

/** Wraps a driver failure, passing through errors that are already classified. */
export function toStoreError(err: unknown, operation: string): DocumentError {
  if (err instanceof DocumentError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new StoreError(`${operation} failed: ${message}`, { cause: err });
}

/**
 * Maps any thrown value to a classified error. Errors carrying a 4xx
 * `statusCode` (Fastify's own, e.g. unsupported media type) keep their status.
 */
export function classifyError(err: unknown): { statusCode: number; body: ErrorBody } {
  if (err instanceof DocumentError) {
    return { statusCode: err.statusCode, body: err.toBody() };
  }
  if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : 'bad_request';
    return { statusCode: err.statusCode, body: { error: code, detail: err.message } };
  }
  return { statusCode: 500, body: new InternalError('internal server error').toBody() };
}
