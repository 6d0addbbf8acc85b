/**
 * Error taxonomy
 *
 * Request-level errors propagate unchanged from adapters and codecs to the
 * caller, which maps them to a protocol response with `toErrorResponse`.
 * `UpstreamFormatError` is also used item-level inside `normalize`, where it
 * is recorded as a warning instead of thrown.
 */

import type { SourceId } from '../schemas/index.js';

export type ErrorKind =
  | 'AuthError'
  | 'RateLimitError'
  | 'NotFoundError'
  | 'UnsupportedOperationError'
  | 'BadRequestError'
  | 'UpstreamFormatError'
  | 'DecodingError'
  | 'EncodingError';

export abstract class ActivityCodecError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
  }
}

export class AuthError extends ActivityCodecError {
  readonly kind = 'AuthError';

  constructor(message: string, statusCode: 401 | 403 = 401) {
    super(message, statusCode);
    this.name = 'AuthError';
  }
}

export class RateLimitError extends ActivityCodecError {
  readonly kind = 'RateLimitError';

  /**
   * @param statusCode - 429, or the source's own throttling code (e.g. Twitter's 420)
   */
  constructor(message: string, statusCode: number = 429) {
    super(message, statusCode);
    this.name = 'RateLimitError';
  }
}

export class NotFoundError extends ActivityCodecError {
  readonly kind = 'NotFoundError';

  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class UnsupportedOperationError extends ActivityCodecError {
  readonly kind = 'UnsupportedOperationError';

  constructor(message: string) {
    super(message, 400);
    this.name = 'UnsupportedOperationError';
  }
}

export class BadRequestError extends ActivityCodecError {
  readonly kind = 'BadRequestError';

  constructor(message: string) {
    super(message, 400);
    this.name = 'BadRequestError';
  }
}

export class UpstreamFormatError extends ActivityCodecError {
  readonly kind = 'UpstreamFormatError';

  constructor(
    message: string,
    public readonly source?: SourceId,
    public readonly itemIndex?: number
  ) {
    super(message, 502);
    this.name = 'UpstreamFormatError';
  }
}

export class DecodingError extends ActivityCodecError {
  readonly kind = 'DecodingError';

  constructor(message: string) {
    super(message, 400);
    this.name = 'DecodingError';
  }
}

export class EncodingError extends ActivityCodecError {
  readonly kind = 'EncodingError';

  constructor(message: string) {
    super(message, 500);
    this.name = 'EncodingError';
  }
}

/**
 * Upstream failures an adapter can recognize in a raw payload
 */
export type UpstreamError = AuthError | RateLimitError | NotFoundError;

/**
 * Error body returned to clients
 */
export interface ErrorBody {
  error: ErrorKind | 'InternalError';
  message: string;
}

export interface ErrorResponse {
  status: number;
  body: ErrorBody;
}

/**
 * Map any thrown value to a status code and error body
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ActivityCodecError) {
    return {
      status: error.statusCode,
      body: { error: error.kind, message: error.message },
    };
  }

  return {
    status: 500,
    body: {
      error: 'InternalError',
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

/**
 * Shared default for operations a source does not support
 */
export function unsupported(source: SourceId, operation: string): never {
  throw new UnsupportedOperationError(`${source} does not support ${operation}`);
}

/**
 * Map an HTTP status reported by the fetch collaborator to an upstream error
 *
 * @returns null for statuses that are not request-level failures
 */
export function errorForStatus(source: SourceId, status: number, detail?: string): UpstreamError | null {
  const suffix = detail ? `: ${detail}` : '';
  switch (status) {
    case 401:
      return new AuthError(`${source} rejected the credentials${suffix}`, 401);
    case 403:
      return new AuthError(`${source} denied access${suffix}`, 403);
    case 404:
      return new NotFoundError(`${source} could not find the requested item${suffix}`);
    case 429:
      return new RateLimitError(`${source} rate limit exceeded${suffix}`, 429);
    default:
      return null;
  }
}
