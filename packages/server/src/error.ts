/**
 * Error handling
 *
 * API error types and the mapping from any thrown value to an HTTP status
 * and `{ status: "error", message }` body.
 */

import { ImageError } from '@pixhold/services';

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }

  static badRequest(message: string): ApiError {
    return new ApiError(400, message);
  }

  static notFound(message: string = 'Not Found'): ApiError {
    return new ApiError(404, message);
  }
}

export interface HttpError {
  statusCode: number;
  message: string;
}

export function statusForImageError(error: ImageError): number {
  switch (error.code) {
    case 'validation_failed':
      return error.kind === 'TooLarge' ? 413 : 400;
    case 'invalid_page':
      return 400;
    case 'not_found':
      return 404;
    case 'storage_write_failed':
    case 'metadata_write_failed':
    case 'metadata_delete_failed':
      return 500;
  }
}

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof ApiError) {
    return { statusCode: error.statusCode, message: error.message };
  }

  if (error instanceof ImageError) {
    return { statusCode: statusForImageError(error), message: error.message };
  }

  // Fastify and plugin errors (bad content type, malformed body, ...)
  if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
    return { statusCode: error.statusCode, message: error.message };
  }

  return { statusCode: 500, message: 'Internal server error' };
}
