/**
 * API response envelopes
 *
 * Every JSON body carries a `status` of "success" or "error".
 */

export type SuccessResponse<T extends object = Record<string, never>> = {
  status: 'success';
} & T;

export interface ErrorResponse {
  status: 'error';
  message: string;
}

/** Creates a successful response, spreading the payload next to `status`. */
export function successResponse<T extends object>(payload: T): SuccessResponse<T> {
  return { status: 'success', ...payload };
}

/** Creates an error response with a human-readable message. */
export function errorResponse(message: string): ErrorResponse {
  return { status: 'error', message };
}
