/**
 * Correlation ID Utilities
 *
 * Generation and extraction of the per-request correlation ID shared by the
 * middleware, interceptor, decorator and exception filter.
 *
 * Format: req-{timestamp}-{random}
 * Example: req-ljh9k3d-8x7v2w9pq
 *
 * An ID supplied by an upstream service in the request headers is reused.
 */

import { Request } from 'express';

/** Longest upstream ID that is accepted. */
export const MAX_CORRELATION_ID_LENGTH = 128;

const CORRELATION_ID_HEADERS = ['correlation-id', 'x-correlation-id', 'x-request-id'] as const;

/**
 * Generate a new correlationId
 *
 * - timestamp: base36-encoded current time
 * - random: 9-character base36 string
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 11);
  return `req-${timestamp}-${random}`;
}

/**
 * Extract correlationId from request headers
 *
 * Checks `correlation-id`, `x-correlation-id`, `x-request-id` in that order.
 * IDs longer than 128 characters are rejected.
 *
 * @returns Extracted correlationId or null if not found/invalid
 */
export function extractFromHeaders(request: {
  headers?: Record<string, string | string[] | undefined>;
}): string | null {
  const headers = request.headers ?? {};

  for (const header of CORRELATION_ID_HEADERS) {
    const id = headers[header];
    if (typeof id === 'string' && id.trim().length > 0) {
      const trimmed = id.trim();
      return trimmed.length <= MAX_CORRELATION_ID_LENGTH ? trimmed : null;
    }
  }

  return null;
}

/**
 * Store the correlationId on the request for downstream components.
 */
export function attachToRequest(request: Request, correlationId: string): void {
  Object.assign(request, { correlationId });
}

/**
 * Read the correlationId set by CorrelationIdMiddleware.
 *
 * @returns The ID, or null when the middleware did not run for this request
 */
export function extractFromRequest(request: Request): string | null {
  if (!('correlationId' in request)) {
    return null;
  }
  const { correlationId } = request;
  return typeof correlationId === 'string' && correlationId.length > 0 ? correlationId : null;
}
