import { HttpStatus } from '@nestjs/common';
import { z } from 'zod';

/**
 * Error Response Schema
 *
 * Single error envelope returned by every endpoint. Produced by the
 * GlobalExceptionFilter through the exception handler registry.
 */

export const ERROR_CODES = {
  INVALID_REQUEST_FORMAT: 'INVALID_REQUEST_FORMAT',
  MISSING_REQUIRED_FIELDS: 'MISSING_REQUIRED_FIELDS',
  INVALID_POSTAL_CODE_FORMAT: 'INVALID_POSTAL_CODE_FORMAT',
  POSTAL_CODE_NOT_FOUND: 'POSTAL_CODE_NOT_FOUND',
  ENTITY_NOT_FOUND: 'ENTITY_NOT_FOUND',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  INTERNAL_SERVER_ERROR: 'INTERNAL_SERVER_ERROR',
  DATASET_UNAVAILABLE: 'DATASET_UNAVAILABLE',
} as const;

export const ErrorCodeSchema = z.nativeEnum(ERROR_CODES);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ErrorSourceSchema = z.enum(['POSTAL_DATASET', 'INTERNAL']);

export type ErrorSource = z.infer<typeof ErrorSourceSchema>;

export const ErrorResponseSchema = z.object({
  errorCode: ErrorCodeSchema,
  message: z.string().min(1),
  correlationId: z.string().min(1),
  source: ErrorSourceSchema,
  timestamp: z.string().datetime(),
  details: z.record(z.unknown()).optional(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

const HTTP_STATUS_BY_ERROR_CODE: Record<ErrorCode, HttpStatus> = {
  INVALID_REQUEST_FORMAT: HttpStatus.BAD_REQUEST,
  MISSING_REQUIRED_FIELDS: HttpStatus.BAD_REQUEST,
  INVALID_POSTAL_CODE_FORMAT: HttpStatus.BAD_REQUEST,
  POSTAL_CODE_NOT_FOUND: HttpStatus.NOT_FOUND,
  ENTITY_NOT_FOUND: HttpStatus.NOT_FOUND,
  RATE_LIMIT_EXCEEDED: HttpStatus.TOO_MANY_REQUESTS,
  INTERNAL_SERVER_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  DATASET_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
};

export function getHttpStatusForErrorCode(errorCode: ErrorCode): HttpStatus {
  return HTTP_STATUS_BY_ERROR_CODE[errorCode];
}

/**
 * Build an ErrorResponse, stamping the current time unless one is given.
 */
export function createErrorResponse(
  input: Omit<ErrorResponse, 'timestamp'> & { timestamp?: string },
): ErrorResponse {
  return {
    ...input,
    timestamp: input.timestamp ?? new Date().toISOString(),
  };
}
