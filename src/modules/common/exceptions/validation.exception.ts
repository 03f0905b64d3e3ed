import { HttpException, HttpStatus } from '@nestjs/common';
import {
  createErrorResponse,
  type ErrorCode,
  type ErrorResponse,
} from '@schemas/error-response.schema';

/**
 * One failed class-validator constraint on a request parameter.
 * `value` is kept for logging and never sent back to the client.
 */
export interface ValidationErrorDetail {
  property: string;
  value: unknown;
  constraint: string;
  message: string;
}

/**
 * Rejected query or path parameters. Built by ValidationExceptionFactory,
 * which also picks the error code; always answered with 400.
 */
export class ValidationException extends HttpException {
  constructor(
    public readonly errorCode: ErrorCode,
    message: string,
    public readonly validationErrors: ValidationErrorDetail[],
  ) {
    super(message, HttpStatus.BAD_REQUEST);
    this.name = 'ValidationException';
  }

  toErrorResponse(correlationId: string): ErrorResponse {
    const validationErrors = this.validationErrors.map(({ property, constraint, message }) => ({
      property,
      constraint,
      message,
    }));

    return createErrorResponse({
      errorCode: this.errorCode,
      message: this.message,
      correlationId,
      source: 'INTERNAL',
      details: { validationErrors },
    });
  }
}
