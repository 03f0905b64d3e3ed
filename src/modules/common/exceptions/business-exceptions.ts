import { HttpException } from '@nestjs/common';
import {
  type ErrorCode,
  type ErrorResponse,
  type ErrorSource,
  getHttpStatusForErrorCode,
} from '@schemas/error-response.schema';

/**
 * An expected failure of a postal-code operation, already shaped as the
 * error envelope. Its HTTP status comes from getHttpStatusForErrorCode().
 *
 * @example
 * throw new BusinessException({
 *   errorCode: 'POSTAL_CODE_NOT_FOUND',
 *   message: 'No records found for postal code 00-950',
 *   correlationId,
 *   source: 'POSTAL_DATASET',
 * });
 */
export class BusinessException extends HttpException {
  public readonly errorCode: ErrorCode;
  public readonly correlationId: string;
  public readonly source: ErrorSource;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(errorResponse: Omit<ErrorResponse, 'timestamp'> & { timestamp?: string }) {
    super(errorResponse.message, getHttpStatusForErrorCode(errorResponse.errorCode));

    this.errorCode = errorResponse.errorCode;
    this.correlationId = errorResponse.correlationId;
    this.source = errorResponse.source;
    this.details = errorResponse.details;
    this.timestamp = errorResponse.timestamp ?? new Date().toISOString();
    this.name = 'BusinessException';
  }

  toErrorResponse(): ErrorResponse {
    return {
      errorCode: this.errorCode,
      message: this.message,
      correlationId: this.correlationId,
      source: this.source,
      timestamp: this.timestamp,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}
