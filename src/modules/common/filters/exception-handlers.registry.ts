import { HttpException, HttpStatus } from '@nestjs/common';
import { ThrottlerException } from '@nestjs/throttler';
import { ZodError } from 'zod';
import {
  createErrorResponse,
  type ErrorResponse,
  type ErrorCode,
  ERROR_CODES,
} from '@schemas/error-response.schema';
import { BusinessException } from '../exceptions/business-exceptions';
import { ValidationException } from '../exceptions/validation.exception';

/**
 * Maps one family of thrown values to the error envelope. The first handler
 * (ascending `priority`) whose canHandle() accepts the value is used, so
 * subclasses of HttpException sort before HttpExceptionHandler itself.
 */
export interface ExceptionHandler {
  readonly priority: number;
  readonly name: string;
  canHandle(exception: unknown): boolean;
  handle(exception: unknown, correlationId: string): ErrorResponse;
}

function unknownErrorResponse(exception: unknown, correlationId: string): ErrorResponse {
  return createErrorResponse({
    errorCode: ERROR_CODES.INTERNAL_SERVER_ERROR,
    message: 'An unexpected error occurred',
    correlationId,
    source: 'INTERNAL',
    details: {
      exception: String(exception),
    },
  });
}

/**
 * Base for handlers bound to one exception type. The type guard used by
 * canHandle also narrows the exception passed to convert.
 */
abstract class TypedExceptionHandler<T> implements ExceptionHandler {
  abstract readonly priority: number;
  abstract readonly name: string;

  protected abstract matches(exception: unknown): exception is T;

  protected abstract convert(exception: T, correlationId: string): ErrorResponse;

  canHandle(exception: unknown): boolean {
    return this.matches(exception);
  }

  handle(exception: unknown, correlationId: string): ErrorResponse {
    return this.matches(exception)
      ? this.convert(exception, correlationId)
      : unknownErrorResponse(exception, correlationId);
  }
}

export class BusinessExceptionHandler extends TypedExceptionHandler<BusinessException> {
  readonly priority = 1;
  readonly name = 'BusinessExceptionHandler';

  protected matches(exception: unknown): exception is BusinessException {
    return exception instanceof BusinessException;
  }

  protected convert(exception: BusinessException): ErrorResponse {
    return exception.toErrorResponse();
  }
}

export class ValidationExceptionHandler extends TypedExceptionHandler<ValidationException> {
  readonly priority = 2;
  readonly name = 'ValidationExceptionHandler';

  protected matches(exception: unknown): exception is ValidationException {
    return exception instanceof ValidationException;
  }

  protected convert(exception: ValidationException, correlationId: string): ErrorResponse {
    return exception.toErrorResponse(correlationId);
  }
}

export class ThrottlerExceptionHandler extends TypedExceptionHandler<ThrottlerException> {
  readonly priority = 3;
  readonly name = 'ThrottlerExceptionHandler';

  protected matches(exception: unknown): exception is ThrottlerException {
    return exception instanceof ThrottlerException;
  }

  protected convert(exception: ThrottlerException, correlationId: string): ErrorResponse {
    return createErrorResponse({
      errorCode: ERROR_CODES.RATE_LIMIT_EXCEEDED,
      message: exception.message || 'Rate limit exceeded. Please try again later.',
      correlationId,
      source: 'INTERNAL',
      details: {
        httpStatus: HttpStatus.TOO_MANY_REQUESTS,
      },
    });
  }
}

const ERROR_CODE_BY_HTTP_STATUS: Partial<Record<number, ErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: ERROR_CODES.INVALID_REQUEST_FORMAT,
  [HttpStatus.NOT_FOUND]: ERROR_CODES.ENTITY_NOT_FOUND,
  [HttpStatus.TOO_MANY_REQUESTS]: ERROR_CODES.RATE_LIMIT_EXCEEDED,
  [HttpStatus.SERVICE_UNAVAILABLE]: ERROR_CODES.DATASET_UNAVAILABLE,
};

/** Nest's own exceptions, e.g. NotFoundException for an unknown route. */
export class HttpExceptionHandler extends TypedExceptionHandler<HttpException> {
  readonly priority = 4;
  readonly name = 'HttpExceptionHandler';

  protected matches(exception: unknown): exception is HttpException {
    return exception instanceof HttpException;
  }

  protected convert(exception: HttpException, correlationId: string): ErrorResponse {
    const status = exception.getStatus();
    const message = exception.message;

    return createErrorResponse({
      errorCode: ERROR_CODE_BY_HTTP_STATUS[status] ?? ERROR_CODES.INTERNAL_SERVER_ERROR,
      message: message || `HTTP ${status} error`,
      correlationId,
      source: 'INTERNAL',
      details: {
        httpStatus: status,
      },
    });
  }
}

export class ZodErrorHandler extends TypedExceptionHandler<ZodError> {
  readonly priority = 5;
  readonly name = 'ZodErrorHandler';

  protected matches(exception: unknown): exception is ZodError {
    return exception instanceof ZodError;
  }

  protected convert(exception: ZodError, correlationId: string): ErrorResponse {
    return createErrorResponse({
      errorCode: ERROR_CODES.INVALID_REQUEST_FORMAT,
      message: 'Request validation failed',
      correlationId,
      source: 'INTERNAL',
      details: {
        validationErrors: exception.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
    });
  }
}

/** Programming errors; their message is logged, never returned. */
export class StandardErrorHandler extends TypedExceptionHandler<Error> {
  readonly priority = 6;
  readonly name = 'StandardErrorHandler';

  protected matches(exception: unknown): exception is Error {
    return exception instanceof Error;
  }

  protected convert(exception: Error, correlationId: string): ErrorResponse {
    return createErrorResponse({
      errorCode: ERROR_CODES.INTERNAL_SERVER_ERROR,
      message: 'An internal server error occurred',
      correlationId,
      source: 'INTERNAL',
      details: {
        errorName: exception.name,
      },
    });
  }
}

export class UnknownExceptionHandler implements ExceptionHandler {
  readonly priority = 99;
  readonly name = 'UnknownExceptionHandler';

  canHandle(): boolean {
    return true;
  }

  handle(exception: unknown, correlationId: string): ErrorResponse {
    return unknownErrorResponse(exception, correlationId);
  }
}

function createDefaultHandlers(): ExceptionHandler[] {
  return [
    new BusinessExceptionHandler(),
    new ValidationExceptionHandler(),
    new ThrottlerExceptionHandler(),
    new HttpExceptionHandler(),
    new ZodErrorHandler(),
    new StandardErrorHandler(),
    new UnknownExceptionHandler(),
  ];
}

/**
 * Process-wide handler list. GlobalExceptionFilter takes its snapshot from
 * getAll() when it is constructed, which throws when a registered handler
 * would be shadowed by HttpExceptionHandler.
 */
export class ExceptionHandlerRegistry {
  private static handlers: ExceptionHandler[] = createDefaultHandlers();

  private static validatePriorities(): void {
    const httpHandler = this.handlers.find((h) => h.name === 'HttpExceptionHandler');
    if (!httpHandler) {
      return;
    }

    const specificHandlers = [
      'BusinessExceptionHandler',
      'ValidationExceptionHandler',
      'ThrottlerExceptionHandler',
    ];

    for (const handler of this.handlers) {
      if (specificHandlers.includes(handler.name) && handler.priority >= httpHandler.priority) {
        throw new Error(
          `Configuration error: ${handler.name} (priority ${handler.priority}) ` +
            `must have lower priority than HttpExceptionHandler (priority ${httpHandler.priority})`,
        );
      }
    }
  }

  static getAll(): ExceptionHandler[] {
    this.validatePriorities();
    return [...this.handlers].sort((a, b) => a.priority - b.priority);
  }

  static findHandler(
    exception: unknown,
    handlers: readonly ExceptionHandler[] = this.handlers,
  ): ExceptionHandler {
    return handlers.find((h) => h.canHandle(exception)) ?? new UnknownExceptionHandler();
  }

  static register(handler: ExceptionHandler): void {
    this.handlers.push(handler);
    this.handlers.sort((a, b) => a.priority - b.priority);
  }

  /** Drops handlers added through register(). */
  static reset(): void {
    this.handlers = createDefaultHandlers();
  }
}
