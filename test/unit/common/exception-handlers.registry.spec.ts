import { BadRequestException, HttpException, HttpStatus, NotFoundException } from '@nestjs/common';
import { ThrottlerException } from '@nestjs/throttler';
import { z } from 'zod';
import { BusinessException } from '../../../src/modules/common/exceptions/business-exceptions';
import { ValidationException } from '../../../src/modules/common/exceptions/validation.exception';
import {
  ExceptionHandlerRegistry,
  type ExceptionHandler,
} from '../../../src/modules/common/filters/exception-handlers.registry';
import { GlobalExceptionFilter } from '../../../src/modules/common/filters/global-exception.filter';
import { ErrorResponseSchema } from '../../../src/schemas/error-response.schema';

const CORRELATION_ID = 'req-test-123';

function handle(exception: unknown) {
  const handler = ExceptionHandlerRegistry.findHandler(exception);
  return { handler: handler.name, response: handler.handle(exception, CORRELATION_ID) };
}

describe('ExceptionHandlerRegistry', () => {
  afterEach(() => {
    ExceptionHandlerRegistry.reset();
  });

  it('should keep handlers sorted by priority', () => {
    expect(ExceptionHandlerRegistry.getAll().map((h) => h.priority)).toEqual([1, 2, 3, 4, 5, 6, 99]);
  });

  it('should pass BusinessException responses through unchanged', () => {
    const exception = new BusinessException({
      errorCode: 'POSTAL_CODE_NOT_FOUND',
      message: 'Postal code 99-999 not found',
      correlationId: 'req-original',
      source: 'POSTAL_DATASET',
      details: { postalCode: '99-999' },
    });

    const { handler, response } = handle(exception);

    expect(handler).toBe('BusinessExceptionHandler');
    expect(response).toEqual(exception.toErrorResponse());
  });

  it('should convert ValidationException with the request correlation ID', () => {
    const exception = new ValidationException('INVALID_REQUEST_FORMAT', 'Invalid request format. Check fields: limit', []);

    const { handler, response } = handle(exception);

    expect(handler).toBe('ValidationExceptionHandler');
    expect(response.correlationId).toBe(CORRELATION_ID);
    expect(response.errorCode).toBe('INVALID_REQUEST_FORMAT');
  });

  it('should map ThrottlerException to RATE_LIMIT_EXCEEDED', () => {
    const { handler, response } = handle(new ThrottlerException('Rate limit exceeded. Please try again later.'));

    expect(handler).toBe('ThrottlerExceptionHandler');
    expect(response).toMatchObject({
      errorCode: 'RATE_LIMIT_EXCEEDED',
      message: 'Rate limit exceeded. Please try again later.',
      source: 'INTERNAL',
      details: { httpStatus: 429 },
    });
  });

  it.each([
    [new NotFoundException('Cannot GET /api/nope'), 'ENTITY_NOT_FOUND'],
    [new BadRequestException('Bad input'), 'INVALID_REQUEST_FORMAT'],
    [new HttpException('Unavailable', HttpStatus.SERVICE_UNAVAILABLE), 'DATASET_UNAVAILABLE'],
    [new HttpException('Teapot', HttpStatus.I_AM_A_TEAPOT), 'INTERNAL_SERVER_ERROR'],
  ])('should map HttpException %p to %p', (exception, errorCode) => {
    const { handler, response } = handle(exception);

    expect(handler).toBe('HttpExceptionHandler');
    expect(response.errorCode).toBe(errorCode);
    expect(response.details).toEqual({ httpStatus: exception.getStatus() });
  });

  it('should convert ZodError issues', () => {
    const result = z.object({ city: z.string() }).safeParse({});
    expect(result.success).toBe(false);
    if (result.success) return;

    const { handler, response } = handle(result.error);

    expect(handler).toBe('ZodErrorHandler');
    expect(response.message).toBe('Request validation failed');
    expect(response.details).toEqual({
      validationErrors: [{ path: 'city', message: 'Required', code: 'invalid_type' }],
    });
  });

  it('should hide the message of plain errors', () => {
    const { handler, response } = handle(new TypeError('secret internals'));

    expect(handler).toBe('StandardErrorHandler');
    expect(response.message).toBe('An internal server error occurred');
    expect(response.details).toEqual({ errorName: 'TypeError' });
  });

  it('should fall back for non-Error values', () => {
    const { handler, response } = handle('boom');

    expect(handler).toBe('UnknownExceptionHandler');
    expect(response).toMatchObject({
      errorCode: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
      details: { exception: 'boom' },
    });
  });

  it('should always produce a valid ErrorResponse', () => {
    for (const exception of [new Error('x'), 'x', null, new NotFoundException()]) {
      expect(ErrorResponseSchema.safeParse(handle(exception).response).success).toBe(true);
    }
  });

  it('should reject a specific handler registered after HttpExceptionHandler', () => {
    const misplaced: ExceptionHandler = {
      name: 'ThrottlerExceptionHandler',
      priority: 10,
      canHandle: () => false,
      handle: (_exception, correlationId) => ({
        errorCode: 'INTERNAL_SERVER_ERROR',
        message: 'unused',
        correlationId,
        source: 'INTERNAL',
        timestamp: new Date().toISOString(),
      }),
    };

    ExceptionHandlerRegistry.register(misplaced);

    expect(() => ExceptionHandlerRegistry.getAll()).toThrow(
      'Configuration error: ThrottlerExceptionHandler (priority 10) must have lower priority than HttpExceptionHandler (priority 4)',
    );
    expect(() => new GlobalExceptionFilter()).toThrow(
      'Configuration error: ThrottlerExceptionHandler (priority 10)',
    );
  });

  it('should pick handlers from a snapshot in priority order', () => {
    const snapshot = ExceptionHandlerRegistry.getAll();
    const custom: ExceptionHandler = {
      name: 'TeapotHandler',
      priority: 0,
      canHandle: (exception) => exception === 'teapot',
      handle: (_exception, correlationId) => ({
        errorCode: 'INTERNAL_SERVER_ERROR',
        message: 'teapot',
        correlationId,
        source: 'INTERNAL',
        timestamp: new Date().toISOString(),
      }),
    };

    ExceptionHandlerRegistry.register(custom);

    expect(ExceptionHandlerRegistry.findHandler('teapot').name).toBe('TeapotHandler');
    expect(ExceptionHandlerRegistry.findHandler('teapot', snapshot).name).toBe('UnknownExceptionHandler');
  });
});
