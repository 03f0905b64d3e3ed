import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { getHttpStatusForErrorCode } from '@schemas/error-response.schema';
import { generateCorrelationId, extractFromRequest } from '../utils/correlation-id.utils';
import { ExceptionHandlerRegistry, type ExceptionHandler } from './exception-handlers.registry';

/**
 * Last stop for anything a route throws. The response body comes from the
 * matching ExceptionHandlerRegistry entry and the status from its error code.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);
  private readonly handlers: readonly ExceptionHandler[] = ExceptionHandlerRegistry.getAll();

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const correlationId = this.getCorrelationId(request);

    const handler = ExceptionHandlerRegistry.findHandler(exception, this.handlers);
    const errorResponse = handler.handle(exception, correlationId);
    const statusCode = getHttpStatusForErrorCode(errorResponse.errorCode);

    this.logException(exception, request, correlationId, statusCode, handler.name);

    response.status(statusCode).json(errorResponse);
  }

  // body parser failures happen before CorrelationIdMiddleware
  private getCorrelationId(request: Request): string {
    const id = extractFromRequest(request);
    if (id) {
      return id;
    }

    const generatedId = generateCorrelationId();
    this.logger.warn('No correlation ID on request, using a generated one', {
      generatedId,
      path: request.path,
      method: request.method,
    });
    return generatedId;
  }

  private logException(
    exception: unknown,
    request: Request,
    correlationId: string,
    statusCode: number,
    handlerName: string,
  ): void {
    const logContext = {
      correlationId,
      method: request.method,
      path: request.path,
      ip: request.ip,
      statusCode,
      handler: handlerName,
    };

    const message = exception instanceof Error ? exception.message : String(exception);

    if (statusCode >= 500) {
      this.logger.error(`HTTP ${statusCode} Server Error: ${message}`, {
        ...logContext,
        exception: {
          name: exception instanceof Error ? exception.name : typeof exception,
          message,
          stack: exception instanceof Error ? exception.stack : undefined,
        },
      });
    } else {
      this.logger.warn(`HTTP ${statusCode} Client Error: ${message}`, logContext);
    }
  }
}
