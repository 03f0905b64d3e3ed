import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';
import { extractFromRequest } from '../utils/correlation-id.utils';

/** Requests slower than this are logged as warnings. */
export const SLOW_REQUEST_THRESHOLD_MS = 5000;

interface RequestLogContext {
  correlationId: string;
  method: string;
  path: string;
}

/**
 * Access log keyed by correlation ID: one line when a handler starts, one
 * when it finishes. Failed requests get their status logged by
 * GlobalExceptionFilter, here only the duration and error name.
 *
 * @example
 * [CorrelationIdInterceptor] Request started {correlationId: "req-abc123", method: "GET", path: "/api/postal-codes"}
 * [CorrelationIdInterceptor] Request completed successfully {correlationId: "req-abc123", statusCode: 200, duration: 4}
 */
@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor {
  private readonly logger = new Logger(CorrelationIdInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const logContext: RequestLogContext = {
      correlationId: extractFromRequest(request) ?? 'unknown',
      method: request.method,
      path: request.path,
    };
    const startTime = Date.now();

    this.logger.log('Request started', {
      ...logContext,
      ip: request.ip,
      userAgent: request.headers['user-agent'],
    });

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - startTime;
          const completed = { ...logContext, statusCode: response.statusCode, duration };
          if (duration > SLOW_REQUEST_THRESHOLD_MS) {
            this.logger.warn('Slow request completed', completed);
          } else {
            this.logger.log('Request completed successfully', completed);
          }
        },
        error: (error: unknown) => {
          this.logger.log('Request completed with error', {
            ...logContext,
            duration: Date.now() - startTime,
            error: error instanceof Error ? error.name : String(error),
          });
        },
      }),
    );
  }
}
