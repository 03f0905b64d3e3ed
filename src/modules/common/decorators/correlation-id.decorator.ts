import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { extractFromRequest, generateCorrelationId } from '../utils/correlation-id.utils';

/**
 * Correlation ID Parameter Decorator
 *
 * Injects the correlation ID assigned by CorrelationIdMiddleware. Falls back
 * to a fresh ID when the middleware is not mounted (e.g. a bare testing module).
 *
 * @example
 * ```typescript
 * @Get(':postalCode')
 * async getByPostalCode(
 *   @Param() params: PostalCodeParamDto,
 *   @CorrelationId() correlationId: string,
 * ) {
 *   return this.searchService.findByPostalCode(params.postalCode, correlationId);
 * }
 * ```
 */
export const CorrelationId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return extractFromRequest(request) ?? generateCorrelationId();
  },
);
