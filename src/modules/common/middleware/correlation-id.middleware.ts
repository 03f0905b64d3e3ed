/**
 * Correlation ID Middleware
 *
 * Primary source of correlationId for all incoming HTTP requests.
 * Runs before guards, interceptors and filters, so each of them can read the
 * ID from the request.
 *
 * - Reuses an ID from upstream headers, or generates one
 * - Attaches it to the request
 * - Echoes it in the X-Correlation-ID response header
 */

import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import {
  attachToRequest,
  extractFromHeaders,
  generateCorrelationId,
} from '../utils/correlation-id.utils';

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  private readonly logger = new Logger(CorrelationIdMiddleware.name);

  use(req: Request, res: Response, next: NextFunction): void {
    const existingId = extractFromHeaders(req);
    const correlationId = existingId ?? generateCorrelationId();

    attachToRequest(req, correlationId);
    res.setHeader('X-Correlation-ID', correlationId);

    this.logger.debug(`Correlation ID: ${correlationId}`, {
      source: existingId ? 'upstream-header' : 'middleware',
    });

    next();
  }
}
