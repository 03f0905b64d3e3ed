import { Injectable, ExecutionContext } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ThrottlerOptionsFactory, ThrottlerModuleOptions } from '@nestjs/throttler';
import { Request } from 'express';
import { type Environment } from '@config/environment.schema';
import { getThrottlerConfigsArray } from './throttler-limits.helper';

export const RATE_LIMIT_ERROR_MESSAGE = 'Rate limit exceeded. Please try again later.';

/**
 * Whether a request bypasses rate limiting: health probes always do, and
 * every request does outside staging/production.
 */
export function shouldSkipThrottling(path: string, nodeEnv: Environment['NODE_ENV']): boolean {
  if (path.startsWith('/api/health')) {
    return true;
  }
  return nodeEnv === 'development' || nodeEnv === 'test';
}

/**
 * Throttler Configuration for Rate Limiting
 *
 * Two windows per client IP (see throttler-limits.helper): a per-minute limit
 * from APP_RATE_LIMIT_PER_MINUTE and a 10-second burst limit. The in-memory
 * storage of @nestjs/throttler is used, limits are per instance.
 */
@Injectable()
export class ThrottlerConfigService implements ThrottlerOptionsFactory {
  constructor(private readonly configService: ConfigService<Environment, true>) {}

  createThrottlerOptions(): ThrottlerModuleOptions {
    const rateLimitPerMinute = this.configService.get('APP_RATE_LIMIT_PER_MINUTE', { infer: true });
    const nodeEnv = this.configService.get('NODE_ENV', { infer: true });

    return {
      throttlers: getThrottlerConfigsArray(rateLimitPerMinute),
      skipIf: (context: ExecutionContext) => {
        const request = context.switchToHttp().getRequest<Request>();
        return shouldSkipThrottling(request.path, nodeEnv);
      },
      errorMessage: RATE_LIMIT_ERROR_MESSAGE,
    };
  }
}
