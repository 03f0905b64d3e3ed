import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR, APP_FILTER } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { ThrottlerConfigService } from './config/throttler.config';
import { CorrelationIdMiddleware } from './middleware/correlation-id.middleware';
import { CorrelationIdInterceptor } from './interceptors/correlation-id.interceptor';
import { GlobalExceptionFilter } from './filters/global-exception.filter';

/**
 * Request plumbing shared by every route. A request passes the correlation
 * ID middleware, then the per-IP throttler guard and the access-log
 * interceptor; anything thrown ends in GlobalExceptionFilter.
 */
@Module({
  imports: [
    ThrottlerModule.forRootAsync({
      useClass: ThrottlerConfigService,
    }),
  ],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    { provide: APP_INTERCEPTOR, useClass: CorrelationIdInterceptor },
    { provide: APP_FILTER, useClass: GlobalExceptionFilter },
  ],
})
export class CommonModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
