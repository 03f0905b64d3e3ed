import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CommonModule } from './modules/common/common.module';
import { PostalCodesModule } from './modules/postal-codes/postal-codes.module';
import { EnvironmentSchema } from './config/environment.schema';

/**
 * Root Application Module
 *
 * - Global configuration validated by EnvironmentSchema
 * - CommonModule: correlation IDs, rate limiting, logging, error handling
 * - PostalCodesModule: search, lookup, locations and health endpoints
 */
@Module({
  imports: [
    // When a variable is set in several files, @nestjs/config keeps the first
    // one, so the environment-specific file is listed before the base .env.
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [`.env.${process.env.NODE_ENV ?? 'development'}`, '.env'],
      cache: true,
      validate: (config) => EnvironmentSchema.parse(config),
    }),

    CommonModule,
    PostalCodesModule,
  ],
})
export class AppModule {}
