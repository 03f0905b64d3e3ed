import { INestApplication, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import helmet from 'helmet';
import { Environment } from './config/environment.schema';
import { getHelmetConfig, getHelmetSecuritySummary } from './config/helmet.config';
import { AppValidationPipe } from './modules/common/pipes/app-validation.pipe';

/**
 * Validation, CORS and security headers. Shared with the integration tests so
 * they exercise the same pipeline as production.
 */
export function configureApp(
  app: INestApplication,
  configService: ConfigService<Environment, true>,
  logger: Logger,
): void {
  const allowedOrigins = configService.get('APP_CORS_ALLOWED_ORIGINS', { infer: true });
  const nodeEnv = configService.get('NODE_ENV', { infer: true });
  const allowAllOrigins = allowedOrigins.length === 1 && allowedOrigins[0] === '*';

  app.enableCors({
    origin: allowAllOrigins ? true : allowedOrigins,
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Correlation-ID', 'X-Request-ID'],
    exposedHeaders: ['X-Correlation-ID'],
  });

  if (allowAllOrigins) {
    logger.warn(
      'CORS configured to allow all origins. For production, set APP_CORS_ALLOWED_ORIGINS to specific domains.',
    );
  }

  logger.log(`CORS enabled for environment: ${nodeEnv}`, {
    allowAllOrigins,
    allowedOrigins,
  });

  const helmetEnabled = configService.get('APP_ENABLE_HELMET', { infer: true });
  const swaggerEnabled = configService.get('APP_SWAGGER_ENABLED', { infer: true });

  if (helmetEnabled) {
    app.use(helmet(getHelmetConfig(swaggerEnabled)));
    logger.log('Helmet security headers enabled', getHelmetSecuritySummary(swaggerEnabled));
  } else {
    logger.warn('Helmet security headers DISABLED - not recommended for production');
  }

  app.useGlobalPipes(
    new AppValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      stopAtFirstError: false,
      forbidUnknownValues: true,
    }),
  );
}
