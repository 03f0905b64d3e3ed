import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { INestApplication, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { Environment } from './config/environment.schema';
import { configureApp } from './app.setup';
import { DatasetLoadError } from './modules/postal-codes/dataset/postal-dataset.loader';

function setupSwagger(
  app: INestApplication,
  configService: ConfigService<Environment, true>,
  logger: Logger,
): void {
  const devServerUrl = configService.get('APP_SWAGGER_SERVER_URL_DEVELOPMENT', { infer: true });
  const prodServerUrl = configService.get('APP_SWAGGER_SERVER_URL_PRODUCTION', { infer: true });

  const configBuilder = new DocumentBuilder()
    .setTitle('Polish Postal Code Server')
    .setDescription(
      'Address to postal code (PNA) lookup for Poland, with house number range matching ' +
        'and location listings for address pickers.',
    )
    .setVersion('1.0.0')
    .addTag('Postal codes', 'Search by address and lookup by postal code')
    .addTag('Locations', 'Provinces, counties, municipalities, cities and streets')
    .addTag('Health', 'Health check endpoints')
    .addServer(devServerUrl, 'Development server');

  if (prodServerUrl) {
    configBuilder.addServer(prodServerUrl, 'Production server');
  }

  const document = SwaggerModule.createDocument(app, configBuilder.build());
  SwaggerModule.setup('api/docs', app, document, {
    customSiteTitle: 'Polish Postal Code API Documentation',
    swaggerOptions: {
      displayRequestDuration: true,
      docExpansion: 'list',
      filter: true,
      tryItOutEnabled: true,
    },
  });

  logger.log('Swagger documentation enabled at /api/docs');
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService<Environment, true>);
  const logger = new Logger('Bootstrap');

  configureApp(app, configService, logger);

  if (configService.get('APP_SWAGGER_ENABLED', { infer: true })) {
    setupSwagger(app, configService, logger);
  } else {
    logger.log('Swagger documentation disabled');
  }

  const port = configService.get('PORT', { infer: true });
  await app.listen(port);

  logger.log(`Listening on port ${port}`);
}

function exitOnFatal(kind: string, reason: unknown): never {
  new Logger('Process').error(
    `${kind}: ${reason instanceof Error ? reason.message : String(reason)}`,
    reason instanceof Error ? reason.stack : undefined,
  );
  process.exit(1);
}

// fatal errors end the process with exit code 1
process.on('unhandledRejection', (reason: unknown) => exitOnFatal('Unhandled promise rejection', reason));
process.on('uncaughtException', (error: Error) => exitOnFatal('Uncaught exception', error));

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');

  logger.error('Application failed to start');

  if (error instanceof DatasetLoadError) {
    logger.error(`Postal dataset could not be loaded: ${error.message}`, {
      filePath: error.filePath,
      details: error.details,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
    });
    logger.error('Set POSTAL_DATA_PATH to a valid postal dataset JSON file.');
  } else {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error(reason, error instanceof Error ? error.stack : undefined);

    if (reason.includes('EADDRINUSE')) {
      logger.error('PORT is already taken by another process');
    }
  }

  process.exit(1);
});
