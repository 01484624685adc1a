import 'reflect-metadata';

import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app/app.module';
import { AllExceptionsFilter } from './common/filters/http-exception.filter';
import { LoggingService } from './logging/logging.service';

const isPgShutdownError = (error: unknown): boolean => {
  if (!(error instanceof Error)) {
    return false;
  }

  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && ['57P01', '57P02', '57P03', '53300'].includes(code)) {
    return true;
  }

  return /db_termination|terminating connection|server closed the connection|connection reset/i.test(error.message);
};

process.on('uncaughtException', (error) => {
  if (isPgShutdownError(error)) {
    Logger.warn(`Database connection dropped: ${error.message}`);
    return;
  }

  Logger.error('Uncaught exception', error.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  if (isPgShutdownError(reason)) {
    Logger.warn('Database connection dropped during a pending query');
    return;
  }

  Logger.error('Unhandled promise rejection', reason instanceof Error ? reason.stack : String(reason));
  process.exit(1);
});

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(LoggingService));

  const allowedOrigins = ['http://localhost:4200', 'http://localhost:3000'];
  const frontendUrl = process.env.FRONTEND_URL;
  if (frontendUrl) {
    allowedOrigins.push(frontendUrl);
  }
  app.enableCors({ origin: allowedOrigins });

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }));
  app.useGlobalFilters(new AllExceptionsFilter());
  app.enableShutdownHooks();

  const globalPrefix = 'api';
  app.setGlobalPrefix(globalPrefix);
  const port = process.env.PORT || 8080;
  await app.listen(port);
  Logger.log(`Application is running on: http://localhost:${port}/${globalPrefix}`);
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
