import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app/app.module';
import { DEFAULT_PORT } from './config/environment';
import { LoggingService } from './logging/logging.service';

process.on('uncaughtException', (error) => {
  Logger.error('Uncaught exception', error.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  Logger.error('Unhandled promise rejection', reason instanceof Error ? reason.stack : reason);
  process.exit(1);
});

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(LoggingService));

  const configService = app.get(ConfigService);

  // The Vite dev server and any deployed UI call the API cross-origin
  const allowedOrigins = ['http://localhost:5173', 'http://localhost:4173', 'http://localhost:3000'];
  const frontendUrl = configService.get<string>('FRONTEND_URL');
  if (frontendUrl) {
    allowedOrigins.push(frontendUrl);
  }

  app.enableCors({ origin: allowedOrigins });

  const port = configService.get<number>('PORT') ?? DEFAULT_PORT;
  await app.listen(port);
  Logger.log(`Application is running on: http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  Logger.error('Application failed to start', error instanceof Error ? error.stack : error);
  process.exit(1);
});
