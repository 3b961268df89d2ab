import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { errorMessage, errorStack } from './common/errors';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log', 'debug'],
    bufferLogs: true,
  });
  app.enableShutdownHooks();

  const logger = new Logger('Bootstrap');
  logger.log('Enrichment worker started; stage schedule registered');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Worker failed to start: ${errorMessage(error)}`, errorStack(error));
  process.exit(1);
});
