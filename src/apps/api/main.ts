import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { setupGracefulShutdown } from '@/shared/utils/graceful-shutdown';
import { errorMessage } from '@/shared/lib/util';
import { ApiAppModule } from './app.module';
import { configureApp } from './setup-app';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    ApiAppModule,
    new FastifyAdapter({ trustProxy: true }),
  );

  configureApp(app);
  setupGracefulShutdown(app);

  const port = app.get(ConfigService).get<number>('API_PORT') ?? 3000;
  await app.listen(port, '0.0.0.0');
  logger.log(`API listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error(`Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
