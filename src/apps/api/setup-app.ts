import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpAdapterHost } from '@nestjs/core';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { PipelineExceptionFilter } from '@/shared/common/filters/pipeline-exception.filter';

/** Prefix, pipes, filters and CORS shared by the server and its e2e specs. */
export function configureApp(app: NestFastifyApplication): void {
  const configService = app.get(ConfigService);
  const httpAdapter = app.get(HttpAdapterHost);

  app.setGlobalPrefix('api', { exclude: ['health'] });
  app.useGlobalFilters(new PipelineExceptionFilter(httpAdapter.httpAdapter));
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));

  const origins = (configService.get<string>('CORS_ORIGINS') ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  app.enableCors({
    origin: origins.length > 0 ? origins : true,
    methods: ['GET', 'POST', 'OPTIONS'],
  });
}
