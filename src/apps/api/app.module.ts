import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import { ScheduleModule } from '@nestjs/schedule';
import { loadEnv } from '@/shared/config/load-env';
import { validationSchema } from '@/shared/config/env.validation';
import { QueueModule } from '@/shared/queue/queue.module';
import { BrowserModule } from '@/shared/browser/browser.module';
import { ComplianceModule } from '@/shared/compliance/compliance.module';
import { JobsModule } from '@/shared/jobs/jobs.module';
import { ScrapeController } from './controllers/scrape.controller';
import { JobsController } from './controllers/jobs.controller';
import { ComplianceController } from './controllers/compliance.controller';
import { HealthController } from './controllers/health.controller';
import { TestScrapeController } from './controllers/test-scrape.controller';

loadEnv();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema,
      ignoreEnvFile: true,
    }),
    // robots.txt policies
    CacheModule.register({ isGlobal: true }),
    ScheduleModule.forRoot(),
    QueueModule,
    BrowserModule,
    ComplianceModule,
    JobsModule,
  ],
  controllers: [
    ScrapeController,
    JobsController,
    ComplianceController,
    HealthController,
    TestScrapeController,
  ],
})
export class ApiAppModule {}
