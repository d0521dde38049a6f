import { Module } from '@nestjs/common';
import { QueueModule } from '@/shared/queue/queue.module';
import { ScrapingModule } from '@/shared/scraping/scraping.module';
import { ComplianceModule } from '@/shared/compliance/compliance.module';
import { ExtractionModule } from '@/shared/extraction/extraction.module';
import { ExportModule } from '@/shared/export/export.module';
import { JOB_STORE } from './interfaces/job-store.interface';
import { InMemoryJobStore } from './stores/in-memory-job.store';
import { JobLockService } from './services/job-lock.service';
import { WebhookService } from './services/webhook.service';
import { JobManagerService } from './services/job-manager.service';
import { JobRetentionService } from './services/job-retention.service';
import { QuickRunService } from './services/quick-run.service';

@Module({
  imports: [
    QueueModule,
    ScrapingModule,
    ComplianceModule,
    ExtractionModule,
    ExportModule,
  ],
  providers: [
    { provide: JOB_STORE, useClass: InMemoryJobStore },
    JobLockService,
    WebhookService,
    JobManagerService,
    JobRetentionService,
    QuickRunService,
  ],
  exports: [JobManagerService, QuickRunService],
})
export class JobsModule {}
