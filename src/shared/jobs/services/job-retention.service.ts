import { Injectable, Logger } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { JobManagerService } from './job-manager.service';
import { errorMessage } from '@/shared/lib/util';

export const RETENTION_SWEEP_INTERVAL_MS = 60_000;

@Injectable()
export class JobRetentionService {
  private readonly logger = new Logger(JobRetentionService.name);

  constructor(private readonly jobManager: JobManagerService) {}

  @Interval('job-retention', RETENTION_SWEEP_INTERVAL_MS)
  async sweep(): Promise<void> {
    try {
      const evicted = await this.jobManager.evictExpired();
      if (evicted > 0) {
        this.logger.log(`Evicted ${evicted} expired job(s)`);
      }
    } catch (error) {
      this.logger.error(`Retention sweep failed: ${errorMessage(error)}`);
    }
  }
}
