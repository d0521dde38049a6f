import { Controller, Get, Inject, Logger } from '@nestjs/common';
import { JOB_QUEUE } from '@/shared/queue/queue.constants';
import type { JobQueue } from '@/shared/queue/interfaces/job-queue.interface';
import { JobManagerService } from '@/shared/jobs/services/job-manager.service';
import { BrowserPoolService } from '@/shared/browser/services/browser-pool.service';
import { errorMessage } from '@/shared/lib/util';

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @Inject(JOB_QUEUE) private readonly queue: JobQueue,
    private readonly jobManager: JobManagerService,
    private readonly browserPool: BrowserPoolService,
  ) {}

  @Get()
  async getHealth() {
    const [jobs, queue] = await Promise.all([
      this.jobManager.getStats(),
      this.getQueueHealth(),
    ]);

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'api',
      jobs,
      queue,
      browser: this.browserPool.getPoolStats(),
    };
  }

  private async getQueueHealth() {
    try {
      const counts = await this.queue.getCounts();
      return { status: 'connected', driver: this.queue.driver, counts };
    } catch (error) {
      this.logger.error(`Queue health check failed: ${errorMessage(error)}`);
      return {
        status: 'disconnected',
        driver: this.queue.driver,
        error: errorMessage(error),
      };
    }
  }
}
