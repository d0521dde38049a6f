import { Logger } from '@nestjs/common';
import { ConnectionOptions, Job, Queue, Worker } from 'bullmq';
import { errorMessage } from '@/shared/lib/util';
import { QUEUE_CONFIG, QUEUE_NAMES } from './queue.constants';
import type {
  ExtractionQueuePayload,
  JobHandler,
  JobQueue,
  JobQueueCounts,
} from './interfaces/job-queue.interface';

/**
 * Redis-backed queue. The worker runs in this process because job records
 * live in the process-local job store.
 */
export class BullMqJobQueue implements JobQueue {
  readonly driver = 'bullmq' as const;
  private readonly logger = new Logger(BullMqJobQueue.name);
  private readonly queue: Queue<ExtractionQueuePayload>;
  private worker: Worker<ExtractionQueuePayload> | null = null;

  constructor(
    private readonly connection: ConnectionOptions,
    private readonly concurrency: number,
  ) {
    this.queue = new Queue<ExtractionQueuePayload>(
      QUEUE_NAMES.EXTRACTION_QUEUE,
      { connection },
    );
  }

  registerHandler(handler: JobHandler): void {
    this.worker = new Worker<ExtractionQueuePayload>(
      QUEUE_NAMES.EXTRACTION_QUEUE,
      async (job: Job<ExtractionQueuePayload>) => {
        await handler(job.data.jobId);
      },
      { connection: this.connection, concurrency: this.concurrency },
    );

    this.worker.on('failed', (job, error) => {
      this.logger.error(
        `Queue job ${job?.id ?? 'unknown'} failed: ${errorMessage(error)}`,
      );
    });

    this.logger.log(
      `Worker listening on ${QUEUE_NAMES.EXTRACTION_QUEUE} (concurrency ${this.concurrency})`,
    );
  }

  async enqueue(jobId: string): Promise<void> {
    await this.queue.add(
      'extract',
      { jobId },
      { jobId, ...QUEUE_CONFIG },
    );
  }

  async getCounts(): Promise<JobQueueCounts> {
    const counts = await this.queue.getJobCounts('waiting', 'active');
    return { waiting: counts.waiting ?? 0, active: counts.active ?? 0 };
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }
}
