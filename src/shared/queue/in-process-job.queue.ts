import { Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/lib/util';
import type {
  JobHandler,
  JobQueue,
  JobQueueCounts,
} from './interfaces/job-queue.interface';

/**
 * FIFO queue running handlers inside this process with at most
 * `concurrency` in flight.
 */
export class InProcessJobQueue implements JobQueue {
  readonly driver = 'memory' as const;
  private readonly logger = new Logger(InProcessJobQueue.name);
  private readonly pending: string[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly idleWaiters: Array<() => void> = [];
  private handler: JobHandler | null = null;
  private drainScheduled = false;
  private closed = false;

  constructor(private readonly concurrency: number) {}

  registerHandler(handler: JobHandler): void {
    this.handler = handler;
    this.scheduleDrain();
  }

  async enqueue(jobId: string): Promise<void> {
    if (this.closed) {
      throw new Error('Job queue is closed');
    }
    this.pending.push(jobId);
    this.scheduleDrain();
  }

  async getCounts(): Promise<JobQueueCounts> {
    return { waiting: this.pending.length, active: this.inFlight.size };
  }

  /** Resolves once nothing is waiting or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    this.closed = true;
    this.pending.length = 0;
    await Promise.allSettled([...this.inFlight]);
    this.notifyIdle();
  }

  // Deferred so that a freshly submitted job is observable as queued
  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    const handler = this.handler;
    if (!handler) return;

    while (
      !this.closed &&
      this.inFlight.size < this.concurrency &&
      this.pending.length > 0
    ) {
      const jobId = this.pending.shift();
      if (jobId === undefined) break;

      const task: Promise<void> = this.execute(handler, jobId).finally(() => {
        this.inFlight.delete(task);
        this.drain();
        this.notifyIdle();
      });
      this.inFlight.add(task);
    }
  }

  private async execute(handler: JobHandler, jobId: string): Promise<void> {
    try {
      await handler(jobId);
    } catch (error) {
      this.logger.error(`Job ${jobId} handler failed: ${errorMessage(error)}`);
    }
  }

  private isIdle(): boolean {
    return (
      this.inFlight.size === 0 &&
      (this.pending.length === 0 || this.closed) &&
      !this.drainScheduled
    );
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
