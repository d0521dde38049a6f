import type { QueueDriver } from '../queue.constants';

export type JobHandler = (jobId: string) => Promise<unknown>;

export interface JobQueueCounts {
  waiting: number;
  active: number;
}

export interface ExtractionQueuePayload {
  jobId: string;
}

/**
 * Hands job ids to a worker. Each enqueued id is passed to the registered
 * handler exactly once.
 */
export interface JobQueue {
  readonly driver: QueueDriver;
  registerHandler(handler: JobHandler): void;
  enqueue(jobId: string): Promise<void>;
  getCounts(): Promise<JobQueueCounts>;
  close(): Promise<void>;
}
