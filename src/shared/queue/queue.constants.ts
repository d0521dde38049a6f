export const JOB_QUEUE = 'JOB_QUEUE';

export const QUEUE_NAMES = {
  EXTRACTION_QUEUE: 'extraction-queue',
} as const;

export const QUEUE_DRIVERS = ['memory', 'bullmq'] as const;
export type QueueDriver = (typeof QUEUE_DRIVERS)[number];

/**
 * A job run is not restartable once it left `queued`, so the broker must
 * not retry it.
 */
export const QUEUE_CONFIG = {
  attempts: 1,
  removeOnComplete: true,
  removeOnFail: 100,
};
