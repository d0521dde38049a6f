import type { ExtractionJob, JobStatusCounts } from './job.interface';

export const JOB_STORE = 'JOB_STORE';

export interface ListJobsOptions {
  limit?: number;
  offset?: number;
}

/**
 * Persistence seam for job records. Implementations return whole
 * snapshots; `list` orders most recent first.
 */
export interface JobStore {
  get(jobId: string): Promise<ExtractionJob | undefined>;
  put(job: ExtractionJob): Promise<void>;
  list(options?: ListJobsOptions): Promise<ExtractionJob[]>;
  delete(jobId: string): Promise<boolean>;
  countByStatus(): Promise<JobStatusCounts>;
}
