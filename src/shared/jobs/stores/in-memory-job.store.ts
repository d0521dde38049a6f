import { Injectable } from '@nestjs/common';
import type {
  ExtractionJob,
  JobStatusCounts,
} from '../interfaces/job.interface';
import type { JobStore, ListJobsOptions } from '../interfaces/job-store.interface';

interface StoredJob {
  job: ExtractionJob;
  sequence: number;
}

@Injectable()
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, StoredJob>();
  private sequence = 0;

  async get(jobId: string): Promise<ExtractionJob | undefined> {
    return this.jobs.get(jobId)?.job;
  }

  async put(job: ExtractionJob): Promise<void> {
    const existing = this.jobs.get(job.id);
    this.jobs.set(job.id, {
      job: Object.freeze({ ...job }),
      sequence: existing?.sequence ?? this.sequence++,
    });
  }

  async list(options: ListJobsOptions = {}): Promise<ExtractionJob[]> {
    const offset = options.offset ?? 0;
    const ordered = [...this.jobs.values()]
      .sort(
        (a, b) =>
          Date.parse(b.job.createdAt) - Date.parse(a.job.createdAt) ||
          b.sequence - a.sequence,
      )
      .map((stored) => stored.job);

    return options.limit === undefined
      ? ordered.slice(offset)
      : ordered.slice(offset, offset + options.limit);
  }

  async delete(jobId: string): Promise<boolean> {
    return this.jobs.delete(jobId);
  }

  async countByStatus(): Promise<JobStatusCounts> {
    const counts: JobStatusCounts = {
      queued: 0,
      running: 0,
      completed: 0,
      failed: 0,
    };
    for (const { job } of this.jobs.values()) {
      counts[job.status]++;
    }
    return counts;
  }
}
