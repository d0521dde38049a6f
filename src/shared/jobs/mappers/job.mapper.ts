import type {
  ExtractionJob,
  JobError,
  JobStage,
} from '../interfaces/job.interface';
import { PipelineError } from '@/shared/common/errors/pipeline.errors';
import { errorMessage } from '@/shared/lib/util';
import type { ExportFormat } from '@/shared/export/interfaces/artifact.interface';

export interface JobResponse {
  jobId: string;
  status: ExtractionJob['status'];
  stage: ExtractionJob['stage'];
  url: string;
  instruction: string;
  format: ExportFormat;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  compliance: ExtractionJob['compliance'] | null;
  result: ExtractionJob['result'] | null;
  error: ExtractionJob['error'] | null;
  downloads: Partial<Record<ExportFormat, string>>;
}

export function exportPath(jobId: string, format: ExportFormat): string {
  return `/api/jobs/${jobId}/exports/${format}`;
}

export function toJobResponse(job: ExtractionJob): JobResponse {
  const downloads: Partial<Record<ExportFormat, string>> = {};
  for (const artifact of Object.values(job.result?.exports ?? {})) {
    if (artifact) {
      downloads[artifact.format] = exportPath(job.id, artifact.format);
    }
  }

  return {
    jobId: job.id,
    status: job.status,
    stage: job.stage,
    url: job.input.url,
    instruction: job.input.instruction,
    format: job.input.format,
    createdAt: job.createdAt,
    startedAt: job.startedAt ?? null,
    completedAt: job.completedAt ?? null,
    compliance: job.compliance ?? null,
    result: job.result ?? null,
    error: job.error ?? null,
    downloads,
  };
}

/** Listing entry without the bulky result body. */
export function toJobSummary(job: ExtractionJob): Omit<JobResponse, 'result'> {
  const { result: _result, ...summary } = toJobResponse(job);
  return summary;
}

export interface WebhookPayload extends JobResponse {
  input: ExtractionJob['input'];
}

/** Terminal record posted to `webhookUrl`, with every submitted option. */
export function toWebhookPayload(job: ExtractionJob): WebhookPayload {
  return { ...toJobResponse(job), input: job.input };
}

export function toJobError(stage: JobStage, error: unknown): JobError {
  if (error instanceof PipelineError) {
    return { stage, code: error.code, message: error.message };
  }
  return { stage, code: 'STAGE_ERROR', message: errorMessage(error) };
}
