import type { ComplianceVerdict } from '@/shared/compliance/interfaces/compliance-verdict.interface';
import type { Artifact, ExportFormat } from '@/shared/export/interfaces/artifact.interface';
import type { ExtractionResult } from '@/shared/extraction/interfaces/extraction-result.interface';
import type { NormalizedDocument } from '@/shared/scraping/interfaces/document.interface';
import type { RenderMode } from '@/shared/scraping/enums/render-mode.enum';

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

export const JOB_STATUSES: readonly JobStatus[] = [
  'queued',
  'running',
  'completed',
  'failed',
];

export type JobStage = 'compliance' | 'fetch' | 'parse' | 'extract' | 'export';

export interface JobInput {
  url: string;
  instruction: string;
  format: ExportFormat;
  webhookUrl?: string;
  timeoutSeconds: number;
  renderMode?: RenderMode;
  structuredExtraction: boolean;
  strictSchema: boolean;
  antiDetection: boolean;
  checkCompliance: boolean;
}

export interface JobResultMetadata {
  finalUrl: string;
  statusCode: number;
  renderMode: RenderMode;
  contentLength: number;
  linksFound: number;
  imagesFound: number;
  tablesFound: number;
  formsFound: number;
  processingTimeMs: number;
}

export interface JobResult {
  document: NormalizedDocument;
  extraction: ExtractionResult;
  exports: Partial<Record<ExportFormat, Artifact>>;
  metadata: JobResultMetadata;
}

export interface JobError {
  stage: JobStage;
  code: string;
  message: string;
}

export interface ExtractionJob {
  id: string;
  status: JobStatus;
  stage: JobStage | null;
  input: JobInput;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  compliance?: ComplianceVerdict;
  result?: JobResult;
  error?: JobError;
}

export type JobStatusCounts = Record<JobStatus, number>;

export interface JobTransition {
  jobId: string;
  from: JobStatus;
  to: JobStatus;
  job: Readonly<ExtractionJob>;
}
