import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Observable, Subject } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';
import {
  ExtractionJob,
  JOB_STATUSES,
  JobInput,
  JobStage,
  JobStatus,
  JobStatusCounts,
  JobTransition,
} from '../interfaces/job.interface';
import { JOB_STORE, JobStore } from '../interfaces/job-store.interface';
import { JOB_QUEUE } from '@/shared/queue/queue.constants';
import type { JobQueue } from '@/shared/queue/interfaces/job-queue.interface';
import { ComplianceService } from '@/shared/compliance/services/compliance.service';
import { ScrapeOrchestratorService } from '@/shared/scraping/services/scrape-orchestrator.service';
import { ParserService } from '@/shared/scraping/services/parser.service';
import { SemanticExtractorService } from '@/shared/extraction/services/semantic-extractor.service';
import { ExporterService } from '@/shared/export/services/exporter.service';
import {
  Artifact,
  ExportFormat,
  isExportFormat,
} from '@/shared/export/interfaces/artifact.interface';
import type { ExtractionResult } from '@/shared/extraction/interfaces/extraction-result.interface';
import type { ComplianceVerdict } from '@/shared/compliance/interfaces/compliance-verdict.interface';
import type { RenderMode } from '@/shared/scraping/enums/render-mode.enum';
import {
  ComplianceDeniedError,
  IllegalJobTransitionError,
  JobNotFoundError,
} from '@/shared/common/errors/pipeline.errors';
import { toJobError } from '../mappers/job.mapper';
import { JobLockService } from './job-lock.service';
import { WebhookService } from './webhook.service';

export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}

/** What a caller submits; omitted options take their defaults. */
export interface JobSubmission {
  url: string;
  instruction: string;
  format?: string;
  webhookUrl?: string;
  timeoutSeconds?: number;
  renderMode?: RenderMode;
  structuredExtraction?: boolean;
  strictSchema?: boolean;
  antiDetection?: boolean;
  checkCompliance?: boolean;
}

type JobPatch = Partial<
  Pick<
    ExtractionJob,
    'stage' | 'startedAt' | 'completedAt' | 'compliance' | 'result' | 'error'
  >
>;

export interface JobStats extends JobStatusCounts {
  total: number;
}

/**
 * Owns the job lifecycle: records submissions, runs the stages in order
 * for each dequeued job and publishes every status transition on
 * `transitions$`.
 */
@Injectable()
export class JobManagerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(JobManagerService.name);
  private readonly transitions = new Subject<JobTransition>();
  readonly transitions$: Observable<JobTransition> =
    this.transitions.asObservable();
  private readonly ttlMs: number;
  private readonly maxRecords: number;

  constructor(
    @Inject(JOB_STORE) private readonly store: JobStore,
    @Inject(JOB_QUEUE) private readonly queue: JobQueue,
    private readonly compliance: ComplianceService,
    private readonly scraper: ScrapeOrchestratorService,
    private readonly parser: ParserService,
    private readonly semanticExtractor: SemanticExtractorService,
    private readonly exporter: ExporterService,
    private readonly webhook: WebhookService,
    private readonly locks: JobLockService,
    configService: ConfigService,
  ) {
    this.ttlMs =
      configService.get<number>('JOB_TTL_MS') || 24 * 60 * 60 * 1000;
    this.maxRecords = configService.get<number>('JOB_MAX_RECORDS') || 1000;
  }

  onModuleInit() {
    this.queue.registerHandler((jobId) => this.run(jobId));
    this.logger.log(`Job queue ready (driver: ${this.queue.driver})`);
  }

  async onModuleDestroy() {
    await this.queue.close();
    this.transitions.complete();
  }

  async submit(submission: JobSubmission): Promise<ExtractionJob> {
    const format = submission.format ?? 'json';
    this.exporter.assertSupported(format);

    const input: JobInput = {
      url: submission.url,
      instruction: submission.instruction,
      format,
      webhookUrl: submission.webhookUrl,
      timeoutSeconds: submission.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
      renderMode: submission.renderMode,
      structuredExtraction: submission.structuredExtraction ?? false,
      strictSchema: submission.strictSchema ?? false,
      antiDetection: submission.antiDetection ?? false,
      checkCompliance: submission.checkCompliance ?? true,
    };

    const job: ExtractionJob = {
      id: uuidv4(),
      status: 'queued',
      stage: null,
      input,
      createdAt: new Date().toISOString(),
    };

    await this.store.put(job);
    await this.enforceCapacity();

    try {
      await this.queue.enqueue(job.id);
    } catch (error) {
      await this.store.delete(job.id);
      throw error;
    }

    this.logger.log(`Job ${job.id} queued for ${input.url}`);
    return job;
  }

  /**
   * Executes every stage of a queued job. Resolves with the terminal
   * record; stage failures end up on the record, not as rejections.
   */
  async run(jobId: string): Promise<ExtractionJob> {
    let job = await this.transition(jobId, 'running', {
      stage: 'compliance',
      startedAt: new Date().toISOString(),
    });
    const { input } = job;
    const startTime = Date.now();
    let stage: JobStage = 'compliance';

    try {
      const verdict = input.checkCompliance
        ? await this.compliance.check(input.url)
        : this.skippedVerdict();
      await this.annotate(jobId, { compliance: verdict });
      if (!verdict.allowed) {
        throw new ComplianceDeniedError(verdict.reason);
      }

      stage = await this.enterStage(jobId, 'fetch');
      const page = await this.scraper.fetchPage({
        url: input.url,
        timeoutMs: input.timeoutSeconds * 1000,
        renderMode: input.renderMode,
        antiDetection: input.antiDetection,
      });

      stage = await this.enterStage(jobId, 'parse');
      const document = this.parser.parse(page);

      stage = await this.enterStage(jobId, 'extract');
      const extraction = await this.semanticExtractor.extract(
        document,
        input.instruction,
        {
          structuredExtraction: input.structuredExtraction,
          strictSchema: input.strictSchema,
        },
      );

      stage = await this.enterStage(jobId, 'export');
      const exports = this.renderExports(extraction, input.format);

      job = await this.transition(jobId, 'completed', {
        completedAt: new Date().toISOString(),
        result: {
          document,
          extraction,
          exports,
          metadata: {
            finalUrl: page.finalUrl,
            statusCode: page.statusCode,
            renderMode: page.renderMode,
            contentLength: page.bytes,
            linksFound: document.links.length,
            imagesFound: document.images.length,
            tablesFound: document.tables.length,
            formsFound: document.forms.length,
            processingTimeMs: Date.now() - startTime,
          },
        },
      });
      this.logger.log(`Job ${jobId} completed`);
    } catch (error) {
      const jobError = toJobError(stage, error);
      this.logger.warn(
        `Job ${jobId} failed at ${stage}: [${jobError.code}] ${jobError.message}`,
      );
      job = await this.transition(jobId, 'failed', {
        completedAt: new Date().toISOString(),
        error: jobError,
      });
    }

    if (job.input.webhookUrl) {
      await this.webhook.deliver(job.input.webhookUrl, job);
    }
    return job;
  }

  async getStatus(jobId: string): Promise<ExtractionJob> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  async getArtifact(jobId: string, format: string): Promise<Artifact | null> {
    const job = await this.getStatus(jobId);
    if (!isExportFormat(format)) {
      return null;
    }
    return job.result?.exports[format] ?? null;
  }

  async list(
    limit: number = DEFAULT_PAGE_SIZE,
    offset = 0,
  ): Promise<ExtractionJob[]> {
    return this.store.list({
      limit: Math.min(Math.max(1, Math.floor(limit)), MAX_PAGE_SIZE),
      offset: Math.max(0, Math.floor(offset)),
    });
  }

  async getStats(): Promise<JobStats> {
    const counts = await this.store.countByStatus();
    const total = JOB_STATUSES.reduce((sum, status) => sum + counts[status], 0);
    return { ...counts, total };
  }

  /** Resolves with the job's terminal record, now or when it gets there. */
  whenSettled(jobId: string): Promise<ExtractionJob> {
    return new Promise((resolve, reject) => {
      const subscription = this.transitions$.subscribe((transition) => {
        if (transition.jobId === jobId && isTerminal(transition.to)) {
          subscription.unsubscribe();
          resolve(transition.job);
        }
      });

      void this.getStatus(jobId).then(
        (job) => {
          if (isTerminal(job.status)) {
            subscription.unsubscribe();
            resolve(job);
          }
        },
        (error: unknown) => {
          subscription.unsubscribe();
          reject(error);
        },
      );
    });
  }

  /** Moves a job along the state machine, rejecting illegal moves. */
  async transition(
    jobId: string,
    to: JobStatus,
    patch: JobPatch = {},
  ): Promise<ExtractionJob> {
    const { job, from } = await this.locks.runExclusive(jobId, async () => {
      const current = await this.getStatus(jobId);
      if (!TRANSITIONS[current.status].includes(to)) {
        throw new IllegalJobTransitionError(jobId, current.status, to);
      }
      const next: ExtractionJob = { ...current, ...patch, status: to };
      await this.store.put(next);
      return { job: next, from: current.status };
    });

    this.transitions.next({ jobId, from, to, job });
    return job;
  }

  /** Updates a non-terminal job without changing its status. */
  async annotate(jobId: string, patch: JobPatch): Promise<ExtractionJob> {
    return this.locks.runExclusive(jobId, async () => {
      const current = await this.getStatus(jobId);
      if (isTerminal(current.status)) {
        throw new IllegalJobTransitionError(jobId, current.status);
      }
      const next: ExtractionJob = { ...current, ...patch };
      await this.store.put(next);
      return next;
    });
  }

  /** Drops terminal jobs that finished more than the TTL ago. */
  async evictExpired(now: number = Date.now()): Promise<number> {
    const jobs = await this.store.list();
    let evicted = 0;

    for (const job of jobs) {
      if (
        isTerminal(job.status) &&
        job.completedAt &&
        now - Date.parse(job.completedAt) > this.ttlMs &&
        (await this.evict(job.id))
      ) {
        evicted++;
      }
    }

    return evicted;
  }

  private async enforceCapacity(): Promise<void> {
    const jobs = await this.store.list();
    let excess = jobs.length - this.maxRecords;
    if (excess <= 0) return;

    // list() is newest first
    for (const job of [...jobs].reverse()) {
      if (excess <= 0) break;
      if (isTerminal(job.status) && (await this.evict(job.id))) {
        excess--;
      }
    }
  }

  private async evict(jobId: string): Promise<boolean> {
    const removed = await this.locks.runExclusive(jobId, () =>
      this.store.delete(jobId),
    );
    if (removed) {
      this.logger.debug(`Evicted job ${jobId}`);
    }
    return removed;
  }

  private async enterStage(jobId: string, stage: JobStage): Promise<JobStage> {
    await this.annotate(jobId, { stage });
    return stage;
  }

  private renderExports(
    extraction: ExtractionResult,
    format: ExportFormat,
  ): Partial<Record<ExportFormat, Artifact>> {
    // The dashboard reads its data from the JSON export
    const formats: ExportFormat[] =
      format === 'dashboard' ? ['json', 'dashboard'] : [format];

    const exports: Partial<Record<ExportFormat, Artifact>> = {};
    for (const target of formats) {
      exports[target] = this.exporter.render(extraction, target);
    }
    return exports;
  }

  private skippedVerdict(): ComplianceVerdict {
    return {
      allowed: true,
      reason: 'Compliance check skipped on request',
      policySource: null,
      crawlDelay: null,
      pathAllowed: true,
      checkedAt: new Date().toISOString(),
    };
  }
}
