import { Injectable, Logger } from '@nestjs/common';
import type { JobError, JobStage } from '../interfaces/job.interface';
import { toJobError } from '../mappers/job.mapper';
import { ComplianceService } from '@/shared/compliance/services/compliance.service';
import { ScrapeOrchestratorService } from '@/shared/scraping/services/scrape-orchestrator.service';
import { ParserService } from '@/shared/scraping/services/parser.service';
import { SemanticExtractorService } from '@/shared/extraction/services/semantic-extractor.service';
import type { ComplianceVerdict } from '@/shared/compliance/interfaces/compliance-verdict.interface';
import type { NormalizedDocument } from '@/shared/scraping/interfaces/document.interface';
import type { ExtractionResult } from '@/shared/extraction/interfaces/extraction-result.interface';
import { ComplianceDeniedError } from '@/shared/common/errors/pipeline.errors';

export const QUICK_RUN_TIMEOUT_MS = 15_000;
export const DEFAULT_QUICK_RUN_INSTRUCTION = 'Extract main content';

export interface QuickRunData {
  compliance: ComplianceVerdict;
  document: NormalizedDocument;
  extraction: ExtractionResult;
  finalUrl: string;
  statusCode: number;
  processingTimeMs: number;
}

export type QuickRunOutcome =
  | { success: true; data: QuickRunData }
  | { success: false; error: JobError };

/**
 * Runs compliance, fetch, parse and extract inline for one URL, without a
 * job record, export or webhook.
 */
@Injectable()
export class QuickRunService {
  private readonly logger = new Logger(QuickRunService.name);

  constructor(
    private readonly compliance: ComplianceService,
    private readonly scraper: ScrapeOrchestratorService,
    private readonly parser: ParserService,
    private readonly semanticExtractor: SemanticExtractorService,
  ) {}

  async run(
    url: string,
    instruction: string = DEFAULT_QUICK_RUN_INSTRUCTION,
  ): Promise<QuickRunOutcome> {
    const startTime = Date.now();
    let stage: JobStage = 'compliance';

    try {
      const compliance = await this.compliance.check(url);
      if (!compliance.allowed) {
        throw new ComplianceDeniedError(compliance.reason);
      }

      stage = 'fetch';
      const page = await this.scraper.fetchPage({
        url,
        timeoutMs: QUICK_RUN_TIMEOUT_MS,
      });

      stage = 'parse';
      const document = this.parser.parse(page);

      stage = 'extract';
      const extraction = await this.semanticExtractor.extract(
        document,
        instruction,
        { structuredExtraction: false, strictSchema: false },
      );

      return {
        success: true,
        data: {
          compliance,
          document,
          extraction,
          finalUrl: page.finalUrl,
          statusCode: page.statusCode,
          processingTimeMs: Date.now() - startTime,
        },
      };
    } catch (error) {
      const jobError = toJobError(stage, error);
      this.logger.warn(
        `Quick run for ${url} failed at ${stage}: [${jobError.code}] ${jobError.message}`,
      );
      return { success: false, error: jobError };
    }
  }
}
