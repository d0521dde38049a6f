import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DomainStrategyService } from '@/shared/domain/services/domain-strategy.service';
import { RenderMode } from '@/shared/scraping/enums/render-mode.enum';
import { FetchScraper } from '../scrapers/fetch.scraper';
import { BrowserScraper } from '../scrapers/browser.scraper';
import {
  RawPage,
  ScrapeRequest,
  ScrapeResult,
} from '@/shared/scraping/interfaces/scraper.interface';
import { FetchFailedError } from '@/shared/common/errors/pipeline.errors';
import { errorMessage } from '@/shared/lib/util';

/**
 * Fetch stage: routes a request to the static or rendering scraper and
 * turns the outcome into a RawPage. Failures are never retried here.
 */
@Injectable()
export class ScrapeOrchestratorService {
  private readonly logger = new Logger(ScrapeOrchestratorService.name);
  private readonly userAgent?: string;

  constructor(
    private readonly domainStrategy: DomainStrategyService,
    private readonly fetchScraper: FetchScraper,
    private readonly browserScraper: BrowserScraper,
    configService: ConfigService,
  ) {
    this.userAgent = configService.get<string>('USER_AGENT');
  }

  async fetchPage(request: ScrapeRequest): Promise<RawPage> {
    const renderMode =
      request.renderMode ?? this.domainStrategy.getRenderMode(request.url);

    this.logger.log(`Orchestrating ${renderMode} fetch: ${request.url}`);

    let result: ScrapeResult;
    try {
      const scraperRequest: ScrapeRequest = {
        ...request,
        renderMode,
        userAgent: request.userAgent ?? this.userAgent,
      };
      result =
        renderMode === RenderMode.RENDER
          ? await this.browserScraper.scrape(scraperRequest)
          : await this.fetchScraper.scrape(scraperRequest);
    } catch (error) {
      throw new FetchFailedError(request.url, errorMessage(error), undefined, {
        cause: error,
      });
    }

    if (!result.success || result.data === undefined) {
      throw new FetchFailedError(
        request.url,
        result.error ?? 'Fetch returned no content',
        result.statusCode,
      );
    }

    return {
      url: request.url,
      finalUrl: result.finalUrl ?? request.url,
      statusCode: result.statusCode ?? 200,
      contentType: result.contentType ?? '',
      html: result.data,
      renderMode,
      bytes: result.metadata.bytesUsed,
      durationMs: result.metadata.duration,
      fetchedAt: result.metadata.timestamp.toISOString(),
    };
  }
}
