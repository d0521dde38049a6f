import { Module } from '@nestjs/common';
import { BrowserModule } from '@/shared/browser/browser.module';
import { DomainStrategyService } from '@/shared/domain/services/domain-strategy.service';
import { FetchScraper } from './scrapers/fetch.scraper';
import { BrowserScraper } from './scrapers/browser.scraper';
import { ScrapeOrchestratorService } from './services/scrape-orchestrator.service';
import { ParserService } from './services/parser.service';

/** Fetching (static or rendered) and structural parsing of pages. */
@Module({
  imports: [BrowserModule],
  providers: [
    DomainStrategyService,
    FetchScraper,
    BrowserScraper,
    ScrapeOrchestratorService,
    ParserService,
  ],
  exports: [ScrapeOrchestratorService, ParserService],
})
export class ScrapingModule {}
