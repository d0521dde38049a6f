import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UseGuards,
} from '@nestjs/common';
import { QuickRunService } from '@/shared/jobs/services/quick-run.service';
import { TestScrapeDto } from '../dto/test-scrape.dto';
import { ApiKeyGuard } from '../guards/api-key.guard';

@Controller('test-scrape')
@UseGuards(ApiKeyGuard)
export class TestScrapeController {
  private readonly logger = new Logger(TestScrapeController.name);

  constructor(private readonly quickRun: QuickRunService) {}

  /** Synchronous run of one URL; nothing is stored. */
  @Post()
  @HttpCode(HttpStatus.OK)
  async testScrape(@Body() dto: TestScrapeDto) {
    this.logger.debug(`Quick run for ${dto.url}`);
    return this.quickRun.run(dto.url, dto.instruction);
  }
}
