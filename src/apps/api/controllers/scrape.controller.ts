import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UseGuards,
} from '@nestjs/common';
import { JobManagerService } from '@/shared/jobs/services/job-manager.service';
import { CreateExtractionJobDto } from '../dto/create-extraction-job.dto';
import { ApiKeyGuard } from '../guards/api-key.guard';

@Controller('scrape')
@UseGuards(ApiKeyGuard)
export class ScrapeController {
  private readonly logger = new Logger(ScrapeController.name);

  constructor(private readonly jobManager: JobManagerService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async createExtractionJob(@Body() dto: CreateExtractionJobDto) {
    this.logger.debug(`Submitting extraction job for ${dto.url}`);

    const job = await this.jobManager.submit({
      url: dto.url,
      instruction: dto.instruction,
      format: dto.format,
      webhookUrl: dto.webhookUrl,
      timeoutSeconds: dto.timeout,
      renderMode: dto.renderMode,
      structuredExtraction: dto.structuredExtraction,
      strictSchema: dto.strictSchema,
      antiDetection: dto.antiDetection,
      checkCompliance: dto.checkCompliance,
    });

    return {
      jobId: job.id,
      status: job.status,
      message: 'Extraction job queued',
    };
  }
}
