import {
  Controller,
  Get,
  NotFoundException,
  Param,
  Query,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import {
  DEFAULT_PAGE_SIZE,
  JobManagerService,
} from '@/shared/jobs/services/job-manager.service';
import {
  toJobResponse,
  toJobSummary,
} from '@/shared/jobs/mappers/job.mapper';
import { ListJobsDto } from '../dto/list-jobs.dto';
import { ApiKeyGuard } from '../guards/api-key.guard';

@Controller('jobs')
@UseGuards(ApiKeyGuard)
export class JobsController {
  constructor(private readonly jobManager: JobManagerService) {}

  @Get()
  async listJobs(@Query() query: ListJobsDto) {
    const limit = query.limit ?? DEFAULT_PAGE_SIZE;
    const offset = query.offset ?? 0;
    const jobs = await this.jobManager.list(limit, offset);

    return {
      jobs: jobs.map(toJobSummary),
      limit,
      offset,
    };
  }

  @Get(':jobId')
  async getJob(@Param('jobId') jobId: string) {
    return toJobResponse(await this.jobManager.getStatus(jobId));
  }

  @Get(':jobId/exports/:format')
  async downloadExport(
    @Param('jobId') jobId: string,
    @Param('format') format: string,
  ): Promise<StreamableFile> {
    const artifact = await this.jobManager.getArtifact(jobId, format);
    if (!artifact) {
      throw new NotFoundException(`Job ${jobId} has no ${format} export`);
    }

    return new StreamableFile(Buffer.from(artifact.content, 'utf8'), {
      type: artifact.contentType,
      disposition: `attachment; filename="${artifact.fileName}"`,
    });
  }
}
