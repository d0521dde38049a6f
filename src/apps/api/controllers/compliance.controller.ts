import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { ComplianceService } from '@/shared/compliance/services/compliance.service';
import { ComplianceQueryDto } from '../dto/compliance-query.dto';
import { ApiKeyGuard } from '../guards/api-key.guard';

@Controller('compliance')
@UseGuards(ApiKeyGuard)
export class ComplianceController {
  constructor(private readonly compliance: ComplianceService) {}

  @Get()
  check(@Query() query: ComplianceQueryDto) {
    return this.compliance.check(query.url);
  }
}
