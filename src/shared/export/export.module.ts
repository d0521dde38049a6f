import { Module } from '@nestjs/common';
import { ExporterService } from './services/exporter.service';

@Module({
  providers: [ExporterService],
  exports: [ExporterService],
})
export class ExportModule {}
