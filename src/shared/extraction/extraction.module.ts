import { Module } from '@nestjs/common';
import { GeminiModule } from '@/shared/gemini/gemini.module';
import { SemanticExtractorService } from './services/semantic-extractor.service';

@Module({
  imports: [GeminiModule],
  providers: [SemanticExtractorService],
  exports: [SemanticExtractorService],
})
export class ExtractionModule {}
