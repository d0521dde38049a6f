import { Module } from '@nestjs/common';
import { GeminiService } from './gemini.service';
import { REASONING_CLIENT } from './reasoning-client.interface';

@Module({
  providers: [
    GeminiService,
    { provide: REASONING_CLIENT, useExisting: GeminiService },
  ],
  exports: [REASONING_CLIENT],
})
export class GeminiModule {}
