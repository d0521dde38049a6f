import { Module } from '@nestjs/common';
import { BrowserPoolService } from './services/browser-pool.service';

@Module({
  providers: [BrowserPoolService],
  exports: [BrowserPoolService],
})
export class BrowserModule {}
