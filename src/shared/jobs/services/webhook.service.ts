import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { request } from 'undici';
import type { ExtractionJob } from '../interfaces/job.interface';
import { toWebhookPayload } from '../mappers/job.mapper';
import { errorMessage } from '@/shared/lib/util';

export const WEBHOOK_TIMEOUT_MS = 10_000;

/**
 * Best-effort POST of a terminal job to its callback URL. One attempt,
 * no signature; failures are only logged.
 */
@Injectable()
export class WebhookService {
  private readonly logger = new Logger(WebhookService.name);
  private readonly userAgent?: string;

  constructor(configService: ConfigService) {
    this.userAgent = configService.get<string>('USER_AGENT');
  }

  async deliver(url: string, job: ExtractionJob): Promise<boolean> {
    try {
      const { statusCode, body } = await request(url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          ...(this.userAgent ? { 'user-agent': this.userAgent } : {}),
        },
        body: JSON.stringify(toWebhookPayload(job)),
        headersTimeout: WEBHOOK_TIMEOUT_MS,
        bodyTimeout: WEBHOOK_TIMEOUT_MS,
        signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
      });
      await body.dump();

      if (statusCode >= 400) {
        this.logger.warn(
          `Webhook for job ${job.id} answered HTTP ${statusCode}`,
        );
        return false;
      }

      this.logger.log(`Webhook delivered for job ${job.id} (${statusCode})`);
      return true;
    } catch (error) {
      this.logger.warn(
        `Webhook delivery for job ${job.id} failed: ${errorMessage(error)}`,
      );
      return false;
    }
  }
}
