import { Injectable, Logger } from '@nestjs/common';
import { fetch } from 'undici';
import {
  IScraper,
  ScrapeRequest,
  ScrapeResult,
} from '@/shared/scraping/interfaces/scraper.interface';
import { RenderMode } from '@/shared/scraping/enums/render-mode.enum';
import {
  ACCEPT_HTML,
  BROWSER_NAVIGATION_HEADERS,
  DESKTOP_CHROME_USER_AGENT,
} from '@/shared/scraping/constants/browser-headers';
import { decodeHtml } from '@/shared/scraping/utils/decode-html';
import { errorMessage } from '@/shared/lib/util';

@Injectable()
export class FetchScraper implements IScraper {
  private readonly logger = new Logger(FetchScraper.name);

  async scrape(scrapeRequest: ScrapeRequest): Promise<ScrapeResult> {
    const startTime = Date.now();
    const { url, timeoutMs, antiDetection } = scrapeRequest;
    const signal = AbortSignal.timeout(timeoutMs);

    try {
      this.logger.log(`Fetch scraping: ${url}`);

      const headers: Record<string, string> = antiDetection
        ? {
            'User-Agent': DESKTOP_CHROME_USER_AGENT,
            ...BROWSER_NAVIGATION_HEADERS,
          }
        : {
            'User-Agent': scrapeRequest.userAgent || DESKTOP_CHROME_USER_AGENT,
            Accept: ACCEPT_HTML,
            'Accept-Language': 'en-US,en;q=0.9',
          };

      const response = await fetch(url, {
        method: 'GET',
        headers,
        redirect: 'follow',
        signal,
      });

      const bytes = Buffer.from(await response.arrayBuffer());
      const duration = Date.now() - startTime;

      if (!response.ok) {
        this.logger.warn(`Fetch for ${url} answered HTTP ${response.status}`);
        return {
          success: false,
          statusCode: response.status,
          error: `HTTP Error: ${response.status}`,
          metadata: {
            strategy: RenderMode.STATIC,
            bytesUsed: 0,
            duration,
            timestamp: new Date(),
          },
        };
      }

      const contentType = response.headers.get('content-type');
      const { html, encoding } = decodeHtml(bytes, contentType);
      const bytesUsed = bytes.length;

      this.logger.log(
        `Fetch completed for ${url}: ${bytesUsed} bytes (${encoding}) in ${duration}ms`,
      );

      return {
        success: true,
        data: html,
        finalUrl: response.url || url,
        statusCode: response.status,
        contentType: contentType ?? '',
        metadata: {
          strategy: RenderMode.STATIC,
          bytesUsed,
          duration,
          timestamp: new Date(),
        },
      };
    } catch (error) {
      const duration = Date.now() - startTime;
      // The rejection carries the signal's reason, not a stable error class
      const message = signal.aborted
        ? `Timed out after ${timeoutMs}ms`
        : errorMessage(error);
      this.logger.error(`Fetch failed for ${url}: ${message}`);

      return {
        success: false,
        error: message,
        metadata: {
          strategy: RenderMode.STATIC,
          bytesUsed: 0,
          duration,
          timestamp: new Date(),
        },
      };
    }
  }
}
