import { Injectable, Logger } from '@nestjs/common';
import type { BrowserContextOptions } from 'playwright-core';
import { BrowserPoolService } from '@/shared/browser/services/browser-pool.service';
import {
  IScraper,
  ScrapeRequest,
  ScrapeResult,
} from '@/shared/scraping/interfaces/scraper.interface';
import { RenderMode } from '@/shared/scraping/enums/render-mode.enum';
import {
  BROWSER_NAVIGATION_HEADERS,
  DESKTOP_CHROME_USER_AGENT,
  MASK_WEBDRIVER_SCRIPT,
} from '@/shared/scraping/constants/browser-headers';
import { errorMessage } from '@/shared/lib/util';

const NETWORK_IDLE_BUDGET_MS = 5000;

@Injectable()
export class BrowserScraper implements IScraper {
  private readonly logger = new Logger(BrowserScraper.name);

  constructor(private readonly browserPool: BrowserPoolService) {}

  async scrape(scrapeRequest: ScrapeRequest): Promise<ScrapeResult> {
    const startTime = Date.now();
    const { url, timeoutMs, antiDetection } = scrapeRequest;
    let succeeded = false;

    try {
      const browser = await this.browserPool.acquire();

      try {
        const contextOptions: BrowserContextOptions = antiDetection
          ? {
              userAgent: DESKTOP_CHROME_USER_AGENT,
              viewport: { width: 1920, height: 1080 },
              deviceScaleFactor: 1,
              locale: 'en-US',
              extraHTTPHeaders: BROWSER_NAVIGATION_HEADERS,
            }
          : { userAgent: scrapeRequest.userAgent };

        const context = await browser.newContext(contextOptions);

        try {
          const page = await context.newPage();

          if (antiDetection) {
            await page.addInitScript({ content: MASK_WEBDRIVER_SCRIPT });
          }

          this.logger.log(`Rendering ${url}`);
          const response = await page.goto(url, {
            timeout: timeoutMs,
            waitUntil: 'domcontentloaded',
          });

          const statusCode = response?.status() ?? 200;
          if (statusCode >= 400) {
            return this.failure(
              `HTTP Error: ${statusCode}`,
              startTime,
              statusCode,
            );
          }

          // Script-driven pages keep loading after DOMContentLoaded
          try {
            await page.waitForLoadState('networkidle', {
              timeout: Math.min(NETWORK_IDLE_BUDGET_MS, timeoutMs),
            });
          } catch (error) {
            this.logger.debug(
              `Network did not settle for ${url}: ${errorMessage(error)}`,
            );
          }

          const html = await page.content();
          const duration = Date.now() - startTime;
          const bytesUsed = Buffer.byteLength(html, 'utf8');
          succeeded = true;

          this.logger.log(
            `Render completed for ${url}: ${bytesUsed} bytes in ${duration}ms`,
          );

          return {
            success: true,
            data: html,
            finalUrl: page.url(),
            statusCode,
            contentType:
              response?.headers()['content-type'] ?? 'text/html',
            metadata: {
              strategy: RenderMode.RENDER,
              bytesUsed,
              duration,
              timestamp: new Date(),
            },
          };
        } finally {
          await context.close();
        }
      } finally {
        this.browserPool.release(succeeded);
      }
    } catch (error) {
      this.logger.error(`Render failed for ${url}: ${errorMessage(error)}`);
      return this.failure(errorMessage(error), startTime);
    }
  }

  private failure(
    error: string,
    startTime: number,
    statusCode?: number,
  ): ScrapeResult {
    return {
      success: false,
      error,
      statusCode,
      metadata: {
        strategy: RenderMode.RENDER,
        bytesUsed: 0,
        duration: Date.now() - startTime,
        timestamp: new Date(),
      },
    };
  }
}
