import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { chromium, Browser } from 'playwright-core';
import { errorMessage } from '@/shared/lib/util';
import {
  BrowserInstance,
  BrowserPoolStats,
} from '../interfaces/browser-instance.interface';

const MAX_CONSECUTIVE_FAILURES = 5;

/**
 * Owns the headless Chromium used by the render mode. The browser is
 * launched on first use and relaunched after it disconnects or keeps
 * failing.
 */
@Injectable()
export class BrowserPoolService implements OnModuleDestroy {
  private readonly logger = new Logger(BrowserPoolService.name);
  private readonly headless: boolean;
  private readonly executablePath?: string;
  private instance: BrowserInstance | null = null;
  private launching: Promise<BrowserInstance> | null = null;
  private activePages = 0;

  constructor(private readonly configService: ConfigService) {
    this.headless =
      this.configService.get<boolean>('BROWSER_HEADLESS') !== false;
    this.executablePath =
      this.configService.get<string>('BROWSER_EXECUTABLE_PATH') || undefined;
  }

  async onModuleDestroy() {
    const instance = this.instance;
    this.instance = null;
    if (!instance) {
      return;
    }

    this.logger.log('Shutting down browser...');
    try {
      await instance.browser.close();
    } catch (error) {
      this.logger.error(`Failed to close browser: ${errorMessage(error)}`);
    }
  }

  async acquire(): Promise<Browser> {
    if (this.instance?.healthStatus === 'healthy') {
      this.activePages++;
      return this.instance.browser;
    }

    if (this.instance) {
      await this.discard(this.instance);
    }

    if (!this.launching) {
      this.launching = this.launchBrowser().finally(() => {
        this.launching = null;
      });
    }

    const instance = await this.launching;
    this.activePages++;
    return instance.browser;
  }

  release(succeeded: boolean): void {
    this.activePages = Math.max(0, this.activePages - 1);

    const instance = this.instance;
    if (!instance) {
      return;
    }

    if (succeeded) {
      instance.failureCount = 0;
      return;
    }

    instance.failureCount++;
    if (instance.failureCount >= MAX_CONSECUTIVE_FAILURES) {
      instance.healthStatus = 'unhealthy';
      this.logger.warn(
        `Browser marked unhealthy after ${instance.failureCount} consecutive failures`,
      );
    }
  }

  getPoolStats(): BrowserPoolStats {
    return {
      launched: this.instance !== null,
      healthStatus: this.instance?.healthStatus ?? null,
      failureCount: this.instance?.failureCount ?? 0,
      activePages: this.activePages,
    };
  }

  private async launchBrowser(): Promise<BrowserInstance> {
    this.logger.log(`Launching browser (headless: ${this.headless})`);

    const browser = await chromium.launch({
      headless: this.headless,
      executablePath: this.executablePath,
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-blink-features=AutomationControlled',
        '--disable-infobars',
        '--disable-dev-shm-usage',
      ],
    });

    const instance: BrowserInstance = {
      browser,
      healthStatus: 'healthy',
      failureCount: 0,
      launchedAt: new Date(),
    };

    browser.on('disconnected', () => {
      if (this.instance === instance) {
        this.logger.warn('Browser disconnected');
        this.instance = null;
      }
    });

    this.instance = instance;
    return instance;
  }

  private async discard(instance: BrowserInstance): Promise<void> {
    this.instance = null;
    try {
      await instance.browser.close();
    } catch (error) {
      this.logger.warn(`Failed to close stale browser: ${errorMessage(error)}`);
    }
  }
}
