import type { Browser } from 'playwright-core';

export type BrowserHealthStatus = 'healthy' | 'unhealthy';

export interface BrowserInstance {
  browser: Browser;
  healthStatus: BrowserHealthStatus;
  failureCount: number;
  launchedAt: Date;
}

export interface BrowserPoolStats {
  launched: boolean;
  healthStatus: BrowserHealthStatus | null;
  failureCount: number;
  activePages: number;
}
