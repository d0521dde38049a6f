import { RenderMode } from '@/shared/scraping/enums/render-mode.enum';

export interface ScrapeRequest {
  url: string;
  timeoutMs: number;
  /** Falls back to the domain strategy table when absent. */
  renderMode?: RenderMode;
  antiDetection?: boolean;
  userAgent?: string;
}

export interface ScrapeResult {
  success: boolean;
  data?: string; // HTML content
  finalUrl?: string;
  statusCode?: number;
  contentType?: string;
  error?: string;
  metadata: {
    strategy: RenderMode;
    bytesUsed: number;
    duration: number;
    timestamp: Date;
  };
}

export interface IScraper {
  scrape(request: ScrapeRequest): Promise<ScrapeResult>;
}

/** Raw page content handed from the fetch stage to the parse stage. */
export interface RawPage {
  url: string;
  finalUrl: string;
  statusCode: number;
  contentType: string;
  html: string;
  renderMode: RenderMode;
  bytes: number;
  durationMs: number;
  fetchedAt: string;
}
