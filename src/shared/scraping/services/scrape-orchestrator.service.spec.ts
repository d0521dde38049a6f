import { ConfigService } from '@nestjs/config';
import { ScrapeOrchestratorService } from './scrape-orchestrator.service';
import { FetchScraper } from '../scrapers/fetch.scraper';
import { BrowserScraper } from '../scrapers/browser.scraper';
import { RenderMode } from '../enums/render-mode.enum';
import { DomainStrategyService } from '@/shared/domain/services/domain-strategy.service';
import { BrowserPoolService } from '@/shared/browser/services/browser-pool.service';
import { FetchFailedError } from '@/shared/common/errors/pipeline.errors';
import { installMockAgent, MockAgentHandle } from '@/testing/mock-agent';

describe('ScrapeOrchestratorService', () => {
  let mock: MockAgentHandle;
  let browserScraper: BrowserScraper;
  let orchestrator: ScrapeOrchestratorService;

  beforeEach(() => {
    mock = installMockAgent();
    const config = new ConfigService({ USER_AGENT: 'test-agent' });
    browserScraper = new BrowserScraper(new BrowserPoolService(config));
    orchestrator = new ScrapeOrchestratorService(
      new DomainStrategyService(),
      new FetchScraper(),
      browserScraper,
      config,
    );
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await mock.restore();
  });

  it('returns the raw page of a static fetch', async () => {
    mock.agent
      .get('https://site.test')
      .intercept({ path: '/page', method: 'GET' })
      .reply(200, '<html><title>Hi</title></html>', {
        headers: { 'content-type': 'text/html; charset=utf-8' },
      });

    const page = await orchestrator.fetchPage({
      url: 'https://site.test/page',
      timeoutMs: 5000,
      renderMode: RenderMode.STATIC,
    });

    expect(page).toMatchObject({
      url: 'https://site.test/page',
      finalUrl: 'https://site.test/page',
      statusCode: 200,
      contentType: 'text/html; charset=utf-8',
      html: '<html><title>Hi</title></html>',
      renderMode: RenderMode.STATIC,
      bytes: 30,
    });
  });

  it('follows redirects and reports the final URL', async () => {
    const site = mock.agent.get('https://site.test');
    site
      .intercept({ path: '/old', method: 'GET' })
      .reply(301, '', { headers: { location: 'https://site.test/new' } });
    site.intercept({ path: '/new', method: 'GET' }).reply(200, 'moved');

    const page = await orchestrator.fetchPage({
      url: 'https://site.test/old',
      timeoutMs: 5000,
    });

    expect(page.finalUrl).toBe('https://site.test/new');
    expect(page.html).toBe('moved');
  });

  it('fails on a non-success status', async () => {
    mock.agent
      .get('https://site.test')
      .intercept({ path: '/missing', method: 'GET' })
      .reply(404, 'nope');

    const attempt = orchestrator.fetchPage({
      url: 'https://site.test/missing',
      timeoutMs: 5000,
    });

    await expect(attempt).rejects.toBeInstanceOf(FetchFailedError);
    await expect(attempt).rejects.toMatchObject({
      code: 'FETCH_FAILED',
      statusCode: 404,
      message: 'HTTP Error: 404',
    });
  });

  it('fails on a network error', async () => {
    mock.agent
      .get('https://site.test')
      .intercept({ path: '/down', method: 'GET' })
      .replyWithError(new Error('connection reset'));

    await expect(
      orchestrator.fetchPage({ url: 'https://site.test/down', timeoutMs: 5000 }),
    ).rejects.toBeInstanceOf(FetchFailedError);
  });

  it('routes the render mode to the browser scraper', async () => {
    const scrape = jest.spyOn(browserScraper, 'scrape').mockResolvedValue({
      success: true,
      data: '<p>rendered</p>',
      finalUrl: 'https://spa.test/#/home',
      statusCode: 200,
      contentType: 'text/html',
      metadata: {
        strategy: RenderMode.RENDER,
        bytesUsed: 15,
        duration: 10,
        timestamp: new Date('2026-01-01T00:00:00.000Z'),
      },
    });

    const page = await orchestrator.fetchPage({
      url: 'https://spa.test/',
      timeoutMs: 5000,
      renderMode: RenderMode.RENDER,
      antiDetection: true,
    });

    expect(scrape).toHaveBeenCalledWith({
      url: 'https://spa.test/',
      timeoutMs: 5000,
      renderMode: RenderMode.RENDER,
      antiDetection: true,
      userAgent: 'test-agent',
    });
    expect(page.html).toBe('<p>rendered</p>');
    expect(page.renderMode).toBe(RenderMode.RENDER);
    expect(page.fetchedAt).toBe('2026-01-01T00:00:00.000Z');
  });

  it('wraps a renderer crash as a fetch failure', async () => {
    jest
      .spyOn(browserScraper, 'scrape')
      .mockRejectedValue(new Error('renderer crashed'));

    await expect(
      orchestrator.fetchPage({
        url: 'https://spa.test/',
        timeoutMs: 5000,
        renderMode: RenderMode.RENDER,
      }),
    ).rejects.toMatchObject({ code: 'FETCH_FAILED', message: 'renderer crashed' });
  });
});
