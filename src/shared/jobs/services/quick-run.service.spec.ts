import { createJobHarness, JobHarness } from '@/testing/job-harness';
import { QuickRunService } from './quick-run.service';

const PRODUCTS_HTML =
  '<html><head><title>Shop</title></head><body><p>Lamp 20</p></body></html>';

describe('QuickRunService', () => {
  let h: JobHarness;
  let quickRun: QuickRunService;

  const serve = (path: string, status: number, body: string) =>
    h.mock.agent
      .get('https://site.test')
      .intercept({ path, method: 'GET' })
      .reply(status, body, { headers: { 'content-type': 'text/html' } })
      .persist();

  beforeEach(async () => {
    h = await createJobHarness();
    quickRun = new QuickRunService(h.compliance, h.scraper, h.parser, h.extractor);
  });

  afterEach(async () => {
    await h.close();
  });

  it('returns the extraction without recording a job', async () => {
    serve('/robots.txt', 200, 'User-agent: *\nAllow: /\n');
    serve('/products', 200, PRODUCTS_HTML);
    h.reasoning.respondWith(
      async () => '{"products":[{"name":"Lamp","price":20}]}',
    );

    const outcome = await quickRun.run('https://site.test/products');

    expect(outcome).toMatchObject({
      success: true,
      data: {
        compliance: { allowed: true, reason: 'robots.txt permits crawling' },
        document: { title: 'Shop' },
        extraction: {
          kind: 'tabular',
          tableKeys: ['products'],
          data: { products: [{ name: 'Lamp', price: 20 }] },
        },
        finalUrl: 'https://site.test/products',
        statusCode: 200,
      },
    });
    expect(h.reasoning.calls[0].prompt).toContain(
      'Instruction: Extract main content',
    );
    expect(await h.store.list()).toEqual([]);
  });

  it('stops at compliance when the site disallows crawling', async () => {
    serve('/robots.txt', 200, 'User-agent: *\nDisallow: /\n');

    await expect(quickRun.run('https://site.test/products', 'Anything')).resolves.toEqual({
      success: false,
      error: {
        stage: 'compliance',
        code: 'COMPLIANCE_DENIED',
        message: 'robots.txt disallows all crawling for this agent',
      },
    });
    expect(h.reasoning.calls).toHaveLength(0);
  });

  it('reports a failed fetch', async () => {
    serve('/robots.txt', 404, '');
    serve('/gone', 404, 'missing');

    await expect(quickRun.run('https://site.test/gone', 'Anything')).resolves.toEqual({
      success: false,
      error: { stage: 'fetch', code: 'FETCH_FAILED', message: 'HTTP Error: 404' },
    });
  });
});
