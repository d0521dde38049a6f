import { FetchScraper } from './fetch.scraper';
import { RenderMode } from '../enums/render-mode.enum';
import { decodeHtml } from '../utils/decode-html';
import { installMockAgent, MockAgentHandle } from '@/testing/mock-agent';

// "<p>Caf\xe9 \x805</p>" in windows-1252: é is 0xE9, € is 0x80
const CP1252_BODY = Buffer.from([
  0x3c, 0x70, 0x3e, 0x43, 0x61, 0x66, 0xe9, 0x20, 0x80, 0x35, 0x3c, 0x2f,
  0x70, 0x3e,
]);

describe('FetchScraper', () => {
  let mock: MockAgentHandle;
  const scraper = new FetchScraper();

  const serve = (body: Buffer | string, contentType: string) =>
    mock.agent
      .get('https://site.test')
      .intercept({ path: '/page', method: 'GET' })
      .reply(200, body, { headers: { 'content-type': contentType } });

  beforeEach(() => {
    mock = installMockAgent();
  });

  afterEach(async () => {
    await mock.restore();
  });

  it('decodes the body with the charset from Content-Type', async () => {
    serve(CP1252_BODY, 'text/html; charset=windows-1252');

    const result = await scraper.scrape({
      url: 'https://site.test/page',
      timeoutMs: 5000,
    });

    expect(result.success).toBe(true);
    expect(result.data).toBe('<p>Café €5</p>');
    expect(result.metadata).toMatchObject({
      strategy: RenderMode.STATIC,
      bytesUsed: 14,
    });
  });

  it('falls back to a meta charset declaration', async () => {
    serve(
      Buffer.concat([Buffer.from('<meta charset="windows-1252">'), CP1252_BODY]),
      'text/html',
    );

    const result = await scraper.scrape({
      url: 'https://site.test/page',
      timeoutMs: 5000,
    });

    expect(result.data).toBe('<meta charset="windows-1252"><p>Café €5</p>');
  });

  it('reports a timeout when the site is too slow', async () => {
    serve('<p>late</p>', 'text/html').delay(500);

    const result = await scraper.scrape({
      url: 'https://site.test/page',
      timeoutMs: 100,
    });

    expect(result.success).toBe(false);
    expect(result.error).toBe('Timed out after 100ms');
  });
});

describe('decodeHtml', () => {
  it('reads http-equiv declarations', () => {
    const bytes = Buffer.concat([
      Buffer.from(
        '<meta http-equiv="Content-Type" content="text/html; charset=Windows-1252">',
      ),
      Buffer.from([0xe9]),
    ]);

    expect(decodeHtml(bytes, null)).toEqual({
      html: '<meta http-equiv="Content-Type" content="text/html; charset=Windows-1252">é',
      encoding: 'windows-1252',
    });
  });

  it('prefers the transport charset over the markup', () => {
    const bytes = Buffer.from('<meta charset="windows-1252">é', 'utf8');

    expect(decodeHtml(bytes, 'text/html; charset=utf-8')).toEqual({
      html: '<meta charset="windows-1252">é',
      encoding: 'utf-8',
    });
  });

  it('uses UTF-8 when the declared charset is unknown', () => {
    const bytes = Buffer.from('<p>naïve</p>', 'utf8');

    expect(decodeHtml(bytes, 'text/html; charset=x-made-up')).toEqual({
      html: '<p>naïve</p>',
      encoding: 'utf-8',
    });
  });

  it('ignores a malformed Content-Type', () => {
    const bytes = Buffer.from('<p>ok</p>', 'utf8');

    expect(decodeHtml(bytes, ';;;').encoding).toBe('utf-8');
  });
});
