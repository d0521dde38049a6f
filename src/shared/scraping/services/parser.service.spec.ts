import { ParserService, PARSE_LIMITS, emptyDocument } from './parser.service';
import type { RawPage } from '../interfaces/scraper.interface';
import { RenderMode } from '../enums/render-mode.enum';

function page(html: string, finalUrl = 'https://site.test/dir/page.html'): RawPage {
  return {
    url: finalUrl,
    finalUrl,
    statusCode: 200,
    contentType: 'text/html',
    html,
    renderMode: RenderMode.STATIC,
    bytes: html.length,
    durationMs: 1,
    fetchedAt: '2026-01-01T00:00:00.000Z',
  };
}

const SAMPLE = `
<html>
  <head>
    <title> Sample  Page </title>
    <meta name="description" content="A test page">
    <meta property="og:title" content="OG Title">
  </head>
  <body>
    <h1>Main</h1>
    <h2>Second A</h2>
    <h2>Second B</h2>
    <p>Hello<b>world</b></p>
    <script>var hidden = "secret";</script>
    <a href="/about" title="About us">About</a>
    <a href="https://other.test/x">Other</a>
    <a href="/empty"></a>
    <img src="img/logo.png" alt="Logo">
    <table>
      <tr><th>Name</th><th>Price</th></tr>
      <tr><td>Widget</td><td>9.99</td></tr>
    </table>
    <form action="/search" method="post">
      <input name="q" placeholder="Search" required>
      <select name="sort"></select>
    </form>
    <ol><li>One</li><li>Two</li></ol>
  </body>
</html>`;

describe('ParserService', () => {
  const parser = new ParserService();

  describe('parse', () => {
    const doc = parser.parse(page(SAMPLE));

    it('extracts title and meta tags', () => {
      expect(doc.url).toBe('https://site.test/dir/page.html');
      expect(doc.title).toBe('Sample Page');
      expect(doc.meta).toEqual({
        description: 'A test page',
        'og:title': 'OG Title',
      });
    });

    it('resolves links and images against the page URL', () => {
      expect(doc.links).toEqual([
        { text: 'About', href: 'https://site.test/about', title: 'About us' },
        { text: 'Other', href: 'https://other.test/x', title: '' },
      ]);
      expect(doc.images).toEqual([
        { src: 'https://site.test/dir/img/logo.png', alt: 'Logo', title: '' },
      ]);
    });

    it('keys headings by level in document order', () => {
      expect(doc.headings.h1).toEqual(['Main']);
      expect(doc.headings.h2).toEqual(['Second A', 'Second B']);
      expect(doc.headings.h3).toEqual([]);
    });

    it('treats the first table row as the header', () => {
      expect(doc.tables).toEqual([
        { headers: ['Name', 'Price'], rows: [['Widget', '9.99']] },
      ]);
    });

    it('captures forms with absolute actions and upper-case methods', () => {
      expect(doc.forms).toEqual([
        {
          action: 'https://site.test/search',
          method: 'POST',
          inputs: [
            { name: 'q', type: 'text', placeholder: 'Search', required: true },
            { name: 'sort', type: 'select', placeholder: '', required: false },
          ],
        },
      ]);
    });

    it('captures lists with their type', () => {
      expect(doc.lists).toEqual([{ type: 'ol', items: ['One', 'Two'] }]);
    });

    it('collapses visible text and drops scripts', () => {
      expect(doc.text).toBe(
        'Main Second A Second B Hello world About Other Name Price Widget 9.99 One Two',
      );
    });
  });

  it('keeps only the first N entries of each collection', () => {
    const links = Array.from(
      { length: 150 },
      (_, i) => `<a href="/p/${i}">link ${i}</a>`,
    ).join('');
    const images = Array.from(
      { length: 60 },
      (_, i) => `<img src="/i/${i}.png">`,
    ).join('');
    const rows = Array.from(
      { length: 25 },
      (_, i) => `<tr><td>${i}</td></tr>`,
    ).join('');
    const tables = Array.from(
      { length: 12 },
      (_, i) => `<table><tr><th>t${i}</th></tr>${rows}</table>`,
    ).join('');
    const forms = Array.from(
      { length: 7 },
      (_, i) => `<form action="/f/${i}"></form>`,
    ).join('');
    const items = Array.from({ length: 25 }, (_, i) => `<li>i${i}</li>`).join('');
    const lists = Array.from({ length: 12 }, () => `<ul>${items}</ul>`).join('');

    const doc = parser.parse(
      page(`<body>${links}${images}${tables}${forms}${lists}</body>`),
    );

    expect(doc.links).toHaveLength(PARSE_LIMITS.links);
    expect(doc.links[0].href).toBe('https://site.test/p/0');
    expect(doc.links[99].text).toBe('link 99');
    expect(doc.images).toHaveLength(PARSE_LIMITS.images);
    expect(doc.tables).toHaveLength(PARSE_LIMITS.tables);
    expect(doc.tables[0].headers).toEqual(['t0']);
    expect(doc.tables[0].rows).toHaveLength(PARSE_LIMITS.tableRows);
    expect(doc.tables[0].rows[19]).toEqual(['19']);
    expect(doc.forms).toHaveLength(PARSE_LIMITS.forms);
    expect(doc.forms[4].action).toBe('https://site.test/f/4');
    expect(doc.lists).toHaveLength(PARSE_LIMITS.lists);
    expect(doc.lists[0].items).toHaveLength(PARSE_LIMITS.listItems);
  });

  it('defaults missing fields to empty values', () => {
    expect(parser.parse(page(''))).toEqual(
      emptyDocument('https://site.test/dir/page.html'),
    );
  });

  it('tolerates malformed markup', () => {
    const doc = parser.parse(
      page('<div><p>Unclosed <a href="/x">link<table><tr><td>cell'),
    );

    expect(doc.links[0].href).toBe('https://site.test/x');
    expect(doc.text).toContain('Unclosed');
  });

  it('skips URLs that cannot be resolved', () => {
    const doc = parser.parse(
      page('<a href="/relative">Rel</a><img src="x.png">', 'not a url'),
    );

    expect(doc.links).toEqual([]);
    expect(doc.images).toEqual([]);
  });
});
