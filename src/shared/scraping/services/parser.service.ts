import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import type { RawPage } from '../interfaces/scraper.interface';
import type {
  DocumentForm,
  DocumentImage,
  DocumentLink,
  DocumentList,
  DocumentTable,
  HeadingLevel,
  NormalizedDocument,
} from '../interfaces/document.interface';
import { errorMessage } from '@/shared/lib/util';

export const PARSE_LIMITS = {
  links: 100,
  images: 50,
  tables: 10,
  tableRows: 20,
  forms: 5,
  lists: 10,
  listItems: 20,
} as const;

const HEADING_LEVELS: HeadingLevel[] = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

function clean(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function emptyHeadings(): Record<HeadingLevel, string[]> {
  return { h1: [], h2: [], h3: [], h4: [], h5: [], h6: [] };
}

export function emptyDocument(url: string): NormalizedDocument {
  return {
    url,
    title: '',
    text: '',
    meta: {},
    links: [],
    images: [],
    headings: emptyHeadings(),
    tables: [],
    forms: [],
    lists: [],
  };
}

/**
 * Turns fetched markup into a NormalizedDocument. Tolerates malformed
 * markup and never throws; every collection keeps the first N entries in
 * document order.
 */
@Injectable()
export class ParserService {
  private readonly logger = new Logger(ParserService.name);

  parse(page: RawPage): NormalizedDocument {
    try {
      return this.parseHtml(page.html, page.finalUrl || page.url);
    } catch (error) {
      this.logger.warn(
        `Structural parse of ${page.url} failed: ${errorMessage(error)}`,
      );
      return emptyDocument(page.finalUrl || page.url);
    }
  }

  private parseHtml(html: string, baseUrl: string): NormalizedDocument {
    const $ = cheerio.load(html);

    return {
      url: baseUrl,
      title: clean($('title').first().text()),
      meta: this.extractMeta($),
      links: this.extractLinks($, baseUrl),
      images: this.extractImages($, baseUrl),
      headings: this.extractHeadings($),
      tables: this.extractTables($),
      forms: this.extractForms($, baseUrl),
      lists: this.extractLists($),
      text: this.extractText(html),
    };
  }

  private extractMeta($: cheerio.CheerioAPI): Record<string, string> {
    const meta: Record<string, string> = {};

    $('meta').each((_, el) => {
      const $el = $(el);
      const name = $el.attr('name') || $el.attr('property');
      const content = $el.attr('content');
      if (name && content !== undefined && !(name in meta)) {
        meta[name] = content.trim();
      }
    });

    return meta;
  }

  private extractLinks($: cheerio.CheerioAPI, baseUrl: string): DocumentLink[] {
    const links: DocumentLink[] = [];

    $('a[href]').each((_, el) => {
      if (links.length >= PARSE_LIMITS.links) return false;

      const $el = $(el);
      const text = clean($el.text());
      const href = this.resolveUrl($el.attr('href'), baseUrl);
      if (text && href) {
        links.push({ text, href, title: $el.attr('title') ?? '' });
      }
    });

    return links;
  }

  private extractImages(
    $: cheerio.CheerioAPI,
    baseUrl: string,
  ): DocumentImage[] {
    const images: DocumentImage[] = [];

    $('img[src]').each((_, el) => {
      if (images.length >= PARSE_LIMITS.images) return false;

      const $el = $(el);
      const src = this.resolveUrl($el.attr('src'), baseUrl);
      if (src) {
        images.push({
          src,
          alt: $el.attr('alt') ?? '',
          title: $el.attr('title') ?? '',
        });
      }
    });

    return images;
  }

  private extractHeadings(
    $: cheerio.CheerioAPI,
  ): Record<HeadingLevel, string[]> {
    const headings = emptyHeadings();

    for (const level of HEADING_LEVELS) {
      $(level).each((_, el) => {
        const text = clean($(el).text());
        if (text) {
          headings[level].push(text);
        }
      });
    }

    return headings;
  }

  private extractTables($: cheerio.CheerioAPI): DocumentTable[] {
    const tables: DocumentTable[] = [];

    $('table').each((_, table) => {
      if (tables.length >= PARSE_LIMITS.tables) return false;

      const rows = $(table)
        .find('tr')
        .toArray()
        .map((row) =>
          $(row)
            .find('th, td')
            .toArray()
            .map((cell) => clean($(cell).text())),
        );

      if (rows.length === 0) return;

      const [headers, ...body] = rows;
      tables.push({
        headers,
        rows: body
          .filter((cells) => cells.length > 0)
          .slice(0, PARSE_LIMITS.tableRows),
      });
    });

    return tables;
  }

  private extractForms($: cheerio.CheerioAPI, baseUrl: string): DocumentForm[] {
    const forms: DocumentForm[] = [];

    $('form').each((_, form) => {
      if (forms.length >= PARSE_LIMITS.forms) return false;

      const $form = $(form);
      const inputs = $form
        .find('input, select, textarea')
        .toArray()
        .map((input) => {
          const $input = $(input);
          const fallbackType = $input.is('select')
            ? 'select'
            : $input.is('textarea')
              ? 'textarea'
              : 'text';
          return {
            name: $input.attr('name') ?? '',
            type: $input.attr('type') ?? fallbackType,
            placeholder: $input.attr('placeholder') ?? '',
            required: $input.attr('required') !== undefined,
          };
        });

      forms.push({
        // An empty action submits back to the page itself
        action: this.resolveUrl($form.attr('action') ?? '', baseUrl) ?? baseUrl,
        method: ($form.attr('method') || 'GET').toUpperCase(),
        inputs,
      });
    });

    return forms;
  }

  private extractLists($: cheerio.CheerioAPI): DocumentList[] {
    const lists: DocumentList[] = [];

    $('ul, ol').each((_, list) => {
      if (lists.length >= PARSE_LIMITS.lists) return false;

      const $list = $(list);
      const items = $list
        .find('li')
        .toArray()
        .map((item) => clean($(item).text()))
        .filter((item) => item.length > 0)
        .slice(0, PARSE_LIMITS.listItems);

      if (items.length > 0) {
        lists.push({ type: $list.is('ol') ? 'ol' : 'ul', items });
      }
    });

    return lists;
  }

  private extractText(html: string): string {
    const $ = cheerio.load(html);
    $('script, style, noscript, template').remove();
    // Keep words from adjacent elements apart
    $('body *').each((_, el) => {
      $(el).prepend(' ').append(' ');
    });
    return clean($('body').text());
  }

  private resolveUrl(value: string | undefined, baseUrl: string): string | null {
    if (value === undefined) {
      return null;
    }
    try {
      return new URL(value.trim(), baseUrl).toString();
    } catch {
      return null;
    }
  }
}
