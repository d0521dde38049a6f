import { Injectable, Logger } from '@nestjs/common';
import { readFileSync } from 'fs';
import { join } from 'path';
import type { ExtractionResult } from '@/shared/extraction/interfaces/extraction-result.interface';
import {
  Artifact,
  ExportFormat,
  isExportFormat,
} from '../interfaces/artifact.interface';
import { ExportUnsupportedError } from '@/shared/common/errors/pipeline.errors';
import {
  asRow,
  columnsOf,
  CsvRow,
  freeColumnName,
  toCsv,
} from '../utils/csv';
import { buildXmlDocument } from '../utils/xml';

const DASHBOARD_TEMPLATE = join(__dirname, '..', 'templates', 'dashboard.html');

const CONTENT_TYPES: Record<ExportFormat, string> = {
  json: 'application/json',
  csv: 'text/csv; charset=utf-8',
  xml: 'application/xml',
  dashboard: 'text/html; charset=utf-8',
};

const FILE_NAMES: Record<ExportFormat, string> = {
  json: 'extraction.json',
  csv: 'extraction.csv',
  xml: 'extraction.xml',
  dashboard: 'dashboard.html',
};

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** JSON that is safe inside an inline <script>. */
function scriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function fillTemplate(
  template: string,
  slots: Record<string, string>,
): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_, name: string) =>
    name in slots ? slots[name] : '',
  );
}

@Injectable()
export class ExporterService {
  private readonly logger = new Logger(ExporterService.name);
  private readonly dashboardTemplate: string;

  constructor() {
    this.dashboardTemplate = readFileSync(DASHBOARD_TEMPLATE, 'utf8');
  }

  assertSupported(format: string): asserts format is ExportFormat {
    if (!isExportFormat(format)) {
      throw new ExportUnsupportedError(format);
    }
  }

  render(result: ExtractionResult, format: string): Artifact {
    this.assertSupported(format);

    const content = this.renderContent(result, format);
    this.logger.debug(
      `Rendered ${format} export of ${result.metadata.sourceUrl} (${content.length} chars)`,
    );

    return {
      format,
      contentType: CONTENT_TYPES[format],
      fileName: FILE_NAMES[format],
      content,
    };
  }

  private renderContent(result: ExtractionResult, format: ExportFormat): string {
    switch (format) {
      case 'json':
        return JSON.stringify(result, null, 2);
      case 'csv':
        return this.renderCsv(result);
      case 'xml':
        return buildXmlDocument('extraction', result);
      case 'dashboard':
        return this.renderDashboard(result);
    }
  }

  /**
   * Record lists become rows; anything else collapses to a single row of
   * its top-level fields. Nested values are written as JSON text.
   */
  private renderCsv(result: ExtractionResult): string {
    switch (result.kind) {
      case 'tabular': {
        const lists = result.tableKeys.map((key) => {
          const list = result.data[key];
          return { key, rows: Array.isArray(list) ? list.map(asRow) : [] };
        });
        const records = lists.flatMap((list) => list.rows);
        if (lists.length < 2) {
          return toCsv(columnsOf(records), records);
        }

        const label = freeColumnName('table', records);
        const rows: CsvRow[] = lists.flatMap((list) =>
          list.rows.map((row) => ({ [label]: list.key, ...row })),
        );
        return toCsv(columnsOf(rows), rows);
      }
      case 'entity-list': {
        const rows = result.items.map(asRow);
        return toCsv(columnsOf(rows), rows);
      }
      case 'key-value':
        return toCsv(Object.keys(result.data), [result.data]);
      case 'free-text':
        return toCsv(['text'], [{ text: result.text }]);
      case 'unstructured':
        return toCsv(['raw_text', 'note'], [
          { raw_text: result.rawText, note: result.note },
        ]);
    }
  }

  private renderDashboard(result: ExtractionResult): string {
    const { metadata } = result;
    return fillTemplate(this.dashboardTemplate, {
      title: escapeHtml(`Extraction dashboard: ${metadata.instruction}`),
      sourceUrl: escapeHtml(metadata.sourceUrl),
      instruction: escapeHtml(metadata.instruction),
      generatedAt: escapeHtml(metadata.generatedAt),
      kind: escapeHtml(result.kind),
      data: scriptJson(result),
    });
  }
}
