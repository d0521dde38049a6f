import { isPlainObject } from '@/shared/lib/util';

export type CsvRow = Record<string, unknown>;

/** RFC 4180 quoting: fields with quotes, commas, line breaks or edge spaces. */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function csvCell(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/** Union of the rows' keys in first-seen order. */
export function columnsOf(rows: CsvRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return [...columns];
}

/** `base`, prefixed with underscores until no row uses it. */
export function freeColumnName(base: string, rows: CsvRow[]): string {
  let name = base;
  while (rows.some((row) => name in row)) {
    name = `_${name}`;
  }
  return name;
}

export function toCsv(columns: string[], rows: CsvRow[]): string {
  const lines = [columns.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(
      columns.map((column) => escapeCsvField(csvCell(row[column]))).join(','),
    );
  }
  return lines.join('\n');
}

export function asRow(value: unknown): CsvRow {
  return isPlainObject(value) ? value : { value };
}
