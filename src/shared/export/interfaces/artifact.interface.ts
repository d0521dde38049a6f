export const EXPORT_FORMATS = ['json', 'csv', 'xml', 'dashboard'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: unknown): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface Artifact {
  format: ExportFormat;
  contentType: string;
  fileName: string;
  content: string;
}
