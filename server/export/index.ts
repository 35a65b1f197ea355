import type { ExportKind } from '../../shared/exportStore';
import type { ScrapedRecord } from '../../shared/types';
import { serializeCsv } from './csvExporter';
import { serializeJson } from './jsonExporter';
import { serializeXml } from './xmlExporter';

export const EXPORT_FORMATS = ['json', 'csv', 'xml'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface Exporter {
  format: ExportFormat;
  extension: string;
  kind: ExportKind;
  mediaType: string;
  serialize: (records: readonly ScrapedRecord[], exportedAt: Date) => string;
}

const EXPORTERS: Record<ExportFormat, Exporter> = {
  json: { format: 'json', extension: 'json', kind: 'json', mediaType: 'application/json', serialize: serializeJson },
  csv: { format: 'csv', extension: 'csv', kind: 'csv', mediaType: 'text/csv', serialize: (records) => serializeCsv(records) },
  xml: { format: 'xml', extension: 'xml', kind: 'xml', mediaType: 'application/xml', serialize: (records) => serializeXml(records) },
};

export const isExportFormat = (value: string): value is ExportFormat =>
  EXPORT_FORMATS.some((format) => format === value);

export const unsupportedFormatMessage = (format: string, supported: readonly string[] = EXPORT_FORMATS): string =>
  `Unsupported format '${format}'. Supported formats: ${supported.join(', ')}`;

/** Case-insensitive lookup; throws for a format that has no exporter. */
export const createExporter = (format: string): Exporter => {
  const normalized = format.trim().toLowerCase();
  if (!isExportFormat(normalized)) {
    throw new Error(unsupportedFormatMessage(normalized));
  }
  return EXPORTERS[normalized];
};

export { parseJsonExport, serializeJson, toJsonItem, type JsonExportItem } from './jsonExporter';
export { serializeCsv } from './csvExporter';
export { serializeXml } from './xmlExporter';
export { buildExportIndex, buildInsightsReport, buildSummaryReport, type ExportedFiles } from './report';
