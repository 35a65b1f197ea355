import { z } from 'zod';
import type { RecordMetadata, ScrapedRecord } from '../../shared/types';

export interface JsonExportItem {
  url: string;
  title: string | null;
  content: string | null;
  category: string;
  timestamp: string;
  status_code: number;
  metadata: RecordMetadata;
}

export interface JsonExportDocument {
  export_timestamp: string;
  total_items: number;
  data: JsonExportItem[];
}

export const toJsonItem = (record: ScrapedRecord): JsonExportItem => ({
  url: record.url,
  title: record.title,
  content: record.content,
  category: record.category,
  timestamp: record.timestamp.toISOString(),
  status_code: record.statusCode,
  metadata: record.metadata,
});

export const serializeJson = (records: readonly ScrapedRecord[], exportedAt: Date = new Date()): string => {
  const document: JsonExportDocument = {
    export_timestamp: exportedAt.toISOString(),
    total_items: records.length,
    data: records.map(toJsonItem),
  };
  return JSON.stringify(document, null, 2);
};

const JsonExportItemSchema = z.object({
  url: z.string(),
  title: z.string().nullable(),
  content: z.string().nullable(),
  category: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  status_code: z.number().int().default(0),
  metadata: z.record(z.unknown()).default({}),
});

const JsonExportSchema = z.object({
  export_timestamp: z.string(),
  total_items: z.number().int().nonnegative(),
  data: z.array(JsonExportItemSchema),
});

/** Reads a JSON export back into records. Throws a ZodError when the document is not an export. */
export const parseJsonExport = (text: string): ScrapedRecord[] => {
  const document = JsonExportSchema.parse(JSON.parse(text));
  return document.data.map((item) => ({
    url: item.url,
    title: item.title,
    content: item.content,
    category: item.category,
    metadata: item.metadata,
    timestamp: new Date(item.timestamp),
    statusCode: item.status_code,
  }));
};
