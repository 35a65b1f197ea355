import { XMLBuilder } from 'fast-xml-parser';
import type { ScrapedRecord } from '../../shared/types';
import { truncateWithMarker } from '../utils/text';

export const XML_CONTENT_LIMIT = 2_000;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
});

/** Metadata keys become element names, so anything outside the XML name alphabet is replaced. */
export const toElementName = (key: string): string => {
  const cleaned = key.replace(/[^A-Za-z0-9_.-]/g, '_');
  return /^[A-Za-z_]/.test(cleaned) ? cleaned : `_${cleaned}`;
};

const toText = (value: unknown): string => {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
};

const toItem = (record: ScrapedRecord) => {
  const item: Record<string, unknown> = {
    url: record.url,
    title: record.title ?? '',
    content: truncateWithMarker(record.content ?? '', XML_CONTENT_LIMIT),
    category: record.category,
    timestamp: record.timestamp.toISOString(),
  };
  const entries = Object.entries(record.metadata);
  if (entries.length > 0) {
    item.metadata = Object.fromEntries(entries.map(([key, value]) => [toElementName(key), toText(value)]));
  }
  return item;
};

export const serializeXml = (records: readonly ScrapedRecord[]): string =>
  builder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'utf-8' },
    scraped_data: { item: records.map(toItem) },
  });
