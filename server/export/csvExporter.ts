import { stringify } from 'csv-stringify/sync';
import type { ScrapedRecord } from '../../shared/types';
import { takeCodePoints } from '../utils/text';

export const CSV_HEADER = ['url', 'title', 'content', 'category', 'timestamp'] as const;
export const CSV_CONTENT_LIMIT = 1_000;

/** One row per record under a fixed header; the header is written even when there are no records. */
export const serializeCsv = (records: readonly ScrapedRecord[]): string =>
  stringify([
    [...CSV_HEADER],
    ...records.map((record) => [
      record.url,
      record.title ?? '',
      takeCodePoints(record.content ?? '', CSV_CONTENT_LIMIT),
      record.category,
      record.timestamp.toISOString(),
    ]),
  ]);
