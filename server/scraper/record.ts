import type { RecordMetadata, ScrapedRecord } from '../../shared/types';

export interface RecordInput {
  url: string;
  title?: string | null;
  content?: string | null;
  category?: string | null;
  metadata?: RecordMetadata | null;
  timestamp?: Date | null;
  statusCode?: number;
}

export const createRecord = (input: RecordInput, now: () => Date = () => new Date()): ScrapedRecord => ({
  url: input.url,
  title: input.title ?? null,
  content: input.content ?? null,
  category: input.category || 'unknown',
  metadata: input.metadata ?? {},
  timestamp: input.timestamp ?? now(),
  statusCode: input.statusCode ?? 0,
});
