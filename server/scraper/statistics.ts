import type { ScrapeStatistics, ScrapedRecord } from '../../shared/types';

const hostnameOf = (url: string): string => {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
};

/** Counts per key, most frequent first; equal counts keep first-seen order. */
const distribution = (keys: readonly string[]): Record<string, number> => {
  const counts = new Map<string, number>();
  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1]));
};

export const emptyStatistics = (): ScrapeStatistics => ({
  totalScraped: 0,
  categories: {},
  statusCodes: {},
  contentStats: { avgLength: 0, minLength: 0, maxLength: 0 },
  domains: 0,
});

export const computeStatistics = (records: readonly ScrapedRecord[]): ScrapeStatistics => {
  if (records.length === 0) {
    return emptyStatistics();
  }

  const lengths = records.map((record) => record.content?.length ?? 0);
  return {
    totalScraped: records.length,
    categories: distribution(records.map((record) => record.category)),
    statusCodes: distribution(records.map((record) => String(record.statusCode))),
    contentStats: {
      avgLength: lengths.reduce((sum, length) => sum + length, 0) / lengths.length,
      minLength: lengths.reduce((min, length) => Math.min(min, length)),
      maxLength: lengths.reduce((max, length) => Math.max(max, length)),
    },
    domains: new Set(records.map((record) => hostnameOf(record.url))).size,
  };
};
