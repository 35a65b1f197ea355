import path from 'node:path';
import type { ScrapeStatistics, ScrapedRecord } from '../../shared/types';
import type { AnalysisSummary } from '../categorization/llmCategorizer';

const RULE = '='.repeat(50);
const SUBRULE = '-'.repeat(30);

const pad2 = (value: number) => String(value).padStart(2, '0');

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export const formatLocalTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;

const percent = (count: number, total: number): string => `${((count / (total || 1)) * 100).toFixed(1)}%`;

export const buildSummaryReport = (
  records: readonly ScrapedRecord[],
  stats: ScrapeStatistics,
  generatedAt: Date = new Date(),
): string => {
  const lines: string[] = [
    'Web Scraping Summary Report',
    RULE,
    '',
    `Generated: ${formatLocalTimestamp(generatedAt)}`,
    `Total URLs Scraped: ${stats.totalScraped}`,
    `Unique Domains: ${stats.domains}`,
    '',
    'Category Distribution:',
    SUBRULE,
  ];

  for (const [category, count] of Object.entries(stats.categories)) {
    lines.push(`  ${category}: ${count} (${percent(count, stats.totalScraped)})`);
  }

  lines.push('', 'Status Code Distribution:', SUBRULE);
  for (const [status, count] of Object.entries(stats.statusCodes)) {
    lines.push(`  HTTP ${status}: ${count} (${percent(count, stats.totalScraped)})`);
  }

  lines.push(
    '',
    'Content Statistics:',
    SUBRULE,
    `  Average Length: ${stats.contentStats.avgLength.toFixed(0)} characters`,
    `  Minimum Length: ${stats.contentStats.minLength} characters`,
    `  Maximum Length: ${stats.contentStats.maxLength} characters`,
    '',
    'Scraped URLs:',
    SUBRULE,
  );

  records.forEach((record, index) => {
    lines.push(
      `  ${index + 1}. ${record.url}`,
      `     Category: ${record.category}`,
      `     Title: ${record.title || 'N/A'}`,
      `     Status: ${record.statusCode}`,
      `     Content Length: ${record.content?.length ?? 0} chars`,
      '',
    );
  });

  lines.push(RULE, '');
  return lines.join('\n');
};

const titleCase = (value: string) => (value ? `${value[0].toUpperCase()}${value.slice(1)}` : value);

/** Markdown digest of the model analyses collected during a run. */
export const buildInsightsReport = (summary: AnalysisSummary, generatedAt: Date = new Date()): string => {
  const lines: string[] = [
    '# AI Content Insights Report',
    '',
    `**Generated:** ${formatLocalTimestamp(generatedAt)}`,
    `**Total URLs Analyzed:** ${summary.totalAnalyzed}`,
    '',
    '## Category Analysis',
    '',
  ];

  for (const [category, count] of Object.entries(summary.categoryDistribution)) {
    lines.push(`- **${category}:** ${count} items (${percent(count, summary.totalAnalyzed)})`);
  }

  lines.push(
    '',
    '## Quality Metrics',
    '',
    `- **Average Confidence:** ${summary.averageConfidence.toFixed(3)}`,
    `- **Average Quality Score:** ${summary.averageQuality.toFixed(3)}`,
    `- **High Confidence Items:** ${summary.highConfidenceItems}`,
    `- **Low Confidence Items:** ${summary.lowConfidenceItems}`,
    '',
    '## Sentiment Analysis',
    '',
  );

  for (const [sentiment, count] of Object.entries(summary.sentimentDistribution)) {
    lines.push(`- **${titleCase(sentiment)}:** ${count} items (${percent(count, summary.totalAnalyzed)})`);
  }

  lines.push('');
  return lines.join('\n');
};

export interface ExportedFiles {
  json: string;
  csv: string;
  xml: string;
  report: string;
  insights: string | null;
}

const FILE_ROWS: ReadonlyArray<[keyof ExportedFiles, string, string]> = [
  ['json', 'JSON', 'Complete data with metadata'],
  ['csv', 'CSV', 'Tabular data for analysis'],
  ['xml', 'XML', 'Structured data for integration'],
  ['report', 'Report', 'Human-readable summary'],
  ['insights', 'Insights', 'AI analysis digest'],
];

/** Markdown index of one `exportAll` run: the files written and the headline statistics. */
export const buildExportIndex = (
  files: ExportedFiles,
  stats: ScrapeStatistics,
  generatedAt: Date = new Date(),
): string => {
  const lines: string[] = [
    '# Web Scraping Export Index',
    '',
    `**Export Date:** ${formatLocalTimestamp(generatedAt)}`,
    `**Total Records:** ${stats.totalScraped}`,
    `**Unique Domains:** ${stats.domains}`,
    '',
    '## Exported Files',
    '',
    '| Format | File | Description |',
    '|--------|------|-------------|',
  ];

  for (const [key, label, description] of FILE_ROWS) {
    const file = files[key];
    if (file) {
      lines.push(`| ${label} | \`${path.basename(file)}\` | ${description} |`);
    }
  }

  lines.push('', '## Categories', '');
  for (const [category, count] of Object.entries(stats.categories)) {
    lines.push(`- **${category}:** ${count} (${percent(count, stats.totalScraped)})`);
  }

  lines.push('', '## Status Codes', '');
  for (const [status, count] of Object.entries(stats.statusCodes)) {
    lines.push(`- **HTTP ${status}:** ${count} (${percent(count, stats.totalScraped)})`);
  }

  lines.push('');
  return lines.join('\n');
};
