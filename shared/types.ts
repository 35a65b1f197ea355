export type StageName = 'scrape';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface ValidationResult {
  isValid: boolean;
  reason: string;
}

export interface LinkInfo {
  url: string;
  text: string;
  title: string;
}

export interface ImageInfo {
  src: string;
  alt: string;
  title: string;
}

export interface MicrodataItem {
  type: string;
  properties: Record<string, string>;
}

export type SchemaEntry = JsonValue | MicrodataItem;

/**
 * Structured page metadata. Keys are snake_case because they are part of the
 * exported record format.
 */
export type PageMetadata = {
  url: string;
  title: string;
  description: string;
  keywords: string[];
  author: string;
  language: string;
  og_data: Record<string, string>;
  twitter_data: Record<string, string>;
  canonical_url: string;
  links: LinkInfo[];
  images: ImageInfo[];
  schema_data: SchemaEntry[];
};

export type Sentiment = 'positive' | 'neutral' | 'negative';

export interface ContentAnalysis {
  category: string;
  confidence: number;
  reasoning: string;
  keywords: string[];
  sentiment: Sentiment;
  qualityScore: number;
  metadata: Record<string, unknown>;
}

export interface EnhancedAnalysis {
  summary: string;
  key_points: string[];
  entities: Record<string, unknown>;
  action_items: string[];
  data_quality: Record<string, unknown>;
  category_specific: Record<string, unknown>;
  [key: string]: unknown;
}

export interface AiAnalysisMetadata {
  label: string;
  confidence: number;
  reasoning: string;
  keywords: string[];
  sentiment: Sentiment;
  quality_score: number;
  ai_metadata: Record<string, unknown>;
}

export type RecordMetadata = Partial<PageMetadata> & {
  ai_analysis?: AiAnalysisMetadata;
  enhanced_analysis?: EnhancedAnalysis;
  [key: string]: unknown;
};

export interface ScrapedRecord {
  url: string;
  title: string | null;
  content: string | null;
  category: string;
  metadata: RecordMetadata;
  timestamp: Date;
  /** HTTP status of the originating fetch; 0 when the page was not fetched. */
  statusCode: number;
}

export type CategorySource = 'rules' | 'keywords' | 'llm' | 'fallback';

export interface CategoryResult {
  /** Canonical category id shared by every categorizer. */
  category: string;
  /** The category name as the producing categorizer spells it. */
  label: string;
  confidence: number;
  source: CategorySource;
  analysis?: ContentAnalysis;
}

export type ScrapeFailureStage = 'validation' | 'fetch' | 'unexpected';

export type ScrapeOutcome =
  | { ok: true; record: ScrapedRecord }
  | { ok: false; url: string; stage: ScrapeFailureStage; error: string };

export interface ScrapeFailure {
  url: string;
  stage: ScrapeFailureStage;
  error: string;
}

export interface ContentStats {
  avgLength: number;
  minLength: number;
  maxLength: number;
}

export interface ScrapeStatistics {
  totalScraped: number;
  categories: Record<string, number>;
  statusCodes: Record<string, number>;
  contentStats: ContentStats;
  domains: number;
}

export interface BatchResult {
  total: number;
  succeeded: number;
  failed: number;
  records: ScrapedRecord[];
  failures: ScrapeFailure[];
}
