import { z } from 'zod';
import type { CategoryResult, ContentAnalysis, EnhancedAnalysis, Sentiment } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { renderPrompt } from '../prompts/loader';
import type { TextGenerator } from '../services/llmService';
import { parseStructured } from '../utils/jsonExtract';
import { truncateWithMarker } from '../utils/text';
import { KeywordCategorizer, fallbackAnalysis } from './keywordCategorizer';
import { GENERAL_LABEL, TAXONOMY, findDefinition, toCanonical, type CategoryDefinition } from './taxonomy';
import type { CategorizeInput, Categorizer } from './types';

export const CATEGORIZE_CONTENT_LIMIT = 2_000;
export const ENHANCE_CONTENT_LIMIT = 3_000;

const CATEGORIZE_SYSTEM = 'You are an expert content categorization AI. Always respond with valid JSON only.';
const ENHANCE_SYSTEM = 'You are an expert content analyst. Provide detailed structured analysis in valid JSON format only.';

const DEFAULT_FOCUS = 'General content analysis and key information';
const DEFAULT_FIELDS = '"content_type": "", "main_focus": ""';

const SENTIMENTS: readonly Sentiment[] = ['positive', 'neutral', 'negative'];

const toSentiment = (value: string | undefined): Sentiment =>
  SENTIMENTS.find((sentiment) => sentiment === value?.trim().toLowerCase()) ?? 'neutral';

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

const AnalysisResponseSchema = z.object({
  category: z.string().optional(),
  confidence: z.coerce.number().finite().optional(),
  reasoning: z.string().optional(),
  keywords: z.array(z.coerce.string()).optional(),
  sentiment: z.string().optional(),
  quality_score: z.coerce.number().finite().optional(),
  metadata: z.record(z.unknown()).optional(),
});

const EnhancementResponseSchema = z
  .object({
    summary: z.string().default(''),
    key_points: z.array(z.coerce.string()).default([]),
    entities: z.record(z.unknown()).default({}),
    action_items: z.array(z.coerce.string()).default([]),
    data_quality: z.record(z.unknown()).default({}),
    category_specific: z.record(z.unknown()).default({}),
  })
  .passthrough();

export const emptyEnhancement = (): EnhancedAnalysis => ({
  summary: 'Content analysis unavailable',
  key_points: [],
  entities: {},
  action_items: [],
  data_quality: { completeness: 0, accuracy_confidence: 0 },
  category_specific: {},
});

export const formatCategoryDefinitions = (definitions: readonly CategoryDefinition[]): string =>
  definitions
    .map(
      (definition) =>
        `**${definition.name}**: ${definition.description}\n` +
        `   Indicators: ${definition.indicators.slice(0, 5).join(', ')}\n` +
        `   Examples: ${definition.examples.slice(0, 2).join(', ')}`,
    )
    .join('\n');

export const buildCategorizationPrompt = (url: string, title: string, content: string): string =>
  renderPrompt('categorization.md', {
    CATEGORY_DEFINITIONS: formatCategoryDefinitions(TAXONOMY.analysis),
    URL: url,
    TITLE: title,
    CONTENT: truncateWithMarker(content, CATEGORIZE_CONTENT_LIMIT),
  });

export const buildEnhancementPrompt = (content: string, label: string): string => {
  const definition = findDefinition(label);
  return renderPrompt('content_enhancement.md', {
    CATEGORY: label,
    CATEGORY_FOCUS: definition?.focus ?? DEFAULT_FOCUS,
    CATEGORY_FIELDS: definition?.fields ?? DEFAULT_FIELDS,
    CONTENT: truncateWithMarker(content, ENHANCE_CONTENT_LIMIT),
  });
};

export const parseAnalysis = (raw: string): ContentAnalysis => {
  const parsed = parseStructured(raw, AnalysisResponseSchema);
  return {
    category: parsed.category?.trim() || GENERAL_LABEL,
    confidence: clampUnit(parsed.confidence ?? 0.5),
    reasoning: parsed.reasoning ?? 'No reasoning provided',
    keywords: parsed.keywords ?? [],
    sentiment: toSentiment(parsed.sentiment),
    qualityScore: clampUnit(parsed.quality_score ?? 0.5),
    metadata: parsed.metadata ?? {},
  };
};

export interface LlmCategorizerOptions {
  generator: TextGenerator;
  logger: Logger;
  /** Used when there is no content to analyse. */
  bootstrap?: Categorizer;
}

/**
 * Model-backed categorizer. Transport errors, empty answers and answers that are
 * not the expected JSON all degrade to the keyword fallback analysis.
 */
export class LlmCategorizer implements Categorizer {
  private readonly generator: TextGenerator;
  private readonly logger: Logger;
  private readonly bootstrap: Categorizer;

  constructor(options: LlmCategorizerOptions) {
    this.generator = options.generator;
    this.logger = options.logger;
    this.bootstrap = options.bootstrap ?? new KeywordCategorizer();
  }

  async categorize({ url, title, content }: CategorizeInput): Promise<CategoryResult> {
    if (!content) {
      return this.bootstrap.categorize({ url, title, content });
    }

    const { analysis, source } = await this.analyze(url, title, content);
    return {
      category: toCanonical(analysis.category),
      label: analysis.category,
      confidence: analysis.confidence,
      source,
      analysis,
    };
  }

  async analyze(
    url: string,
    title: string | null | undefined,
    content: string,
  ): Promise<{ analysis: ContentAnalysis; source: 'llm' | 'fallback' }> {
    try {
      const raw = await this.generator.generate(buildCategorizationPrompt(url, title || 'No title available', content), {
        systemInstruction: CATEGORIZE_SYSTEM,
        responseMimeType: 'application/json',
      });
      const analysis = parseAnalysis(raw);
      this.logger.info('Categorized content', { url, category: analysis.category, confidence: analysis.confidence });
      return { analysis, source: 'llm' };
    } catch (error) {
      this.logger.error('AI categorization failed, using fallback', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return { analysis: fallbackAnalysis(url, content), source: 'fallback' };
    }
  }

  async enhance(content: string, label: string): Promise<EnhancedAnalysis> {
    try {
      const raw = await this.generator.generate(buildEnhancementPrompt(content, label), {
        systemInstruction: ENHANCE_SYSTEM,
        responseMimeType: 'application/json',
        temperature: 0.1,
        topP: 0.9,
      });
      const enhanced = parseStructured(raw, EnhancementResponseSchema);
      this.logger.info('Enhanced content analysis', { category: label });
      return enhanced;
    } catch (error) {
      this.logger.error('Content enhancement failed', {
        category: label,
        error: error instanceof Error ? error.message : String(error),
      });
      return emptyEnhancement();
    }
  }
}

export interface AnalysisSummary {
  totalAnalyzed: number;
  categoryDistribution: Record<string, number>;
  sentimentDistribution: Record<string, number>;
  averageConfidence: number;
  averageQuality: number;
  highConfidenceItems: number;
  lowConfidenceItems: number;
}

const round3 = (value: number): number => Math.round(value * 1000) / 1000;

const countBy = <T>(items: readonly T[], key: (item: T) => string): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const item of items) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
};

export const summarizeAnalyses = (analyses: readonly ContentAnalysis[]): AnalysisSummary => {
  const total = analyses.length;
  const mean = (pick: (analysis: ContentAnalysis) => number) =>
    total === 0 ? 0 : round3(analyses.reduce((sum, analysis) => sum + pick(analysis), 0) / total);
  return {
    totalAnalyzed: total,
    categoryDistribution: countBy(analyses, (analysis) => analysis.category),
    sentimentDistribution: countBy(analyses, (analysis) => analysis.sentiment),
    averageConfidence: mean((analysis) => analysis.confidence),
    averageQuality: mean((analysis) => analysis.qualityScore),
    highConfidenceItems: analyses.filter((analysis) => analysis.confidence > 0.8).length,
    lowConfidenceItems: analyses.filter((analysis) => analysis.confidence < 0.5).length,
  };
};
