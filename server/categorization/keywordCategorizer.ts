import type { CategoryResult, ContentAnalysis } from '../../shared/types';
import { containsAny } from '../utils/text';
import { GENERAL_LABEL, TAXONOMY, toCanonical, type KeywordGroup } from './taxonomy';
import type { CategorizeInput, Categorizer } from './types';

const URL_MATCH_CONFIDENCE = 0.6;
const CONTENT_MATCH_CONFIDENCE = 0.4;

const NEWS_WORDS = ['article', 'blog', 'post', 'news'];

const labelFromContent = (content: string): string | undefined => {
  const lowered = content.toLowerCase();
  if (lowered.includes('price') && containsAny(lowered, ['buy', 'cart'])) {
    return 'E-commerce';
  }
  if (NEWS_WORDS.filter((word) => lowered.includes(word)).length >= 2) {
    return 'News/Blog';
  }
  return undefined;
};

const result = (label: string, confidence: number): CategoryResult => ({
  category: toCanonical(label),
  label,
  confidence,
  source: 'keywords',
});

/**
 * Substring categorizer over the small bootstrap keyword set. Used when there is
 * no content worth sending to a model, and as the default offline categorizer.
 */
export class KeywordCategorizer implements Categorizer {
  constructor(private readonly groups: readonly KeywordGroup[] = TAXONOMY.keywords) {}

  async categorize({ url, content }: CategorizeInput): Promise<CategoryResult> {
    const loweredUrl = url.toLowerCase();
    const urlHit = this.groups.find((group) => containsAny(loweredUrl, group.keywords));
    if (urlHit) {
      return result(urlHit.label, URL_MATCH_CONFIDENCE);
    }

    const contentLabel = content ? labelFromContent(content) : undefined;
    if (contentLabel) {
      return result(contentLabel, CONTENT_MATCH_CONFIDENCE);
    }
    return result(GENERAL_LABEL, 0);
  }
}

export const FALLBACK_CONFIDENCE = 0.3;
export const FALLBACK_REASONING = 'Fallback categorization due to AI analysis failure';

const FALLBACK_SNIFFS: ReadonlyArray<{ label: string; words: string[] }> = [
  { label: 'E-commerce', words: ['shop', 'buy', 'price', 'cart'] },
  { label: 'News/Blog', words: ['news', 'article', 'blog'] },
  { label: 'Technical', words: ['code', 'api', 'github'] },
];

/** Low-confidence analysis used in place of a model answer that failed or could not be read. */
export const fallbackAnalysis = (url: string, content?: string | null): ContentAnalysis => {
  let category = GENERAL_LABEL;
  if (content) {
    const haystacks = [content.toLowerCase(), url.toLowerCase()];
    const hit = FALLBACK_SNIFFS.find(({ words }) => haystacks.some((haystack) => containsAny(haystack, words)));
    category = hit?.label ?? GENERAL_LABEL;
  }
  return {
    category,
    confidence: FALLBACK_CONFIDENCE,
    reasoning: FALLBACK_REASONING,
    keywords: [],
    sentiment: 'neutral',
    qualityScore: 0.5,
    metadata: { fallback: true, ai_failure: true },
  };
};
