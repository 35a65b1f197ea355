import type { CategoryResult } from '../../shared/types';
import { TAXONOMY, type CanonicalCategory, type RuleEntry } from './taxonomy';
import type { CategorizeInput, Categorizer } from './types';

type MatchStage = 'url' | 'content' | 'none';

interface CompiledRule {
  category: CanonicalCategory;
  patterns: RegExp[];
}

const compile = (rules: readonly RuleEntry[]): CompiledRule[] =>
  rules.map((rule) => ({ category: rule.category, patterns: rule.patterns.map((pattern) => new RegExp(pattern)) }));

const CONFIDENCE: Record<MatchStage, number> = { url: 1, content: 0.6, none: 0 };

const splitUrl = (url: string): { domain: string; path: string } => {
  const lowered = url.toLowerCase();
  try {
    const parsed = new URL(lowered);
    return { domain: parsed.host, path: parsed.pathname };
  } catch {
    return { domain: lowered, path: '' };
  }
};

/**
 * Deterministic categorizer over the rule taxonomy. Domain matches beat path
 * matches, which beat content scoring; nothing matching yields `general`.
 */
export class RuleBasedCategorizer implements Categorizer {
  private readonly rules: CompiledRule[];

  constructor(rules: readonly RuleEntry[] = TAXONOMY.rules) {
    this.rules = compile(rules);
  }

  classify(url: string, content?: string | null): CanonicalCategory {
    return this.match(url, content).category;
  }

  async categorize({ url, content }: CategorizeInput): Promise<CategoryResult> {
    const { category, stage } = this.match(url, content);
    return { category, label: category, confidence: CONFIDENCE[stage], source: 'rules' };
  }

  private match(url: string, content?: string | null): { category: CanonicalCategory; stage: MatchStage } {
    if (!url) {
      return { category: 'unknown', stage: 'none' };
    }

    const { domain, path } = splitUrl(url);
    for (const part of [domain, path]) {
      const hit = this.rules.find((rule) => rule.patterns.some((pattern) => pattern.test(part)));
      if (hit) {
        return { category: hit.category, stage: 'url' };
      }
    }

    const scored = content ? this.scoreContent(content) : undefined;
    if (scored) {
      return { category: scored, stage: 'content' };
    }
    return { category: 'general', stage: 'none' };
  }

  private scoreContent(content: string): CanonicalCategory | undefined {
    const lowered = content.toLowerCase();
    let best: { category: CanonicalCategory; score: number } | undefined;
    for (const rule of this.rules) {
      const score = rule.patterns.reduce(
        (total, pattern) => total + (lowered.match(new RegExp(pattern.source, 'g'))?.length ?? 0),
        0,
      );
      // strict comparison keeps the earlier category on ties
      if (score > 0 && (!best || score > best.score)) {
        best = { category: rule.category, score };
      }
    }
    return best?.category;
  }
}
