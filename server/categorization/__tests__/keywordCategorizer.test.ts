import { describe, expect, it } from 'vitest';
import { FALLBACK_REASONING, KeywordCategorizer, fallbackAnalysis } from '../keywordCategorizer';

describe('KeywordCategorizer', () => {
  const categorizer = new KeywordCategorizer();

  it('labels by url keywords in group order', async () => {
    await expect(categorizer.categorize({ url: 'https://www.amazon.com/dp/1' })).resolves.toEqual({
      category: 'ecommerce',
      label: 'E-commerce',
      confidence: 0.6,
      source: 'keywords',
    });
    const reference = await categorizer.categorize({ url: 'https://en.wikipedia.org/wiki/Cat' });
    expect(reference.label).toBe('Reference');
    expect(reference.category).toBe('reference');
  });

  it('needs price together with buy or cart to call content e-commerce', async () => {
    const result = await categorizer.categorize({
      url: 'https://example.com/item',
      content: 'Great price, add to cart today',
    });
    expect(result).toEqual({ category: 'ecommerce', label: 'E-commerce', confidence: 0.4, source: 'keywords' });

    const priceOnly = await categorizer.categorize({ url: 'https://example.com/item', content: 'Price list' });
    expect(priceOnly.label).toBe('General');
  });

  it('needs two news words in the content', async () => {
    const news = await categorizer.categorize({
      url: 'https://example.com/x',
      content: 'This article is part of our blog',
    });
    expect(news.label).toBe('News/Blog');
    expect(news.category).toBe('news');

    const single = await categorizer.categorize({ url: 'https://example.com/x', content: 'One article only' });
    expect(single.label).toBe('General');
  });

  it('defaults to General with zero confidence', async () => {
    await expect(categorizer.categorize({ url: 'https://example.com/x', content: 'hello world' })).resolves.toEqual({
      category: 'general',
      label: 'General',
      confidence: 0,
      source: 'keywords',
    });
  });
});

describe('fallbackAnalysis', () => {
  it('sniffs content for commerce words', () => {
    expect(fallbackAnalysis('https://example.com/x', 'Best price in town')).toEqual({
      category: 'E-commerce',
      confidence: 0.3,
      reasoning: FALLBACK_REASONING,
      keywords: [],
      sentiment: 'neutral',
      qualityScore: 0.5,
      metadata: { fallback: true, ai_failure: true },
    });
  });

  it('sniffs the url alongside the content', () => {
    expect(fallbackAnalysis('https://github.com/x', 'hello there').category).toBe('Technical');
  });

  it('is General without content', () => {
    expect(fallbackAnalysis('https://shop.example.com', null).category).toBe('General');
  });
});
