import { cleanExtractedText } from '../utils/text';
import { declaresBody, firstText, loadHtml, metaContent } from './html';

export interface ExtractedContent {
  title: string;
  content: string;
}

export interface ContentProcessor {
  process: (rawHtml: string) => ExtractedContent;
}

export interface ContentExtractorOptions {
  maxLength?: number;
}

export const NO_TITLE = 'No title found';

export const DEFAULT_MAX_CONTENT_LENGTH = 10_000;

const NOISE_TAGS = ['script', 'style', 'nav', 'header', 'footer', 'aside', 'noscript', 'form', 'button'];

// First match wins, in this order.
const CONTENT_SELECTORS = [
  'main',
  'article',
  '[role="main"]',
  '.main-content',
  '.content',
  '.post-content',
  '.entry-content',
  '#main-content',
  '#content',
];

/**
 * Turns raw HTML into a title and bounded plain text. Never throws: any
 * internal failure is reported through the title with empty content.
 */
export class ContentExtractor implements ContentProcessor {
  private readonly maxLength: number;

  constructor(options: ContentExtractorOptions = {}) {
    this.maxLength = options.maxLength ?? DEFAULT_MAX_CONTENT_LENGTH;
  }

  process(rawHtml: string): ExtractedContent {
    try {
      const $ = loadHtml(rawHtml);

      const title = firstText($, 'title') || firstText($, 'h1') || metaContent($, 'property', 'og:title') || NO_TITLE;

      $(NOISE_TAGS.join(', ')).remove();

      const container = CONTENT_SELECTORS.map((selector) => $(selector).first()).find((match) => match.length > 0);
      const main = container ? cleanExtractedText(container.text(), this.maxLength) : '';
      if (main) {
        return { title, content: main };
      }

      const text = declaresBody(rawHtml) ? $('body').text() : $.root().text();
      return { title, content: cleanExtractedText(text, this.maxLength) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { title: `Error processing content: ${message}`, content: '' };
    }
  }
}
