import * as cheerio from 'cheerio';
import { normalizeWhitespace } from '../utils/text';

export type { CheerioAPI } from 'cheerio';

export const loadHtml = (html: string): cheerio.CheerioAPI => cheerio.load(html);

/** True when the markup itself declares a body; cheerio adds one to every document it parses. */
export const declaresBody = (html: string): boolean => /<body[\s>]/i.test(html);

export const firstText = ($: cheerio.CheerioAPI, selector: string): string =>
  normalizeWhitespace($(selector).first().text());

export const firstAttr = ($: cheerio.CheerioAPI, selector: string, attr: string): string | undefined => {
  const value = $(selector).first().attr(attr)?.trim();
  return value || undefined;
};

/** Content of the first `<meta>` whose `attr` equals `key`, trimmed; undefined when absent or blank. */
export const metaContent = ($: cheerio.CheerioAPI, attr: 'name' | 'property' | 'http-equiv', key: string) =>
  firstAttr($, `meta[${attr}="${key}"]`, 'content');

export const firstNonEmpty = (...candidates: Array<() => string | undefined>): string | undefined => {
  for (const candidate of candidates) {
    const value = candidate();
    if (value) return value;
  }
  return undefined;
};
