import type { CheerioAPI } from 'cheerio';
import type { ImageInfo, JsonValue, LinkInfo, MicrodataItem, PageMetadata, SchemaEntry } from '../../shared/types';
import { firstAttr, firstNonEmpty, firstText, metaContent } from './html';
import { NO_TITLE } from './contentExtractor';

export const MAX_LINKS = 50;
export const MAX_IMAGES = 20;
export const MAX_MICRODATA_ITEMS = 5;
export const DEFAULT_LANGUAGE = 'en';

export interface MetadataSource {
  extract: ($: CheerioAPI, url: string) => PageMetadata;
}

const parseJsonLd = (raw: string): JsonValue | undefined => {
  try {
    const parsed: JsonValue = JSON.parse(raw);
    return parsed;
  } catch {
    // malformed blocks are skipped, the rest of the page still counts
    return undefined;
  }
};

const collectPrefixed = ($: CheerioAPI, attr: 'property' | 'name', prefix: string): Record<string, string> => {
  const data: Record<string, string> = {};
  $(`meta[${attr}^="${prefix}"]`).each((_, element) => {
    const key = $(element).attr(attr);
    const content = $(element).attr('content');
    if (key && content !== undefined) {
      data[key] = content;
    }
  });
  return data;
};

/**
 * Reads structured metadata out of an already parsed page. Every field has a
 * default, so a page without any metadata still yields a complete object.
 */
export class MetadataExtractor implements MetadataSource {
  extract($: CheerioAPI, url: string): PageMetadata {
    return {
      url,
      title: this.title($),
      description: this.description($),
      keywords: this.keywords($),
      author: this.author($),
      language: this.language($),
      og_data: collectPrefixed($, 'property', 'og:'),
      twitter_data: collectPrefixed($, 'name', 'twitter:'),
      canonical_url: firstAttr($, 'link[rel~="canonical"]', 'href') ?? '',
      links: this.links($),
      images: this.images($),
      schema_data: this.schemaData($),
    };
  }

  private title($: CheerioAPI): string {
    return (
      firstNonEmpty(
        () => firstText($, 'title'),
        () => metaContent($, 'property', 'og:title'),
        () => metaContent($, 'name', 'twitter:title'),
        () => firstText($, 'h1'),
      ) ?? NO_TITLE
    );
  }

  private description($: CheerioAPI): string {
    return (
      firstNonEmpty(
        () => metaContent($, 'name', 'description'),
        () => metaContent($, 'property', 'og:description'),
        () => metaContent($, 'name', 'twitter:description'),
      ) ?? ''
    );
  }

  private keywords($: CheerioAPI): string[] {
    const raw = $('meta[name="keywords"]').first().attr('content') ?? '';
    return raw
      .split(',')
      .map((keyword) => keyword.trim())
      .filter(Boolean);
  }

  private author($: CheerioAPI): string {
    return (
      firstNonEmpty(
        () => metaContent($, 'name', 'author'),
        () => metaContent($, 'property', 'article:author'),
        () => metaContent($, 'name', 'twitter:creator'),
      ) ?? ''
    );
  }

  private language($: CheerioAPI): string {
    return (
      firstNonEmpty(
        () => firstAttr($, 'html', 'lang'),
        () => metaContent($, 'http-equiv', 'content-language'),
      ) ?? DEFAULT_LANGUAGE
    );
  }

  private links($: CheerioAPI): LinkInfo[] {
    return $('a[href]')
      .slice(0, MAX_LINKS)
      .toArray()
      .map((element) => {
        const link = $(element);
        return {
          url: link.attr('href') ?? '',
          text: link.text().replace(/\s+/g, ' ').trim(),
          title: link.attr('title') ?? '',
        };
      });
  }

  private images($: CheerioAPI): ImageInfo[] {
    return $('img[src]')
      .slice(0, MAX_IMAGES)
      .toArray()
      .map((element) => {
        const image = $(element);
        return {
          src: image.attr('src') ?? '',
          alt: image.attr('alt') ?? '',
          title: image.attr('title') ?? '',
        };
      });
  }

  private schemaData($: CheerioAPI): SchemaEntry[] {
    const entries: SchemaEntry[] = [];

    $('script[type="application/ld+json"]').each((_, element) => {
      const raw = $(element).text().trim();
      if (!raw) return;
      const parsed = parseJsonLd(raw);
      if (parsed !== undefined) {
        entries.push(parsed);
      }
    });

    $('[itemtype]')
      .slice(0, MAX_MICRODATA_ITEMS)
      .each((_, element) => {
        const item: MicrodataItem = { type: $(element).attr('itemtype') ?? '', properties: {} };
        $(element)
          .find('[itemprop]')
          .each((__, prop) => {
            const name = $(prop).attr('itemprop');
            if (!name) return;
            const content = $(prop).attr('content');
            const text = $(prop).text().trim();
            if (content !== undefined) {
              item.properties[name] = content;
            } else if (text) {
              item.properties[name] = text;
            }
          });
        if (Object.keys(item.properties).length > 0) {
          entries.push(item);
        }
      });

    return entries;
  }
}
