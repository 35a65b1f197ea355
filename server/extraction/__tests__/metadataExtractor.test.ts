import { describe, expect, it } from 'vitest';
import { loadHtml } from '../html';
import { MAX_IMAGES, MAX_LINKS, MAX_MICRODATA_ITEMS, MetadataExtractor } from '../metadataExtractor';

const extractor = new MetadataExtractor();

describe('MetadataExtractor.extract', () => {
  it('collects every metadata field from a rich page', () => {
    const html = `<html lang="fr">
<head>
<title>Page Title</title>
<meta name="description" content="  A short description  ">
<meta name="keywords" content="alpha, beta, ,gamma">
<meta name="author" content="Test Author">
<meta property="og:title" content="OG Title">
<meta property="og:type" content="article">
<meta name="twitter:card" content="summary">
<link rel="canonical" href="https://example.com/canonical">
<script type="application/ld+json">{"@type":"Article","headline":"Hello"}</script>
<script type="application/ld+json">{not json}</script>
</head>
<body>
<a href="/one" title="First">One</a>
<a href="https://example.org/two">  Two  </a>
<a>no href</a>
<img src="/a.png" alt="A">
<img alt="missing src">
<div itemscope itemtype="https://schema.org/Product">
  <span itemprop="name">Widget</span>
  <meta itemprop="price" content="9.99">
  <span itemprop="empty"></span>
</div>
<div itemtype="https://schema.org/Thing"><span>no props</span></div>
</body></html>`;

    const metadata = extractor.extract(loadHtml(html), 'https://example.com/page');

    expect(metadata).toEqual({
      url: 'https://example.com/page',
      title: 'Page Title',
      description: 'A short description',
      keywords: ['alpha', 'beta', 'gamma'],
      author: 'Test Author',
      language: 'fr',
      og_data: { 'og:title': 'OG Title', 'og:type': 'article' },
      twitter_data: { 'twitter:card': 'summary' },
      canonical_url: 'https://example.com/canonical',
      links: [
        { url: '/one', text: 'One', title: 'First' },
        { url: 'https://example.org/two', text: 'Two', title: '' },
      ],
      images: [{ src: '/a.png', alt: 'A', title: '' }],
      schema_data: [
        { '@type': 'Article', headline: 'Hello' },
        { type: 'https://schema.org/Product', properties: { name: 'Widget', price: '9.99' } },
      ],
    });
  });

  it('falls back to defaults on a bare page', () => {
    const metadata = extractor.extract(loadHtml('<html><body><p>plain</p></body></html>'), 'https://example.com');

    expect(metadata).toEqual({
      url: 'https://example.com',
      title: 'No title found',
      description: '',
      keywords: [],
      author: '',
      language: 'en',
      og_data: {},
      twitter_data: {},
      canonical_url: '',
      links: [],
      images: [],
      schema_data: [],
    });
  });

  it('prefers social titles over the first heading', () => {
    const html =
      '<html><head><meta name="twitter:title" content="Tweet Title"></head><body><h1>Heading</h1></body></html>';

    expect(extractor.extract(loadHtml(html), 'https://example.com').title).toBe('Tweet Title');
  });

  it('reads the language from the content-language header meta', () => {
    const html = '<html><head><meta http-equiv="content-language" content="de"></head><body></body></html>';

    expect(extractor.extract(loadHtml(html), 'https://example.com').language).toBe('de');
  });

  it('keeps at most 50 links', () => {
    const anchors = Array.from({ length: 60 }, (_, i) => `<a href="/p/${i}">link ${i}</a>`).join('');
    const { links } = extractor.extract(loadHtml(`<html><body>${anchors}</body></html>`), 'https://example.com');

    expect(links).toHaveLength(MAX_LINKS);
    expect(links[49]).toEqual({ url: '/p/49', text: 'link 49', title: '' });
  });

  it('caps links and images on a page with many of both', () => {
    const anchors = Array.from({ length: 100 }, (_, i) => `<a href="/a/${i}">a${i}</a>`).join('');
    const pictures = Array.from({ length: 50 }, (_, i) => `<img src="/i/${i}.png" alt="i${i}">`).join('');
    const metadata = extractor.extract(loadHtml(`<html><body>${anchors}${pictures}</body></html>`), 'https://example.com');

    expect(metadata.links).toHaveLength(50);
    expect(metadata.images).toHaveLength(MAX_IMAGES);
    expect(metadata.images[19]).toEqual({ src: '/i/19.png', alt: 'i19', title: '' });
  });

  it('reads microdata from the first five typed elements only', () => {
    const items = Array.from(
      { length: 8 },
      (_, i) => `<div itemscope itemtype="https://schema.org/Thing${i}"><span itemprop="name">Item ${i}</span></div>`,
    ).join('');
    const { schema_data } = extractor.extract(loadHtml(`<html><body>${items}</body></html>`), 'https://example.com');

    expect(schema_data).toHaveLength(MAX_MICRODATA_ITEMS);
    expect(schema_data[4]).toEqual({ type: 'https://schema.org/Thing4', properties: { name: 'Item 4' } });
  });
});
