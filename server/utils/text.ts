export const TRUNCATION_MARKER = '...';

export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/** First `maxLength` code points; never splits a surrogate pair. */
export const takeCodePoints = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) return text;
  return Array.from(text).slice(0, maxLength).join('');
};

/** Hard cap in code points; appends the marker when anything was cut. */
export const truncateWithMarker = (text: string, maxLength: number): string => {
  const kept = takeCodePoints(text, maxLength);
  return kept.length < text.length ? `${kept}${TRUNCATION_MARKER}` : text;
};

/**
 * Turns the raw text of an HTML subtree into a single readable line.
 * Lines of two characters or fewer are treated as layout noise (bullets, separators).
 */
export const cleanExtractedText = (text: string | null | undefined, maxLength: number): string => {
  if (!text) return '';
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 2);
  return truncateWithMarker(normalizeWhitespace(lines.join(' ')), maxLength);
};

export const containsAny = (haystack: string, needles: readonly string[]): boolean =>
  needles.some((needle) => haystack.includes(needle));
