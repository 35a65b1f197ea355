import type { ValidationResult } from '../../shared/types';

export interface UrlAdmission {
  validate: (url: unknown) => ValidationResult;
}

export const MAX_URL_LENGTH = 2048;

export const BLOCKED_DOMAINS: readonly string[] = [
  'facebook.com',
  'instagram.com',
  'twitter.com',
  'linkedin.com',
  'youtube.com',
  'tiktok.com',
  'pinterest.com',
  'snapchat.com',
];

const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

// scheme://host[:port][/path][?query]; host is a domain, localhost or a dotted quad. No fragments.
const URL_SHAPE =
  /^https?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z]{2,6}\.?|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d+)?(?:\/?|[/?][^\s#]+)$/i;

const SUSPICIOUS_PATTERNS: readonly RegExp[] = [/login/, /auth/, /admin/, /private/, /\.exe$/, /\.zip$/, /\.pdf$/];

const reject = (reason: string): ValidationResult => ({ isValid: false, reason });

const isBlockedHost = (hostname: string, blocked: readonly string[]): boolean => {
  const host = hostname.toLowerCase().replace(/\.$/, '').replace(/^www\./, '');
  return blocked.some((domain) => host === domain || host.endsWith(`.${domain}`));
};

export const hasSuspiciousPatterns = (url: string): boolean => {
  const lowered = url.toLowerCase();
  return SUSPICIOUS_PATTERNS.some((pattern) => pattern.test(lowered));
};

/**
 * Admission control for the scraper: decides whether a URL may be fetched at all.
 * Never throws; every outcome carries a reason.
 */
export class UrlValidator implements UrlAdmission {
  constructor(private readonly blockedDomains: readonly string[] = BLOCKED_DOMAINS) {}

  validate(input: unknown): ValidationResult {
    if (typeof input !== 'string' || !input) {
      return reject('URL must be a non-empty string');
    }

    const url = input.trim();
    if (url.length > MAX_URL_LENGTH) {
      return reject('URL exceeds maximum allowed length');
    }
    if (!URL_SHAPE.test(url)) {
      return reject('Invalid URL format');
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return reject(`URL parsing error: ${message}`);
    }

    if (!TRUSTED_PROTOCOLS.has(parsed.protocol)) {
      return reject('Only HTTP and HTTPS URLs are supported');
    }
    if (isBlockedHost(parsed.hostname, this.blockedDomains)) {
      return reject(`Domain ${parsed.host} is blocked for scraping`);
    }
    if (hasSuspiciousPatterns(url)) {
      return reject('URL contains suspicious patterns');
    }

    return { isValid: true, reason: 'URL is valid for scraping' };
  }
}
