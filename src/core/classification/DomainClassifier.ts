import { CLASSIFIED_DOMAINS, ClassifiedDomain, DomainTag, FALLBACK_DOMAIN } from '../entities/Domain.js';
import { ClassificationResult } from '../entities/Query.js';
import { PromptStore } from '../templates/types.js';

const PREFIX_MARKER = '*';

/**
 * Lower-case and reduce every run of characters other than letters, marks and digits
 * to one space, so "PM-Awas  Yojana?" and "pm awas yojana" compare equal
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}]+/gu, ' ')
    .trim();
}

interface KeywordPattern {
  keyword: string;
  /** Padded needle searched for in the padded query */
  needle: string;
}

interface DomainMatcher {
  domain: ClassifiedDomain;
  patterns: KeywordPattern[];
}

function compileKeyword(keyword: string): KeywordPattern | null {
  const prefix = keyword.endsWith(PREFIX_MARKER);
  const text = normalizeText(prefix ? keyword.slice(0, -PREFIX_MARKER.length) : keyword);
  if (text.length === 0) {
    return null;
  }
  return { keyword, needle: prefix ? ` ${text}` : ` ${text} ` };
}

/**
 * Keyword classifier over the fixed domain set.
 *
 * Keywords match whole words or phrases of the normalized query. A keyword ending
 * in "*" matches any word starting with it ("symptom*" matches "symptoms").
 * Domains are checked in CLASSIFIED_DOMAINS order and keywords in listed order;
 * the first hit wins, no hit gives `other`.
 */
export class DomainClassifier {
  private readonly matchers: DomainMatcher[];

  constructor(store: PromptStore) {
    this.matchers = CLASSIFIED_DOMAINS.map((domain) => ({
      domain,
      patterns: store.domains[domain].keywords
        .map(compileKeyword)
        .filter((pattern): pattern is KeywordPattern => pattern !== null),
    }));
  }

  classify(query: string): DomainTag {
    return this.classifyWithDetails(query).domain;
  }

  classifyWithDetails(query: string): ClassificationResult {
    const normalized = normalizeText(query);
    if (normalized.length === 0) {
      return { domain: FALLBACK_DOMAIN, matchedKeyword: null };
    }

    const haystack = ` ${normalized} `;

    for (const matcher of this.matchers) {
      const hit = matcher.patterns.find((pattern) => haystack.includes(pattern.needle));
      if (hit) {
        return { domain: matcher.domain, matchedKeyword: hit.keyword };
      }
    }

    return { domain: FALLBACK_DOMAIN, matchedKeyword: null };
  }
}
