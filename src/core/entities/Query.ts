import { DomainTag } from './Domain.js';

/**
 * Query-related domain entities
 */
export interface QueryOptions {
  signal?: AbortSignal;
}

export interface ClassificationResult {
  domain: DomainTag;
  /** Keyword that decided the domain, null when the query fell back to `other` */
  matchedKeyword: string | null;
}

export interface QueryResult {
  query: string;
  domain: DomainTag;
  matchedKeyword: string | null;
  response: string;
  model: string;
  durationMs: number;
}

export interface DomainSummary {
  domain: DomainTag;
  label: string;
  keywordCount: number;
}
