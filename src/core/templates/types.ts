import { DomainTag } from '../entities/Domain.js';

/**
 * Per-domain template text and the keywords that route a query to it
 */
export interface DomainTemplate {
  readonly instruction: string;
  readonly keywords: readonly string[];
}

/**
 * Static prompt text loaded once at startup and shared read-only by every request
 */
export interface PromptStore {
  readonly basePrompt: string;
  readonly safetyRules: string;
  readonly domains: Readonly<Record<DomainTag, DomainTemplate>>;
}

/**
 * Builds the final prompt for one domain
 */
export interface DomainHandler {
  readonly domain: DomainTag;

  /**
   * Concatenate safety rules, base prompt, domain instruction and the raw query
   */
  assemble(query: string): string;
}
