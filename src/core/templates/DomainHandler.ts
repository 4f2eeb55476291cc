import { DomainTag } from '../entities/Domain.js';
import { DomainHandler, PromptStore } from './types.js';

export const QUERY_HEADING = 'User query:';

const SECTION_SEPARATOR = '\n\n';

/**
 * Handler that wraps a query with the shared templates and one domain's instruction
 *
 * Layout:
 * <safety rules>
 *
 * <base prompt>
 *
 * <domain instruction>
 *
 * User query:
 * <query, verbatim>
 */
export class TemplateDomainHandler implements DomainHandler {
  constructor(
    readonly domain: DomainTag,
    private readonly store: PromptStore
  ) {}

  assemble(query: string): string {
    return [
      this.store.safetyRules,
      this.store.basePrompt,
      this.store.domains[this.domain].instruction,
      `${QUERY_HEADING}\n${query}`,
    ].join(SECTION_SEPARATOR);
  }
}

/**
 * One handler per domain tag, built up front from the prompt store
 */
export class DomainHandlerRegistry {
  private readonly handlers: Readonly<Record<DomainTag, DomainHandler>>;

  constructor(store: PromptStore) {
    this.handlers = Object.freeze({
      'government-scheme': new TemplateDomainHandler('government-scheme', store),
      health: new TemplateDomainHandler('health', store),
      education: new TemplateDomainHandler('education', store),
      environment: new TemplateDomainHandler('environment', store),
      other: new TemplateDomainHandler('other', store),
    });
  }

  getHandler(domain: DomainTag): DomainHandler {
    return this.handlers[domain];
  }

  assemble(query: string, domain: DomainTag): string {
    return this.getHandler(domain).assemble(query);
  }
}
