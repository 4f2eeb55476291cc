import { DOMAIN_LABELS, DOMAIN_TAGS } from '../../core/entities/Domain.js';
import { ClassificationResult, DomainSummary, QueryOptions, QueryResult } from '../../core/entities/Query.js';
import { DomainClassifier } from '../../core/classification/DomainClassifier.js';
import { DomainHandlerRegistry } from '../../core/templates/DomainHandler.js';
import { PromptStore } from '../../core/templates/types.js';
import { formatResponse } from '../../core/formatting/ResponseFormatter.js';
import { IReasoningClient } from '../../core/interfaces/IReasoningClient.js';
import { UpstreamError, errorMessage } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';

/**
 * Routes a query through classification, prompt assembly, the model call and formatting
 */
export class QueryRouterService {
  private readonly classifier: DomainClassifier;
  private readonly handlers: DomainHandlerRegistry;

  constructor(
    private readonly store: PromptStore,
    private readonly client: IReasoningClient,
    private readonly logger: Logger = silentLogger
  ) {
    this.classifier = new DomainClassifier(store);
    this.handlers = new DomainHandlerRegistry(store);
  }

  async handle(query: string, options: QueryOptions = {}): Promise<QueryResult> {
    const startedAt = Date.now();
    const { domain, matchedKeyword } = this.classifier.classifyWithDetails(query);

    if (matchedKeyword === null) {
      this.logger.debug('No domain keyword matched, using fallback', { domain });
    } else {
      this.logger.debug('Query classified', { domain, keyword: matchedKeyword });
    }

    const prompt = this.handlers.assemble(query, domain);

    let raw: string;
    try {
      raw = await this.client.generate(prompt, options.signal);
    } catch (error) {
      this.logger.error('Model call failed', {
        domain,
        model: this.client.model,
        reason: error instanceof UpstreamError ? error.reason : 'unknown',
        status: error instanceof UpstreamError ? error.status : undefined,
        error: errorMessage(error),
      });
      throw error;
    }

    const durationMs = Date.now() - startedAt;
    this.logger.debug('Query answered', { domain, duration_ms: durationMs });

    return {
      query,
      domain,
      matchedKeyword,
      response: formatResponse(raw),
      model: this.client.model,
      durationMs,
    };
  }

  /**
   * Classification only, no model call
   */
  classify(query: string): ClassificationResult {
    return this.classifier.classifyWithDetails(query);
  }

  describeDomains(): DomainSummary[] {
    return DOMAIN_TAGS.map((domain) => ({
      domain,
      label: DOMAIN_LABELS[domain],
      keywordCount: this.store.domains[domain].keywords.length,
    }));
  }

  checkUpstream(): Promise<boolean> {
    return this.client.healthCheck();
  }

  get model(): string {
    return this.client.model;
  }
}
