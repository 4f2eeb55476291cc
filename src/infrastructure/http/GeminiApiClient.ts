import fetch, { RequestInit } from 'node-fetch';
import { z } from 'zod';
import { IReasoningClient } from '../../core/interfaces/IReasoningClient.js';
import { UpstreamError, errorMessage } from '../../core/errors.js';
import { DEFAULT_RETRY_CONFIG, RetryConfig, withRetry } from '../../utils/retry.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface GeminiClientOptions {
  apiKey: string;
  apiUrl: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
  retryConfig?: RetryConfig;
  logger?: Logger;
  /** Swappable for tests; defaults to node-fetch */
  fetchFn?: FetchLike;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<FetchResponseLike>;

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z
    .object({
      blockReason: z.string().optional(),
    })
    .optional(),
});

const ApiErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Gemini generateContent client.
 * One call per prompt; retries only when retryConfig.maxAttempts > 1.
 */
export class GeminiApiClient implements IReasoningClient {
  readonly model: string;
  private readonly retryConfig: RetryConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: GeminiClientOptions) {
    this.model = options.model;
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.logger = options.logger ?? silentLogger;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async generate(prompt: string, abortSignal?: AbortSignal): Promise<string> {
    const url = `${this.options.apiUrl}/models/${encodeURIComponent(this.model)}:generateContent`;
    const body = JSON.stringify({
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: {
        temperature: this.options.temperature,
        maxOutputTokens: this.options.maxOutputTokens,
      },
    });

    try {
      return await this.generateWithRetry(url, body, abortSignal);
    } catch (error) {
      // A cancel during the backoff wait surfaces the previous attempt's error
      if (abortSignal?.aborted && !(error instanceof UpstreamError && error.reason === 'aborted')) {
        throw new UpstreamError('aborted', 'Gemini request was cancelled', { cause: error });
      }
      throw error;
    }
  }

  private generateWithRetry(url: string, body: string, abortSignal?: AbortSignal): Promise<string> {
    return withRetry(
      async () => {
        const res = await this.request(url, { method: 'POST', body }, abortSignal);
        const data = await this.readJson(res);
        return this.extractText(data);
      },
      this.retryConfig,
      {
        signal: abortSignal,
        shouldRetry: (error) => error instanceof UpstreamError && error.retryable,
        onLog: (log) => {
          if (!log.success) {
            this.logger.warn('Gemini request failed', {
              model: this.model,
              attempt: log.attempt,
              error: log.error,
              next_retry_in_ms: log.nextRetryInMs,
            });
          }
        },
      }
    );
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.request(`${this.options.apiUrl}/models?pageSize=1`, { method: 'GET' });
      return true;
    } catch (error) {
      this.logger.warn('Gemini health check failed', { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Issue one HTTP request with the configured timeout, linked to the caller's signal
   */
  private async request(
    url: string,
    init: RequestInit,
    callerSignal?: AbortSignal
  ): Promise<FetchResponseLike> {
    if (callerSignal?.aborted) {
      throw new UpstreamError('aborted', 'Request was cancelled before it was sent');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const res = await this.fetchFn(url, {
        ...init,
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.options.apiKey,
        },
        signal: controller.signal,
      });

      if (!res.ok) {
        throw await this.toHttpError(res);
      }
      return res;
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }
      if (timedOut) {
        throw new UpstreamError('timeout', `Gemini request timed out after ${this.options.timeoutMs}ms`, {
          cause: error,
        });
      }
      if (controller.signal.aborted) {
        throw new UpstreamError('aborted', 'Gemini request was cancelled', { cause: error });
      }
      throw new UpstreamError('network', `Could not reach Gemini: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async toHttpError(res: FetchResponseLike): Promise<UpstreamError> {
    const raw = await res.text().catch(() => '');
    const parsed = ApiErrorBodySchema.safeParse(parseJson(raw));
    const detail = (parsed.success ? parsed.data.error.message : undefined) ?? res.statusText;
    const apiStatus = parsed.success ? parsed.data.error.status : undefined;

    const message = `Gemini API error ${res.status}: ${detail}`;
    if (res.status === 401 || res.status === 403) {
      return new UpstreamError('auth', message, { status: res.status });
    }
    if (res.status === 429) {
      return new UpstreamError(apiStatus === 'RESOURCE_EXHAUSTED' ? 'quota' : 'rate-limit', message, {
        status: res.status,
      });
    }
    return new UpstreamError('http', message, { status: res.status });
  }

  private async readJson(res: FetchResponseLike): Promise<unknown> {
    try {
      return await res.json();
    } catch (error) {
      throw new UpstreamError('invalid-response', 'Gemini returned a body that is not JSON', { cause: error });
    }
  }

  private extractText(data: unknown): string {
    const parsed = GenerateContentResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError('invalid-response', 'Gemini response did not match the expected shape', {
        cause: parsed.error,
      });
    }

    const blockReason = parsed.data.promptFeedback?.blockReason;
    if (blockReason) {
      throw new UpstreamError('blocked', `Gemini blocked the prompt: ${blockReason}`);
    }

    const candidate = parsed.data.candidates?.[0];
    const text = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');

    if (text.length === 0) {
      throw new UpstreamError(
        'blocked',
        `Gemini returned no text${candidate?.finishReason ? ` (finish reason: ${candidate.finishReason})` : ''}`
      );
    }

    return text;
  }
}
