import { RequestInit } from 'node-fetch';
import { FetchLike, FetchResponseLike, GeminiApiClient, GeminiClientOptions } from '../src/infrastructure/http/GeminiApiClient.js';
import { UpstreamError } from '../src/core/errors.js';

interface RecordedCall {
  url: string;
  init: RequestInit;
}

function jsonResponse(status: number, body: unknown, statusText = 'OK'): FetchResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

function candidateBody(...texts: string[]) {
  return {
    candidates: [{ content: { parts: texts.map((text) => ({ text })) }, finishReason: 'STOP' }],
  };
}

function createClient(fetchFn: FetchLike, overrides: Partial<GeminiClientOptions> = {}) {
  return new GeminiApiClient({
    apiKey: 'test-key',
    apiUrl: 'https://gemini.test/v1beta',
    model: 'gemini-test',
    temperature: 0.4,
    maxOutputTokens: 256,
    timeoutMs: 1000,
    fetchFn,
    ...overrides,
  });
}

async function captureError(promise: Promise<unknown>): Promise<UpstreamError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof UpstreamError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

describe('GeminiApiClient', () => {
  let calls: RecordedCall[];

  beforeEach(() => {
    calls = [];
  });

  const recording =
    (...responses: FetchResponseLike[]): FetchLike =>
    async (url, init) => {
      calls.push({ url, init });
      const next = responses[Math.min(calls.length - 1, responses.length - 1)];
      return next;
    };

  describe('generate', () => {
    test('should post the prompt with the configured model and generation config', async () => {
      const client = createClient(recording(jsonResponse(200, candidateBody('Stay hydrated.'))));

      const text = await client.generate('assembled prompt');

      expect(text).toBe('Stay hydrated.');
      expect(calls).toHaveLength(1);
      expect(calls[0].url).toBe('https://gemini.test/v1beta/models/gemini-test:generateContent');
      expect(calls[0].init.method).toBe('POST');
      expect(calls[0].init.headers).toEqual({
        'Content-Type': 'application/json',
        'x-goog-api-key': 'test-key',
      });
      expect(JSON.parse(String(calls[0].init.body))).toEqual({
        contents: [{ role: 'user', parts: [{ text: 'assembled prompt' }] }],
        generationConfig: { temperature: 0.4, maxOutputTokens: 256 },
      });
    });

    test('should join all parts of the first candidate', async () => {
      const client = createClient(recording(jsonResponse(200, candidateBody('Part one. ', 'Part two.'))));

      await expect(client.generate('p')).resolves.toBe('Part one. Part two.');
    });

    test.each<[number, string]>([
      [401, 'auth'],
      [403, 'auth'],
      [429, 'rate-limit'],
      [500, 'http'],
      [404, 'http'],
    ])('should map HTTP %i to %s', async (status, reason) => {
      const client = createClient(
        recording(jsonResponse(status, { error: { code: status, message: 'upstream said no' } }, 'Error'))
      );

      const error = await captureError(client.generate('p'));

      expect(error.reason).toBe(reason);
      expect(error.status).toBe(status);
      expect(error.message).toBe(`Gemini API error ${status}: upstream said no`);
    });

    test('should map an exhausted quota to quota', async () => {
      const client = createClient(
        recording(
          jsonResponse(429, { error: { code: 429, message: 'Quota exceeded', status: 'RESOURCE_EXHAUSTED' } }, 'Too Many Requests')
        )
      );

      const error = await captureError(client.generate('p'));

      expect(error.reason).toBe('quota');
      expect(error.retryable).toBe(false);
    });

    test('should fall back to the status text when the error body is not JSON', async () => {
      const client = createClient(
        recording({
          ok: false,
          status: 503,
          statusText: 'Service Unavailable',
          json: async () => {
            throw new Error('not json');
          },
          text: async () => '<html>down</html>',
        })
      );

      const error = await captureError(client.generate('p'));

      expect(error.message).toBe('Gemini API error 503: Service Unavailable');
      expect(error.retryable).toBe(true);
    });

    test('should wrap network failures', async () => {
      const client = createClient(async () => {
        throw new Error('getaddrinfo ENOTFOUND gemini.test');
      });

      const error = await captureError(client.generate('p'));

      expect(error.reason).toBe('network');
      expect(error.message).toBe('Could not reach Gemini: getaddrinfo ENOTFOUND gemini.test');
    });

    test('should report a blocked prompt', async () => {
      const client = createClient(recording(jsonResponse(200, { promptFeedback: { blockReason: 'SAFETY' } })));

      const error = await captureError(client.generate('p'));

      expect(error.reason).toBe('blocked');
      expect(error.message).toBe('Gemini blocked the prompt: SAFETY');
    });

    test('should report a candidate without text', async () => {
      const client = createClient(
        recording(jsonResponse(200, { candidates: [{ content: { parts: [] }, finishReason: 'MAX_TOKENS' }] }))
      );

      const error = await captureError(client.generate('p'));

      expect(error.reason).toBe('blocked');
      expect(error.message).toBe('Gemini returned no text (finish reason: MAX_TOKENS)');
    });

    test('should reject a body of the wrong shape', async () => {
      const client = createClient(recording(jsonResponse(200, { candidates: 'nope' })));

      const error = await captureError(client.generate('p'));

      expect(error.reason).toBe('invalid-response');
    });

    test('should time out a slow request', async () => {
      const hanging: FetchLike = (url, init) =>
        new Promise((_, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('The user aborted a request.')));
        });
      const client = createClient(hanging, { timeoutMs: 20 });

      const error = await captureError(client.generate('p'));

      expect(error.reason).toBe('timeout');
      expect(error.message).toBe('Gemini request timed out after 20ms');
    });

    test('should propagate caller cancellation to the HTTP call', async () => {
      let httpSignal: RequestInit['signal'];
      const hanging: FetchLike = (url, init) => {
        httpSignal = init.signal;
        return new Promise((_, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('The user aborted a request.')));
        });
      };
      const client = createClient(hanging, { timeoutMs: 5000 });
      const controller = new AbortController();

      const pending = captureError(client.generate('p', controller.signal));
      controller.abort();
      const error = await pending;

      expect(error.reason).toBe('aborted');
      expect(httpSignal?.aborted).toBe(true);
    });

    test('should not call the API when already cancelled', async () => {
      const fetchFn = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>();
      const client = createClient(fetchFn);
      const controller = new AbortController();
      controller.abort();

      const error = await captureError(client.generate('p', controller.signal));

      expect(error.reason).toBe('aborted');
      expect(fetchFn).not.toHaveBeenCalled();
    });
  });

  describe('retries', () => {
    test('should make a single attempt by default', async () => {
      const client = createClient(recording(jsonResponse(500, { error: { message: 'boom' } }, 'Error')));

      await captureError(client.generate('p'));

      expect(calls).toHaveLength(1);
    });

    test('should retry transient failures when enabled', async () => {
      const client = createClient(
        recording(jsonResponse(503, { error: { message: 'busy' } }, 'Error'), jsonResponse(200, candidateBody('ok'))),
        { retryConfig: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2, multiplier: 2 } }
      );

      await expect(client.generate('p')).resolves.toBe('ok');
      expect(calls).toHaveLength(2);
    });

    test('should report a cancel during the backoff wait as aborted', async () => {
      const fetchFn = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>().mockRejectedValue(new Error('ECONNRESET'));
      const client = createClient(fetchFn, {
        retryConfig: { maxAttempts: 3, initialDelayMs: 5000, maxDelayMs: 5000, multiplier: 2 },
      });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 50);

      const startTime = Date.now();
      const error = await captureError(client.generate('p', controller.signal));

      expect(error.reason).toBe('aborted');
      expect(error.cause).toBeInstanceOf(UpstreamError);
      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(Date.now() - startTime).toBeLessThan(4000);
    });

    test('should never retry auth failures', async () => {
      const client = createClient(recording(jsonResponse(401, { error: { message: 'bad key' } }, 'Unauthorized')), {
        retryConfig: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2, multiplier: 2 },
      });

      const error = await captureError(client.generate('p'));

      expect(error.reason).toBe('auth');
      expect(calls).toHaveLength(1);
    });
  });

  describe('healthCheck', () => {
    test('should report true when the models endpoint answers', async () => {
      const client = createClient(recording(jsonResponse(200, { models: [] })));

      await expect(client.healthCheck()).resolves.toBe(true);
      expect(calls[0].url).toBe('https://gemini.test/v1beta/models?pageSize=1');
      expect(calls[0].init.method).toBe('GET');
    });

    test('should report false instead of throwing', async () => {
      const client = createClient(recording(jsonResponse(403, { error: { message: 'denied' } }, 'Forbidden')));

      await expect(client.healthCheck()).resolves.toBe(false);
    });
  });
});
