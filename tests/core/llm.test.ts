import { APICallError, LoadAPIKeyError, RetryError } from 'ai';
import { describe, expect, it } from 'vitest';

import { parseConfig } from '../../src/core/config.js';
import {
  classifyLlmFailure,
  completeWithTimeout,
  createLlmClient,
  LlmRateLimitError,
  LlmUnavailableError,
  normalizeProviderError,
  type LlmClient,
} from '../../src/core/llm.js';
import { TimeoutError } from '../../src/core/retry.js';

function apiCallError(statusCode: number | undefined): APICallError {
  return new APICallError({
    message: 'provider said no',
    url: 'https://llm.invalid/v1/messages',
    requestBodyValues: {},
    statusCode,
  });
}

describe('normalizeProviderError', () => {
  it('maps a 429 to a rate limit error', () => {
    const mapped = normalizeProviderError(apiCallError(429));
    expect(mapped).toBeInstanceOf(LlmRateLimitError);
    expect(classifyLlmFailure(mapped)).toBe('rate_limited');
  });

  it.each([401, 403, 500, 503, undefined])('maps status %s to unavailable', (status) => {
    const mapped = normalizeProviderError(apiCallError(status));
    expect(mapped).toBeInstanceOf(LlmUnavailableError);
    expect(classifyLlmFailure(mapped)).toBe('unavailable');
  });

  it('maps a missing api key to unavailable', () => {
    const mapped = normalizeProviderError(new LoadAPIKeyError({ message: 'no key' }));
    expect(mapped).toBeInstanceOf(LlmUnavailableError);
  });

  it('unwraps the last error of a retry error', () => {
    const retry = new RetryError({
      message: 'gave up',
      reason: 'maxRetriesExceeded',
      errors: [apiCallError(500), apiCallError(429)],
    });
    expect(normalizeProviderError(retry)).toBeInstanceOf(LlmRateLimitError);
  });

  it('passes other client errors through unchanged', () => {
    const badRequest = apiCallError(400);
    expect(normalizeProviderError(badRequest)).toBe(badRequest);
    expect(classifyLlmFailure(badRequest)).toBe('unknown');
  });
});

describe('createLlmClient', () => {
  it('returns null without an api key', () => {
    expect(createLlmClient(parseConfig({}, {}))).toBeNull();
  });

  it('builds a client for the configured model', () => {
    const client = createLlmClient(parseConfig({ llm: { apiKey: 'test-secret', model: 'test-model' } }, {}));
    expect(client?.model).toBe('test-model');
  });
});

describe('completeWithTimeout', () => {
  it('rejects with a timeout when the client hangs', async () => {
    const hanging: LlmClient = {
      model: 'stub',
      complete: () => new Promise(() => {}),
    };

    const error = await completeWithTimeout(hanging, [], {}, 5, 'classification').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(classifyLlmFailure(error)).toBe('timeout');
  });
});
