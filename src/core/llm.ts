import { createAnthropic } from '@ai-sdk/anthropic';
import { APICallError, LoadAPIKeyError, RetryError, generateText, type CoreMessage } from 'ai';

import type { TradewatchConfig } from './config.js';
import { isTimeoutError, withTimeout } from './retry.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LlmCompletionOptions {
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface LlmResponse {
  content: string;
  model: string;
}

export interface LlmClient {
  readonly model: string;
  complete(messages: ChatMessage[], options?: LlmCompletionOptions): Promise<LlmResponse>;
}

/** Credentials missing or rejected, or the endpoint could not be reached. */
export class LlmUnavailableError extends Error {
  readonly kind = 'unavailable' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LlmUnavailableError';
  }
}

/** The provider throttled the request (HTTP 429). */
export class LlmRateLimitError extends Error {
  readonly kind = 'rate_limited' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LlmRateLimitError';
  }
}

export type LlmFailureKind = 'unavailable' | 'rate_limited' | 'timeout' | 'unknown';

export function classifyLlmFailure(error: unknown): LlmFailureKind {
  if (error instanceof LlmUnavailableError) return 'unavailable';
  if (error instanceof LlmRateLimitError) return 'rate_limited';
  if (isTimeoutError(error)) return 'timeout';
  return 'unknown';
}

function toCoreMessage(message: ChatMessage): CoreMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Map provider SDK errors onto the two failure types the router understands.
 * Anything else is rethrown unchanged.
 */
export function normalizeProviderError(error: unknown): unknown {
  const inner = RetryError.isInstance(error) ? error.lastError : error;
  if (LoadAPIKeyError.isInstance(inner)) {
    return new LlmUnavailableError('LLM API key is not configured', { cause: inner });
  }
  if (APICallError.isInstance(inner)) {
    const status = inner.statusCode;
    if (status === 429) {
      return new LlmRateLimitError(`LLM rate limited: ${inner.message}`, { cause: inner });
    }
    if (status === undefined || status === 401 || status === 403 || status >= 500) {
      return new LlmUnavailableError(
        `LLM request failed${status ? ` (${status})` : ''}: ${inner.message}`,
        { cause: inner }
      );
    }
  }
  return inner;
}

export class AnthropicLlmClient implements LlmClient {
  private readonly provider: ReturnType<typeof createAnthropic>;

  constructor(
    apiKey: string,
    readonly model: string,
    private readonly defaults: { maxTokens: number; temperature: number }
  ) {
    this.provider = createAnthropic({ apiKey });
  }

  async complete(messages: ChatMessage[], options?: LlmCompletionOptions): Promise<LlmResponse> {
    try {
      const result = await generateText({
        model: this.provider(this.model),
        messages: messages.map(toCoreMessage),
        maxTokens: options?.maxTokens ?? this.defaults.maxTokens,
        temperature: options?.temperature ?? this.defaults.temperature,
        abortSignal: options?.signal,
        maxRetries: 0,
      });
      return { content: result.text, model: this.model };
    } catch (error) {
      throw normalizeProviderError(error);
    }
  }
}

/**
 * Returns null when no API key is configured; callers treat that as the
 * degraded, rule-based mode.
 */
export function createLlmClient(config: TradewatchConfig): LlmClient | null {
  const apiKey = config.llm.apiKey;
  if (!apiKey) {
    return null;
  }
  return new AnthropicLlmClient(apiKey, config.llm.model, {
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
  });
}

/** complete() bounded by a deadline; a timeout rejects with TimeoutError. */
export function completeWithTimeout(
  llm: LlmClient,
  messages: ChatMessage[],
  options: Omit<LlmCompletionOptions, 'signal'>,
  timeoutMs: number,
  label: string
): Promise<LlmResponse> {
  return withTimeout((signal) => llm.complete(messages, { ...options, signal }), timeoutMs, label);
}
