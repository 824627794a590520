import { z } from 'zod';

import type { Logger } from '../core/logger.js';
import { retryWithBackoff, withTimeout } from '../core/retry.js';

export interface NewsHeadline {
  title: string;
  source: string;
  description: string | null;
  url: string;
  publishedAt: string;
}

export interface NewsSource {
  /** Most recent headlines matching the query, newest first. */
  getHeadlines(query: string, limit: number): Promise<NewsHeadline[]>;
}

export class NewsDataError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NewsDataError';
  }
}

const ArticleSchema = z.object({
  source: z.object({ name: z.string().nullable().optional() }).optional(),
  title: z.string().nullable(),
  description: z.string().nullable().optional(),
  url: z.string(),
  publishedAt: z.string(),
});

const EverythingSchema = z.object({
  status: z.literal('ok'),
  articles: z.array(ArticleSchema),
});

export interface NewsApiClientOptions {
  baseUrl: string;
  apiKey: string;
  cacheTtlSeconds: number;
  requestTimeoutMs: number;
  retries: number;
  fetchFn?: typeof fetch;
  now?: () => number;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof NewsDataError) {
    return error.status === null || error.status === 429 || error.status >= 500;
  }
  return true;
}

/** Headlines from a NewsAPI-compatible `/everything` endpoint. */
export class NewsApiClient implements NewsSource {
  private readonly cache = new Map<string, { expiresAtMs: number; value: NewsHeadline[] }>();
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;

  constructor(
    private readonly options: NewsApiClientOptions,
    private readonly logger: Logger
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async getHeadlines(query: string, limit: number): Promise<NewsHeadline[]> {
    const pageSize = Math.min(100, Math.max(1, Math.floor(limit)));
    const key = `${query}|${pageSize}`;
    const nowMs = this.now();
    const hit = this.cache.get(key);
    if (hit && hit.expiresAtMs > nowMs) {
      return hit.value;
    }

    const outcome = await retryWithBackoff(
      () =>
        withTimeout(
          (signal) => this.fetchHeadlines(query, pageSize, signal),
          this.options.requestTimeoutMs,
          `news lookup for ${query}`
        ),
      {
        retries: this.options.retries,
        baseDelayMs: 250,
        maxDelayMs: 2_000,
        jitterMs: 100,
        isRetryable,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger.warn(`News lookup attempt ${attempt} failed; retrying in ${delayMs}ms`, error),
      }
    );
    if (!outcome.ok) {
      throw outcome.error;
    }

    this.cache.set(key, { expiresAtMs: nowMs + this.options.cacheTtlSeconds * 1000, value: outcome.value });
    return outcome.value;
  }

  private async fetchHeadlines(query: string, pageSize: number, signal: AbortSignal): Promise<NewsHeadline[]> {
    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, '')}/everything`);
    url.searchParams.set('q', query);
    url.searchParams.set('language', 'en');
    url.searchParams.set('sortBy', 'publishedAt');
    url.searchParams.set('pageSize', String(pageSize));

    let response: Response;
    try {
      response = await this.fetchFn(url.toString(), {
        headers: { accept: 'application/json', 'x-api-key': this.options.apiKey },
        signal,
      });
    } catch (error) {
      throw new NewsDataError(`News request failed for ${query}`, null, { cause: error });
    }
    if (!response.ok) {
      throw new NewsDataError(`News request for ${query} returned ${response.status}`, response.status);
    }

    const parsed = EverythingSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new NewsDataError(`Unexpected news payload for ${query}`, response.status);
    }

    const headlines: NewsHeadline[] = [];
    for (const article of parsed.data.articles) {
      // Removed articles come back with a "[Removed]" title.
      if (!article.title || article.title === '[Removed]') continue;
      headlines.push({
        title: article.title.trim(),
        source: article.source?.name ?? 'unknown source',
        description: article.description ?? null,
        url: article.url,
        publishedAt: article.publishedAt,
      });
    }
    return headlines;
  }
}
