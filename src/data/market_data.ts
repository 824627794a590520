import { z } from 'zod';

import type { Logger } from '../core/logger.js';
import { retryWithBackoff, withTimeout } from '../core/retry.js';

export interface SpotQuote {
  priceId: string;
  priceUsd: number;
  change24hPct: number | null;
  asOf: string;
}

export interface MarketDataSource {
  getSpotQuote(priceId: string): Promise<SpotQuote>;
}

export interface PricePoint {
  timestampMs: number;
  priceUsd: number;
}

export interface PriceHistorySource {
  /** Daily closes for the last `days` days, oldest first. */
  getPriceHistory(priceId: string, days: number): Promise<PricePoint[]>;
}

export class MarketDataError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MarketDataError';
  }
}

const SimplePriceSchema = z.record(
  z.object({
    usd: z.number(),
    usd_24h_change: z.number().nullable().optional(),
  })
);

const MarketChartSchema = z.object({
  prices: z.array(z.tuple([z.number(), z.number()])),
});

type CacheEntry<T> = {
  expiresAtMs: number;
  value: T;
};

export interface CoinGeckoClientOptions {
  baseUrl: string;
  apiKey?: string;
  cacheTtlSeconds: number;
  requestTimeoutMs: number;
  retries: number;
  fetchFn?: typeof fetch;
  now?: () => number;
}

function isRetryable(error: unknown): boolean {
  if (error instanceof MarketDataError) {
    return error.status === null || error.status === 429 || error.status >= 500;
  }
  return true;
}

/** Spot prices and daily history from a CoinGecko-compatible API. */
export class CoinGeckoClient implements MarketDataSource, PriceHistorySource {
  private readonly quotes = new Map<string, CacheEntry<SpotQuote>>();
  private readonly histories = new Map<string, CacheEntry<PricePoint[]>>();
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;

  constructor(
    private readonly options: CoinGeckoClientOptions,
    private readonly logger: Logger
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async getSpotQuote(priceId: string): Promise<SpotQuote> {
    return this.cached(this.quotes, priceId, async () => {
      const body = await this.request(
        '/simple/price',
        { ids: priceId, vs_currencies: 'usd', include_24hr_change: 'true' },
        'Price request',
        priceId
      );
      const parsed = SimplePriceSchema.safeParse(body);
      if (!parsed.success) {
        throw new MarketDataError(`Unexpected price payload for ${priceId}`, 200);
      }
      const entry = parsed.data[priceId];
      if (!entry) {
        throw new MarketDataError(`No price returned for ${priceId}`, 200);
      }
      return {
        priceId,
        priceUsd: entry.usd,
        change24hPct: entry.usd_24h_change ?? null,
        asOf: new Date(this.now()).toISOString(),
      };
    });
  }

  async getPriceHistory(priceId: string, days: number): Promise<PricePoint[]> {
    const span = Math.max(1, Math.floor(days));
    return this.cached(this.histories, `${priceId}|${span}`, async () => {
      const body = await this.request(
        `/coins/${encodeURIComponent(priceId)}/market_chart`,
        { vs_currency: 'usd', days: String(span), interval: 'daily' },
        'Price history request',
        priceId
      );
      const parsed = MarketChartSchema.safeParse(body);
      if (!parsed.success) {
        throw new MarketDataError(`Unexpected price history payload for ${priceId}`, 200);
      }
      return parsed.data.prices.map(([timestampMs, priceUsd]) => ({ timestampMs, priceUsd }));
    });
  }

  private async cached<T>(cache: Map<string, CacheEntry<T>>, key: string, load: () => Promise<T>): Promise<T> {
    const nowMs = this.now();
    const hit = cache.get(key);
    if (hit && hit.expiresAtMs > nowMs) {
      return hit.value;
    }
    const value = await load();
    cache.set(key, { expiresAtMs: nowMs + this.options.cacheTtlSeconds * 1000, value });
    return value;
  }

  private async request(
    path: string,
    params: Record<string, string>,
    label: string,
    priceId: string
  ): Promise<unknown> {
    const outcome = await retryWithBackoff(
      () =>
        withTimeout(
          (signal) => this.fetchJson(path, params, label, priceId, signal),
          this.options.requestTimeoutMs,
          `${label.toLowerCase()} for ${priceId}`
        ),
      {
        retries: this.options.retries,
        baseDelayMs: 250,
        maxDelayMs: 2_000,
        jitterMs: 100,
        isRetryable,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger.warn(`${label} attempt ${attempt} for ${priceId} failed; retrying in ${delayMs}ms`, error),
      }
    );
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  private async fetchJson(
    path: string,
    params: Record<string, string>,
    label: string,
    priceId: string,
    signal: AbortSignal
  ): Promise<unknown> {
    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, '')}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { accept: 'application/json' };
    if (this.options.apiKey) {
      headers['x-cg-demo-api-key'] = this.options.apiKey;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url.toString(), { headers, signal });
    } catch (error) {
      throw new MarketDataError(`${label} failed for ${priceId}`, null, { cause: error });
    }
    if (!response.ok) {
      throw new MarketDataError(`${label} for ${priceId} returned ${response.status}`, response.status);
    }
    const body: unknown = await response.json();
    return body;
  }
}
