import { describe, expect, it, vi } from 'vitest';

import { findAssetMention } from '../../../src/agent/assets.js';
import {
  describeTrend,
  detectMarketMode,
  MARKET_USAGE,
  MarketHandler,
  newsQuery,
} from '../../../src/agent/handlers/market.js';
import type { MarketDataSource, PriceHistorySource, SpotQuote } from '../../../src/data/market_data.js';
import type { NewsHeadline, NewsSource } from '../../../src/data/news.js';

function source(quote: Omit<SpotQuote, 'priceId' | 'asOf'>) {
  const getSpotQuote = vi.fn(async (priceId: string) => ({ priceId, asOf: '2026-01-01T00:00:00.000Z', ...quote }));
  const market: MarketDataSource = { getSpotQuote };
  return { market, getSpotQuote };
}

function headline(title: string, source: string, publishedAt: string, description: string | null = null): NewsHeadline {
  return { title, source, description, url: 'https://news.test/a', publishedAt };
}

const HEADLINES = [
  headline('Bitcoin surges to record high', 'Coin Wire', '2026-03-01T10:00:00Z'),
  headline('Exchange hacked', 'Ledger Daily', '2026-02-28T18:30:00Z', 'Withdrawals halted'),
  headline('Bitcoin ETF filing published', 'Market Desk', '2026-02-28T09:00:00Z'),
  headline('Miners hold steady', 'Hash Report', '2026-02-27T12:00:00Z'),
];

function newsSource(headlines: NewsHeadline[]) {
  const getHeadlines = vi.fn(async (_query: string, limit: number) => headlines.slice(0, limit));
  const news: NewsSource = { getHeadlines };
  return { news, getHeadlines };
}

function historySource(closes: number[]) {
  const getPriceHistory = vi.fn(async () =>
    closes.map((priceUsd, i) => ({ timestampMs: Date.UTC(2026, 1, 1) + i * 86_400_000, priceUsd }))
  );
  const history: PriceHistorySource = { getPriceHistory };
  return { history, getPriceHistory };
}

describe('detectMarketMode', () => {
  it.each([
    ['what is the price of BTC', 'quote'],
    ['what is the BTC price trend', 'quote'],
    ['how is BTC doing', 'quote'],
    ['BTC news sentiment?', 'sentiment'],
    ['any ETH headlines today?', 'news'],
    ['is SOL bullish right now?', 'trend'],
    ['show me the RSI on ETH', 'trend'],
    ['give me a quick SOL update', 'update'],
  ] as const)('%s → %s', (text, mode) => {
    expect(detectMarketMode(text)).toBe(mode);
  });
});

describe('newsQuery', () => {
  it('joins the ticker and names, quoting multi-word names', () => {
    const btc = findAssetMention('BTC');
    const bnb = findAssetMention('BNB');
    expect(btc && newsQuery(btc)).toBe('BTC OR bitcoin');
    expect(bnb && newsQuery(bnb)).toBe('BNB OR "binance coin"');
  });
});

describe('describeTrend', () => {
  it.each([
    [7, 'strongly bullish'],
    [1, 'leaning bullish'],
    [0.5, 'moving sideways'],
    [-1, 'leaning bearish'],
    [-5, 'strongly bearish'],
    [null, 'with no 24h change reported'],
  ] as const)('%s → %s', (change, text) => {
    expect(describeTrend(change)).toBe(text);
  });
});

describe('MarketHandler', () => {
  it('quotes the mentioned asset', async () => {
    const { market, getSpotQuote } = source({ priceUsd: 64_250.5, change24hPct: 2.5 });
    const handler = new MarketHandler(market);

    await expect(handler.process("What's BTC doing?")).resolves.toBe(
      'BTC is trading at $64,250.50 (+2.50% over 24h), leaning bullish.'
    );
    expect(getSpotQuote).toHaveBeenCalledWith('bitcoin');
  });

  it('prints small prices with significant digits and handles a missing change', async () => {
    const { market } = source({ priceUsd: 0.123456, change24hPct: null });
    await expect(new MarketHandler(market).process('how is $doge')).resolves.toBe(
      'DOGE is trading at $0.1235, with no 24h change reported.'
    );
  });

  it('does not quote stocks', async () => {
    const { market, getSpotQuote } = source({ priceUsd: 1, change24hPct: 0 });
    await expect(new MarketHandler(market).process('How is AAPL doing?')).resolves.toBe(
      'AAPL is a stock; I only carry crypto spot prices right now.'
    );
    expect(getSpotQuote).not.toHaveBeenCalled();
  });

  it('asks which asset when none is named', async () => {
    const { market } = source({ priceUsd: 1, change24hPct: 0 });
    await expect(new MarketHandler(market).process("how's the market?")).resolves.toBe(MARKET_USAGE);
  });

  it('lets data source errors propagate to dispatch', async () => {
    const market: MarketDataSource = {
      getSpotQuote: async () => {
        throw new Error('rate limited');
      },
    };
    await expect(new MarketHandler(market).process('price of ETH')).rejects.toThrow('rate limited');
  });
});

describe('MarketHandler news and sentiment', () => {
  it('lists the three latest headlines', async () => {
    const { market } = source({ priceUsd: 1, change24hPct: 0 });
    const { news, getHeadlines } = newsSource(HEADLINES);

    await expect(new MarketHandler(market, { news }).process('Any news on BTC?')).resolves.toBe(
      [
        'Latest BTC headlines:',
        '- Bitcoin surges to record high (Coin Wire, 2026-03-01)',
        '- Exchange hacked (Ledger Daily, 2026-02-28)',
        '- Bitcoin ETF filing published (Market Desk, 2026-02-28)',
      ].join('\n')
    );
    expect(getHeadlines).toHaveBeenCalledWith('BTC OR bitcoin', 5);
  });

  it('scores headline sentiment', async () => {
    const { market } = source({ priceUsd: 1, change24hPct: 0 });
    const { news, getHeadlines } = newsSource(HEADLINES.slice(0, 3));

    await expect(new MarketHandler(market, { news }).process('What is the sentiment on BTC?')).resolves.toBe(
      [
        'BTC news sentiment is bullish (score +0.12 across 3 headlines: 1 positive, 1 negative, 1 neutral).',
        'Headlines lean positive; crowd optimism can fade quickly, so confirm it with price action.',
      ].join('\n')
    );
    expect(getHeadlines).toHaveBeenCalledWith('BTC OR bitcoin', 20);
  });

  it('says when no headlines are found', async () => {
    const { market } = source({ priceUsd: 1, change24hPct: 0 });
    const { news } = newsSource([]);
    await expect(new MarketHandler(market, { news }).process('ETH headlines')).resolves.toBe(
      'I found no recent headlines about ETH.'
    );
  });

  it('explains that news needs a key when no source is configured', async () => {
    const { market } = source({ priceUsd: 1, change24hPct: 0 });
    const handler = new MarketHandler(market);
    await expect(handler.process('BTC sentiment')).resolves.toBe(
      'BTC sentiment is read from news headlines, and no news API key is configured.'
    );
    await expect(handler.process('BTC news')).resolves.toBe(
      'BTC headlines need a news API key, which is not configured.'
    );
  });
});

describe('MarketHandler trend', () => {
  it('reads indicators from daily closes', async () => {
    const { market } = source({ priceUsd: 1, change24hPct: 0 });
    const { history, getPriceHistory } = historySource(Array.from({ length: 30 }, (_, i) => i + 1));

    await expect(new MarketHandler(market, { history }).process('Is BTC trending up?')).resolves.toBe(
      [
        'BTC trend over 30 days: bullish, last close $30.00.',
        '- Price vs 7-day average: +11.11% (bullish)',
        '- 7-day vs 30-day average: +74.19% (bullish)',
        '- RSI(14): 100.0 (bearish, overbought)',
        '- Change over the period: +2900.00%',
        'Momentum favors buyers; look for pullbacks rather than chasing.',
      ].join('\n')
    );
    expect(getPriceHistory).toHaveBeenCalledWith('bitcoin', 30);
  });

  it('needs enough history and a history source', async () => {
    const { market } = source({ priceUsd: 1, change24hPct: 0 });
    const { history } = historySource([1, 2, 3]);

    await expect(new MarketHandler(market, { history }).process('BTC momentum')).resolves.toBe(
      'Not enough price history for BTC to read a trend.'
    );
    await expect(new MarketHandler(market).process('BTC momentum')).resolves.toBe(
      'Trend analysis for BTC needs a price history source, which is not configured.'
    );
  });
});

describe('MarketHandler update', () => {
  it('combines the quote with news sentiment', async () => {
    const { market } = source({ priceUsd: 64_250.5, change24hPct: 2.5 });
    const { news } = newsSource(HEADLINES.slice(0, 1));

    await expect(new MarketHandler(market, { news }).process('Give me a BTC update')).resolves.toBe(
      [
        'BTC is trading at $64,250.50 (+2.50% over 24h), leaning bullish.',
        'News sentiment: bullish.',
        'Latest headline: Bitcoin surges to record high (Coin Wire)',
        'Price and sentiment both point up; look for pullbacks to support rather than chasing.',
      ].join('\n')
    );
  });

  it('covers price only without a news source', async () => {
    const { market } = source({ priceUsd: 64_250.5, change24hPct: -2.5 });
    await expect(new MarketHandler(market).process('BTC overview')).resolves.toBe(
      [
        'BTC is trading at $64,250.50 (-2.50% over 24h), leaning bearish.',
        'News is not configured, so this update covers price only.',
      ].join('\n')
    );
  });
});
