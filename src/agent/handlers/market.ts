import type { MarketDataSource, PriceHistorySource, SpotQuote } from '../../data/market_data.js';
import type { NewsHeadline, NewsSource } from '../../data/news.js';
import { buildTrendSnapshot } from '../../technical/indicators.js';
import { summarizeHeadlines } from '../../technical/news_sentiment.js';
import type { IndicatorResult, Signal } from '../../technical/types.js';
import { findAssetMention, type KnownAsset } from '../assets.js';
import type { IntentHandler } from './types.js';
import { formatPct, formatUsd } from './format.js';

export const MARKET_USAGE =
  'Tell me which asset you mean, for example "What is the price of BTC?" or "How is SOL doing?"';

export type MarketMode = 'quote' | 'sentiment' | 'news' | 'trend' | 'update';

const PRICE_WORDS = /\b(price|worth|value|cost|how much)\b/i;
const SENTIMENT_WORDS = /\b(sentiment|mood|feeling|vibes?|social)\b/i;
const NEWS_WORDS = /\b(news|headlines?|announcements?)\b/i;
const TREND_WORDS =
  /\b(trend|trending|technicals?|rsi|moving averages?|momentum|forecast|predict|prediction|outlook|bullish|bearish)\b/i;
const UPDATE_WORDS = /\b(update|overview|summary|rundown|analy[sz]e|analysis)\b/i;

const TREND_DAYS = 30;
const NEWS_LIMIT = 5;
const SENTIMENT_LIMIT = 20;

/** Price questions win; otherwise the first matching topic, defaulting to a quote. */
export function detectMarketMode(text: string): MarketMode {
  if (PRICE_WORDS.test(text)) return 'quote';
  if (SENTIMENT_WORDS.test(text)) return 'sentiment';
  if (NEWS_WORDS.test(text)) return 'news';
  if (TREND_WORDS.test(text)) return 'trend';
  if (UPDATE_WORDS.test(text)) return 'update';
  return 'quote';
}

export function describeTrend(change24hPct: number | null): string {
  if (change24hPct === null) return 'with no 24h change reported';
  if (change24hPct >= 5) return 'strongly bullish';
  if (change24hPct >= 1) return 'leaning bullish';
  if (change24hPct <= -5) return 'strongly bearish';
  if (change24hPct <= -1) return 'leaning bearish';
  return 'moving sideways';
}

/** NewsAPI-style query: the ticker or any of its names, multi-word names quoted. */
export function newsQuery(asset: KnownAsset): string {
  return [asset.symbol, ...asset.names].map((term) => (term.includes(' ') ? `"${term}"` : term)).join(' OR ');
}

function formatScore(score: number): string {
  return `${score > 0 ? '+' : ''}${score.toFixed(2)}`;
}

function formatIndicator(indicator: IndicatorResult): string {
  const value = indicator.kind === 'oscillator' ? indicator.value.toFixed(1) : formatPct(indicator.value);
  const detail = indicator.note ? `${indicator.signal}, ${indicator.note}` : indicator.signal;
  return `- ${indicator.name}: ${value} (${detail})`;
}

const SENTIMENT_INSIGHT: Record<Signal, string> = {
  bullish: 'Headlines lean positive; crowd optimism can fade quickly, so confirm it with price action.',
  bearish: 'Headlines lean negative; that can mean real trouble or an overreaction, so check what is driving it.',
  neutral: 'Headlines are mixed, with no clear directional bias.',
};

const TREND_CONCLUSION: Record<Signal, string> = {
  bullish: 'Momentum favors buyers; look for pullbacks rather than chasing.',
  bearish: 'Momentum favors sellers; be careful catching a falling knife.',
  neutral: 'Signals are mixed; waiting for a clearer trend is reasonable.',
};

export interface MarketHandlerSources {
  history?: PriceHistorySource | null;
  news?: NewsSource | null;
}

export class MarketHandler implements IntentHandler {
  readonly intent = 'market' as const;
  private readonly history: PriceHistorySource | null;
  private readonly news: NewsSource | null;

  constructor(
    private readonly quotes: MarketDataSource,
    sources: MarketHandlerSources = {}
  ) {
    this.history = sources.history ?? null;
    this.news = sources.news ?? null;
  }

  async process(text: string): Promise<string> {
    const asset = findAssetMention(text);
    if (!asset) {
      return MARKET_USAGE;
    }

    switch (detectMarketMode(text)) {
      case 'quote':
        return this.quote(asset);
      case 'sentiment':
        return this.sentiment(asset);
      case 'news':
        return this.headlines(asset);
      case 'trend':
        return this.trend(asset);
      case 'update':
        return this.update(asset);
    }
  }

  private async quote(asset: KnownAsset): Promise<string> {
    if (!asset.priceId) {
      return `${asset.symbol} is a stock; I only carry crypto spot prices right now.`;
    }
    return quoteLine(asset.symbol, await this.quotes.getSpotQuote(asset.priceId));
  }

  private async headlines(asset: KnownAsset): Promise<string> {
    if (!this.news) {
      return `${asset.symbol} headlines need a news API key, which is not configured.`;
    }
    const headlines = await this.news.getHeadlines(newsQuery(asset), NEWS_LIMIT);
    if (headlines.length === 0) {
      return `I found no recent headlines about ${asset.symbol}.`;
    }
    return [`Latest ${asset.symbol} headlines:`, ...headlines.slice(0, 3).map(headlineLine)].join('\n');
  }

  private async sentiment(asset: KnownAsset): Promise<string> {
    if (!this.news) {
      return `${asset.symbol} sentiment is read from news headlines, and no news API key is configured.`;
    }
    const headlines = await this.news.getHeadlines(newsQuery(asset), SENTIMENT_LIMIT);
    if (headlines.length === 0) {
      return `I found no recent headlines about ${asset.symbol} to read sentiment from.`;
    }
    const summary = summarizeHeadlines(headlines);
    return [
      `${asset.symbol} news sentiment is ${summary.label} (score ${formatScore(summary.score)} across ` +
        `${summary.headlines} headlines: ${summary.positive} positive, ${summary.negative} negative, ` +
        `${summary.neutral} neutral).`,
      SENTIMENT_INSIGHT[summary.label],
    ].join('\n');
  }

  private async trend(asset: KnownAsset): Promise<string> {
    if (!asset.priceId) {
      return `${asset.symbol} is a stock; I only carry crypto price history right now.`;
    }
    if (!this.history) {
      return `Trend analysis for ${asset.symbol} needs a price history source, which is not configured.`;
    }
    const points = await this.history.getPriceHistory(asset.priceId, TREND_DAYS);
    const snapshot = buildTrendSnapshot(points.map((point) => point.priceUsd));
    if (!snapshot) {
      return `Not enough price history for ${asset.symbol} to read a trend.`;
    }
    return [
      `${asset.symbol} trend over ${points.length} days: ${snapshot.overallBias}, last close ${formatUsd(snapshot.lastClose)}.`,
      ...snapshot.indicators.map(formatIndicator),
      `- Change over the period: ${formatPct(snapshot.changePct)}`,
      TREND_CONCLUSION[snapshot.overallBias],
    ].join('\n');
  }

  private async update(asset: KnownAsset): Promise<string> {
    if (!asset.priceId) {
      return this.headlines(asset);
    }
    const quote = await this.quotes.getSpotQuote(asset.priceId);
    const lines = [quoteLine(asset.symbol, quote)];
    if (!this.news) {
      lines.push('News is not configured, so this update covers price only.');
      return lines.join('\n');
    }

    const headlines = await this.news.getHeadlines(newsQuery(asset), SENTIMENT_LIMIT);
    const summary = summarizeHeadlines(headlines);
    const latest = headlines[0];
    lines.push(`News sentiment: ${summary.label}.`);
    lines.push(latest ? `Latest headline: ${latest.title} (${latest.source})` : 'No recent headlines found.');

    const change = quote.change24hPct ?? 0;
    if (change > 0 && summary.label === 'bullish') {
      lines.push('Price and sentiment both point up; look for pullbacks to support rather than chasing.');
    } else if (change < 0 && summary.label === 'bearish') {
      lines.push('Price and sentiment both point down; wait for a reversal before entering.');
    } else {
      lines.push('Price and sentiment disagree; wait for a clearer direction before making big moves.');
    }
    return lines.join('\n');
  }
}

function quoteLine(symbol: string, quote: SpotQuote): string {
  const change = quote.change24hPct === null ? '' : ` (${formatPct(quote.change24hPct)} over 24h)`;
  return `${symbol} is trading at ${formatUsd(quote.priceUsd)}${change}, ${describeTrend(quote.change24hPct)}.`;
}

function headlineLine(headline: NewsHeadline): string {
  return `- ${headline.title} (${headline.source}, ${headline.publishedAt.slice(0, 10)})`;
}
