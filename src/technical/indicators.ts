import type { IndicatorResult, Signal, TrendSnapshot } from './types.js';

/** Spreads inside this band (in percent) read as neutral. */
const SPREAD_BAND_PCT = 1;

export function sma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  let total = 0;
  for (const value of values.slice(-period)) total += value;
  return total / period;
}

/**
 * Relative strength index over the last `period` changes, using simple averages
 * of gains and losses. Needs period + 1 values.
 */
export function rsi(values: number[], period = 14): number | null {
  if (period <= 0 || values.length < period + 1) return null;
  const window = values.slice(-(period + 1));
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < window.length; i += 1) {
    const current = window[i];
    const previous = window[i - 1];
    if (current === undefined || previous === undefined) continue;
    const delta = current - previous;
    if (delta > 0) gains += delta;
    else losses -= delta;
  }
  if (losses === 0) return gains === 0 ? 50 : 100;
  const rs = gains / period / (losses / period);
  return 100 - 100 / (1 + rs);
}

function spreadPct(value: number, base: number): number {
  return base === 0 ? 0 : ((value - base) / base) * 100;
}

function spreadSignal(pct: number): Signal {
  if (pct >= SPREAD_BAND_PCT) return 'bullish';
  if (pct <= -SPREAD_BAND_PCT) return 'bearish';
  return 'neutral';
}

function rsiIndicator(value: number): IndicatorResult {
  if (value >= 70) {
    return { name: 'RSI(14)', kind: 'oscillator', value, signal: 'bearish', note: 'overbought' };
  }
  if (value <= 30) {
    return { name: 'RSI(14)', kind: 'oscillator', value, signal: 'bullish', note: 'oversold' };
  }
  return { name: 'RSI(14)', kind: 'oscillator', value, signal: 'neutral', note: null };
}

/** Daily closes, oldest first. Null when there are too few to compute RSI(14). */
export function buildTrendSnapshot(closes: number[]): TrendSnapshot | null {
  const first = closes[0];
  const lastClose = closes.at(-1);
  const sma7 = sma(closes, 7);
  const rsi14 = rsi(closes, 14);
  if (first === undefined || lastClose === undefined || sma7 === null || rsi14 === null) {
    return null;
  }
  const sma30 = sma(closes, 30);

  const indicators: IndicatorResult[] = [];
  const priceSpread = spreadPct(lastClose, sma7);
  indicators.push({
    name: 'Price vs 7-day average',
    kind: 'spread',
    value: priceSpread,
    signal: spreadSignal(priceSpread),
    note: null,
  });
  if (sma30 !== null) {
    const averageSpread = spreadPct(sma7, sma30);
    indicators.push({
      name: '7-day vs 30-day average',
      kind: 'spread',
      value: averageSpread,
      signal: spreadSignal(averageSpread),
      note: null,
    });
  }
  indicators.push(rsiIndicator(rsi14));

  let score = 0;
  for (const indicator of indicators) {
    if (indicator.signal === 'bullish') score += 1;
    if (indicator.signal === 'bearish') score -= 1;
  }

  return {
    lastClose,
    sma7,
    sma30,
    rsi14,
    changePct: spreadPct(lastClose, first),
    indicators,
    overallBias: score > 0 ? 'bullish' : score < 0 ? 'bearish' : 'neutral',
  };
}
