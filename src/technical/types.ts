export type Signal = 'bullish' | 'bearish' | 'neutral';

export interface IndicatorResult {
  name: string;
  /** Percent spread for comparisons, index level for oscillators. */
  kind: 'spread' | 'oscillator';
  value: number;
  signal: Signal;
  note: string | null;
}

export interface TrendSnapshot {
  lastClose: number;
  sma7: number;
  sma30: number | null;
  rsi14: number;
  changePct: number;
  indicators: IndicatorResult[];
  overallBias: Signal;
}

export interface HeadlineSentiment {
  score: number;
  label: Signal;
  headlines: number;
  positive: number;
  negative: number;
  neutral: number;
}
