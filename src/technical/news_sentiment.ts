import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import type { NewsHeadline } from '../data/news.js';
import type { HeadlineSentiment, Signal } from './types.js';

const WordListSchema = z.object({
  positive: z.array(z.string()),
  negative: z.array(z.string()),
});

let lexicon: { positive: Set<string>; negative: Set<string> } | null = null;

function loadLexicon(): { positive: Set<string>; negative: Set<string> } {
  if (lexicon) return lexicon;
  const here = dirname(fileURLToPath(import.meta.url));
  const raw = readFileSync(join(here, 'data', 'sentiment_words.json'), 'utf-8');
  const words = WordListSchema.parse(JSON.parse(raw));
  lexicon = { positive: new Set(words.positive), negative: new Set(words.negative) };
  return lexicon;
}

/** Net positive minus negative word count, scaled by length (capped at 50 tokens). */
export function scoreSentiment(text: string): number {
  const { positive, negative } = loadLexicon();
  const tokens = text.toLowerCase().split(/\W+/).filter(Boolean);
  if (tokens.length === 0) return 0;
  let score = 0;
  for (const token of tokens) {
    if (positive.has(token)) score += 1;
    if (negative.has(token)) score -= 1;
  }
  return score / Math.min(tokens.length, 50);
}

export function describeSentiment(score: number): Signal {
  if (score > 0.05) return 'bullish';
  if (score < -0.05) return 'bearish';
  return 'neutral';
}

export function summarizeHeadlines(headlines: NewsHeadline[]): HeadlineSentiment {
  let total = 0;
  let positive = 0;
  let negative = 0;
  for (const headline of headlines) {
    const score = scoreSentiment(`${headline.title} ${headline.description ?? ''}`);
    total += score;
    if (score > 0) positive += 1;
    else if (score < 0) negative += 1;
  }
  const score = headlines.length === 0 ? 0 : total / headlines.length;
  return {
    score,
    label: describeSentiment(score),
    headlines: headlines.length,
    positive,
    negative,
    neutral: headlines.length - positive - negative,
  };
}
