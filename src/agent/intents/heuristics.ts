/**
 * Keyword intent detection
 *
 * Deterministic fallback used when no LLM is configured or the LLM call fails.
 * Total: any string, including empty, maps to an intent.
 */

import { findAssetMention } from '../assets.js';
import type { Intent } from './types.js';

export interface HeuristicIntentResult {
  intent: Intent;
  confidence: number;
  signals: string[];
}

export const EVM_ADDRESS_PATTERN = /\b0x[a-fA-F0-9]{40}\b/;

const TRADE_VERB_PATTERN = /\b(bought|sold|buy|sell|long|short|longed|shorted|entered|exited|closed)\b/i;
const PRICE_PATTERN = /\$?\b\d[\d,]*(?:\.\d+)?\b/g;

const MARKET_PATTERNS = [
  /\b(price|worth|value|cost|how\s+much)\b/i,
  /\b(sentiment|bullish|bearish|fear|greed|mood)\b/i,
  /\b(news|headlines?|announcements?)\b/i,
  /\b(chart|trend|trending|technicals?|rsi|momentum|volume|market\s+cap|pump(ing)?|dump(ing)?|rally|rallying|crash(ing)?)\b/i,
  /\bmarket\s+(update|overview|conditions?)\b/i,
];

const PRICE_OF_PATTERN = /\bprice\s+of\b/i;

const WALLET_PATTERNS = [
  /\b(wallet|wallets|address|balance|holdings)\b/i,
  /\btrack(ing)?\s+(a\s+|my\s+|this\s+)?(wallet|address)\b/i,
];

const REVIEW_PATTERNS = [
  /\b(critique|review|rate|grade|feedback\s+on)\b.*\b(trade|entry|exit|position|setup)\b/i,
  /\b(my\s+(last\s+)?trade|stop[\s-]?loss|take[\s-]?profit|risk\s*\/?\s*reward)\b/i,
  /\bhow\s+did\s+i\s+do\b/i,
];

function countPrices(text: string): number {
  return text.match(PRICE_PATTERN)?.length ?? 0;
}

export function isQuestionLike(text: string): boolean {
  return /\?\s*$/.test(text) || /^\s*(what|how|why|where|when|which|is|are|will|should|can)\b/i.test(text);
}

/**
 * Detect the intent from a user message. Checks run in priority order and the
 * first hit wins.
 */
export function detectIntent(message: string): HeuristicIntentResult {
  const text = message.trim();
  if (!text) {
    return { intent: 'general', confidence: 0.5, signals: ['empty message'] };
  }

  if (EVM_ADDRESS_PATTERN.test(text)) {
    return { intent: 'wallet', confidence: 0.95, signals: ['evm address'] };
  }

  if (TRADE_VERB_PATTERN.test(text) && countPrices(text) >= 2) {
    return { intent: 'critique', confidence: 0.85, signals: ['trade verb with two prices'] };
  }

  const asset = findAssetMention(text);
  if (asset && PRICE_OF_PATTERN.test(text)) {
    return { intent: 'market', confidence: 0.9, signals: [`price of ${asset.symbol}`] };
  }
  for (const pattern of MARKET_PATTERNS) {
    if (pattern.test(text)) {
      return { intent: 'market', confidence: 0.8, signals: [`market pattern: ${pattern.source}`] };
    }
  }
  if (asset && isQuestionLike(text)) {
    return { intent: 'market', confidence: 0.7, signals: [`question about ${asset.symbol}`] };
  }

  for (const pattern of WALLET_PATTERNS) {
    if (pattern.test(text)) {
      return { intent: 'wallet', confidence: 0.7, signals: [`wallet pattern: ${pattern.source}`] };
    }
  }

  for (const pattern of REVIEW_PATTERNS) {
    if (pattern.test(text)) {
      return { intent: 'critique', confidence: 0.7, signals: [`review pattern: ${pattern.source}`] };
    }
  }

  return { intent: 'general', confidence: 0.5, signals: ['default: no specific intent detected'] };
}

/** True when the text mentions anything the assistant can help with. */
export function isTopical(message: string): boolean {
  if (findAssetMention(message)) return true;
  return detectIntent(message).intent !== 'general';
}
