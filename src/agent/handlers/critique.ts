import { completeWithTimeout, type ChatMessage, type LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import type { TradeLedger } from '../../memory/store.js';
import type { Requester } from '../types.js';
import { formatPct, formatUsd, parseNumber } from './format.js';
import type { IntentHandler } from './types.js';

export type TradeSide = 'long' | 'short';

export interface ParsedTrade {
  symbol: string;
  side: TradeSide;
  amount: number;
  entry: number;
  exit: number | null;
  stopLoss: number | null;
  takeProfit: number | null;
}

export const CRITIQUE_USAGE =
  'Describe the trade and I will review it, e.g. "I bought ETH at 1800 and sold at 2000 with a stop loss at 1700".';

const NUMBER = String.raw`\$?(\d[\d,]*(?:\.\d+)?)`;
const SYMBOL_PATTERN =
  /\b(?:bought|sold|buy|sell|traded|long(?:ed)?|short(?:ed)?|entered|aped\s+into)\s+(?:some\s+|a\s+|my\s+)?(?:(\d+(?:\.\d+)?)\s+)?\$?([A-Za-z]{2,6})\b/gi;
const STOP_PATTERN = new RegExp(String.raw`\b(?:stop[\s-]?loss|sl|stop)(?:\s+(?:at|of|was|around))?\s+${NUMBER}`, 'i');
const TARGET_PATTERN = new RegExp(
  String.raw`\b(?:take[\s-]?profit|tp|target)(?:\s+(?:at|of|was|around))?\s+${NUMBER}`,
  'i'
);
const PRICE_PATTERN = new RegExp(String.raw`\b(?:at|for|from|to|price|entry|exit)\s+${NUMBER}`, 'gi');
const SHORT_PATTERN = /\b(short|shorted|shorting)\b/i;
const SYMBOL_STOPWORDS = new Set(['at', 'for', 'the', 'some', 'my', 'it', 'them', 'all', 'more', 'back']);

/**
 * Pulls a trade out of free text. Stop-loss and take-profit clauses are read first
 * and removed so their numbers are not mistaken for entry or exit prices.
 */
export function parseTradeDescription(text: string): ParsedTrade | null {
  const symbolMatch = Array.from(text.matchAll(SYMBOL_PATTERN)).find(
    (match) => match[2] !== undefined && !SYMBOL_STOPWORDS.has(match[2].toLowerCase())
  );
  const rawSymbol = symbolMatch?.[2];
  if (!rawSymbol) {
    return null;
  }

  const stopMatch = STOP_PATTERN.exec(text);
  const targetMatch = TARGET_PATTERN.exec(text);
  let remainder = text;
  for (const clause of [stopMatch?.[0], targetMatch?.[0]]) {
    if (clause) remainder = remainder.replace(clause, ' ');
  }

  const prices: number[] = [];
  for (const match of remainder.matchAll(PRICE_PATTERN)) {
    const value = match[1] ? parseNumber(match[1]) : null;
    if (value !== null && value > 0) prices.push(value);
  }
  const [entry, exit] = prices;
  if (entry === undefined) {
    return null;
  }

  const amount = symbolMatch?.[1] ? parseNumber(symbolMatch[1]) : null;
  return {
    symbol: rawSymbol.toUpperCase(),
    side: SHORT_PATTERN.test(text) ? 'short' : 'long',
    amount: amount ?? 1,
    entry,
    exit: exit ?? null,
    stopLoss: stopMatch?.[1] ? parseNumber(stopMatch[1]) : null,
    takeProfit: targetMatch?.[1] ? parseNumber(targetMatch[1]) : null,
  };
}

export function profitLossPct(trade: Pick<ParsedTrade, 'side' | 'entry'>, exit: number): number {
  const move = trade.side === 'long' ? exit - trade.entry : trade.entry - exit;
  return (move / trade.entry) * 100;
}

/** Reward per unit of risk, or null without both a stop and a target. */
export function riskReward(trade: ParsedTrade): number | null {
  if (trade.stopLoss === null || trade.takeProfit === null) return null;
  const risk = Math.abs(trade.entry - trade.stopLoss);
  if (risk === 0) return null;
  return Math.abs(trade.takeProfit - trade.entry) / risk;
}

export function reviewTrade(trade: ParsedTrade): string[] {
  const notes: string[] = [];

  if (trade.stopLoss === null) {
    notes.push('No stop-loss mentioned. Decide where the idea is wrong before you enter.');
  } else {
    const wrongSide = trade.side === 'long' ? trade.stopLoss >= trade.entry : trade.stopLoss <= trade.entry;
    if (wrongSide) {
      notes.push(`Your stop at ${formatUsd(trade.stopLoss)} is on the wrong side of the entry.`);
    }
    if (trade.exit !== null) {
      const blownThrough = trade.side === 'long' ? trade.exit < trade.stopLoss : trade.exit > trade.stopLoss;
      if (blownThrough) {
        notes.push('You exited beyond your stop-loss, so the loss ran past the level you planned for.');
      }
    }
  }

  const rr = riskReward(trade);
  if (rr !== null) {
    notes.push(
      rr < 1.5
        ? `Risk/reward of ${rr.toFixed(2)}:1 is thin; aim for at least 1.5:1.`
        : `Risk/reward of ${rr.toFixed(2)}:1 is healthy.`
    );
  } else if (trade.takeProfit === null) {
    notes.push('No take-profit target mentioned. Planning the exit up front keeps emotions out of it.');
  }

  if (trade.exit !== null) {
    const pct = profitLossPct(trade, trade.exit);
    if (pct > 0) {
      notes.push('Winning trade. Check whether you followed your plan or got lucky.');
    } else if (pct < 0) {
      notes.push('Losing trade. Losses are part of it; what matters is that they stay small and planned.');
    }
  }

  return notes;
}

const COACH_PROMPT =
  'You are a trading coach reviewing one trade. Give 3 to 5 specific, actionable suggestions ' +
  'about risk management, entry and exit timing, or strategy. One suggestion per line, each starting with "- ". ' +
  'No introduction and no closing remarks.';

const SUGGESTION_LINE = /^(?:[-•*]|\d+[.)])\s+(.+)$/;
const MAX_SUGGESTIONS = 5;

export function buildSuggestionPrompt(trade: ParsedTrade): ChatMessage[] {
  const pct = trade.exit !== null ? formatPct(profitLossPct(trade, trade.exit)) : 'open position';
  const rr = riskReward(trade);
  const details = [
    `Asset: ${trade.symbol}`,
    `Side: ${trade.side}`,
    `Entry: ${formatUsd(trade.entry)}`,
    `Exit: ${trade.exit !== null ? formatUsd(trade.exit) : 'not exited yet'}`,
    `Stop-loss: ${trade.stopLoss !== null ? formatUsd(trade.stopLoss) : 'not set'}`,
    `Take-profit: ${trade.takeProfit !== null ? formatUsd(trade.takeProfit) : 'not set'}`,
    `Result: ${pct}`,
    `Risk/reward: ${rr !== null ? `${rr.toFixed(2)}:1` : 'n/a'}`,
  ];
  return [
    { role: 'system', content: COACH_PROMPT },
    { role: 'user', content: details.join('\n') },
  ];
}

/** Bullet or numbered lines from a coach reply; anything else is ignored. */
export function parseSuggestions(reply: string): string[] {
  const suggestions: string[] = [];
  for (const line of reply.split('\n')) {
    const match = SUGGESTION_LINE.exec(line.trim());
    const suggestion = match?.[1]?.trim();
    if (suggestion) suggestions.push(suggestion);
  }
  return suggestions.slice(0, MAX_SUGGESTIONS);
}

/** LLM-backed suggestions appended to the rule-based review. */
export interface CritiqueCoach {
  llm: LlmClient;
  timeoutMs: number;
  logger: Logger;
}

export interface CritiqueHandlerDeps {
  ledger: TradeLedger | null;
  recordTrades: boolean;
  coach?: CritiqueCoach | null;
}

export class CritiqueHandler implements IntentHandler {
  readonly intent = 'critique' as const;

  constructor(private readonly deps: CritiqueHandlerDeps) {}

  async process(text: string, requester: Requester): Promise<string> {
    const trade = parseTradeDescription(text);
    if (!trade) {
      return CRITIQUE_USAGE;
    }

    const side = trade.side.toUpperCase();
    const lines: string[] = [];
    if (trade.exit !== null) {
      const pct = profitLossPct(trade, trade.exit);
      lines.push(
        `Trade review: ${side} ${trade.symbol}, entry ${formatUsd(trade.entry)}, exit ${formatUsd(trade.exit)}, result ${formatPct(pct)}.`
      );
    } else {
      lines.push(`Trade review: ${side} ${trade.symbol}, entry ${formatUsd(trade.entry)}, still open.`);
    }
    lines.push(...reviewTrade(trade).map((note) => `- ${note}`));

    const suggestions = await this.suggest(trade);
    if (suggestions.length > 0) {
      lines.push('Suggestions:', ...suggestions.map((suggestion) => `- ${suggestion}`));
    }

    const stats = this.record(trade, requester);
    if (stats) lines.push(stats);
    return lines.join('\n');
  }

  private async suggest(trade: ParsedTrade): Promise<string[]> {
    const coach = this.deps.coach;
    if (!coach) {
      return [];
    }
    try {
      const response = await completeWithTimeout(
        coach.llm,
        buildSuggestionPrompt(trade),
        { maxTokens: 300, temperature: 0.4 },
        coach.timeoutMs,
        'trade suggestions'
      );
      return parseSuggestions(response.content);
    } catch (error) {
      coach.logger.warn('Trade suggestions unavailable; replying with the rule-based review', error);
      return [];
    }
  }

  private record(trade: ParsedTrade, requester: Requester): string | null {
    const ledger = this.deps.ledger;
    if (!ledger || !this.deps.recordTrades) {
      return null;
    }

    if (trade.exit === null) {
      ledger.addTrade({
        requesterId: requester.id,
        tradeType: trade.side === 'long' ? 'buy' : 'sell',
        symbol: trade.symbol,
        amount: trade.amount,
        buyPrice: trade.side === 'long' ? trade.entry : null,
        sellPrice: trade.side === 'short' ? trade.entry : null,
      });
      return null;
    }

    const pct = profitLossPct(trade, trade.exit);
    const move = trade.side === 'long' ? trade.exit - trade.entry : trade.entry - trade.exit;
    ledger.addTrade({
      requesterId: requester.id,
      tradeType: 'complete',
      symbol: trade.symbol,
      amount: trade.amount,
      buyPrice: trade.side === 'long' ? trade.entry : trade.exit,
      sellPrice: trade.side === 'long' ? trade.exit : trade.entry,
      profitLoss: move * trade.amount,
      profitLossPct: pct,
    });

    const stats = ledger.getUserStats(requester.id);
    if (!stats || stats.totalTrades === 0) return null;
    return (
      `Your record: ${stats.winningTrades}/${stats.totalTrades} winners (${stats.winRate.toFixed(0)}% win rate), ` +
      `average ${formatPct(stats.averageProfitPct)}.`
    );
  }
}
