import { afterEach, describe, expect, it, vi } from 'vitest';

import { IntentClassifier, parseClassifierReply } from '../../src/agent/intents/classifier.js';
import type { ChatMessage, LlmClient, LlmCompletionOptions } from '../../src/core/llm.js';
import { Logger } from '../../src/core/logger.js';

const logger = new Logger('error');
const options = { timeoutMs: 50, maxTokens: 20 };

function stubLlm(reply: (messages: ChatMessage[], opts?: LlmCompletionOptions) => Promise<string>) {
  const complete = vi.fn(async (messages: ChatMessage[], opts?: LlmCompletionOptions) => ({
    content: await reply(messages, opts),
    model: 'stub',
  }));
  return { model: 'stub', complete };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseClassifierReply', () => {
  it('parses label and confidence', () => {
    expect(parseClassifierReply('market|0.92')).toEqual({
      intent: 'market',
      confidence: 0.92,
      source: 'llm',
      signals: ['llm label: market'],
    });
  });

  it('tolerates case, whitespace, markup and trailing lines', () => {
    expect(parseClassifierReply('  **Wallet** | 0.8 \nbecause it has an address')).toMatchObject({
      intent: 'wallet',
      confidence: 0.8,
      source: 'llm',
    });
  });

  it('clamps confidence into [0, 1]', () => {
    expect(parseClassifierReply('critique|1.7').confidence).toBe(1);
    expect(parseClassifierReply('critique|-3').confidence).toBe(0);
  });

  it('keeps a valid label with an unreadable confidence', () => {
    expect(parseClassifierReply('general|high')).toMatchObject({ intent: 'general', confidence: 0.7, source: 'llm' });
  });

  it('maps legacy labels', () => {
    expect(parseClassifierReply('track_wallet|0.9').intent).toBe('wallet');
    expect(parseClassifierReply('market_trend|0.9').intent).toBe('market');
    expect(parseClassifierReply('trade_critique|0.9').intent).toBe('critique');
  });

  it.each(['banana|0.9', 'market', 'market|0.9|extra', ''])('coerces %j to general', (raw) => {
    expect(parseClassifierReply(raw)).toMatchObject({ intent: 'general', confidence: 0.7, source: 'coerced' });
  });
});

describe('IntentClassifier', () => {
  it('uses keyword detection without an llm', async () => {
    const classifier = new IntentClassifier(null, options, logger);
    await expect(classifier.classify("What's BTC doing?")).resolves.toMatchObject({
      intent: 'market',
      confidence: 0.7,
      source: 'heuristic',
    });
  });

  it('uses the llm label when available and passes recent history', async () => {
    const llm = stubLlm(async () => 'wallet|0.9');
    const classifier = new IntentClassifier(llm, options, logger);

    const result = await classifier.classify('and that one?', {
      history: [
        { role: 'system', content: 'persona' },
        { role: 'user', content: 'track my wallet' },
        { role: 'assistant', content: 'Now tracking it.' },
      ],
    });

    expect(result).toMatchObject({ intent: 'wallet', confidence: 0.9, source: 'llm' });
    const [messages, opts] = llm.complete.mock.calls[0] ?? [];
    expect(opts).toMatchObject({ maxTokens: 20, temperature: 0 });
    expect(messages?.[1]).toEqual({
      role: 'user',
      content: 'Recent conversation:\nuser: track my wallet\nassistant: Now tracking it.\n\nMessage to classify:\nand that one?',
    });
  });

  it('falls back to keywords when the llm fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const llm = stubLlm(async () => {
      throw new Error('provider down');
    });
    const classifier = new IntentClassifier(llm, options, new Logger('warn'));

    await expect(classifier.classify('I bought ETH at 1800 and sold at 2000')).resolves.toMatchObject({
      intent: 'critique',
      source: 'heuristic',
    });
  });

  it('falls back to keywords when the llm times out', async () => {
    const llm: LlmClient = { model: 'stub', complete: () => new Promise(() => {}) };
    const classifier = new IntentClassifier(llm, { timeoutMs: 10, maxTokens: 20 }, logger);

    await expect(classifier.classify('show my wallets')).resolves.toMatchObject({
      intent: 'wallet',
      source: 'heuristic',
    });
  });

  it('does not call the llm for empty text', async () => {
    const llm = stubLlm(async () => 'market|0.9');
    const classifier = new IntentClassifier(llm, options, logger);

    await expect(classifier.classify('   ')).resolves.toMatchObject({ intent: 'general', source: 'heuristic' });
    expect(llm.complete).not.toHaveBeenCalled();
  });
});
