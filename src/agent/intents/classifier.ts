import { completeWithTimeout, type ChatMessage, type LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import { detectIntent } from './heuristics.js';
import { isIntent, type Intent, type IntentClassification } from './types.js';

const COERCED_CONFIDENCE = 0.7;

const LEGACY_LABELS: Record<string, Intent> = {
  track_wallet: 'wallet',
  market_trend: 'market',
  trade_critique: 'critique',
};

const CLASSIFIER_PROMPT = `You route messages for a trading assistant. Classify the user's message into exactly one category:
- wallet: looking up, tracking or asking about a crypto wallet address or balance
- market: prices, trends, sentiment or news for a coin or stock
- critique: describing or asking for feedback on a trade they made
- general: anything else, including trading concepts and small talk

Reply with one line in the form label|confidence, for example: market|0.92`;

export interface IntentClassifierOptions {
  timeoutMs: number;
  maxTokens: number;
}

export interface ClassifyContext {
  /** Recent conversation, oldest first, used to disambiguate follow-ups. */
  history?: ChatMessage[];
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return COERCED_CONFIDENCE;
  return Math.min(1, Math.max(0, value));
}

/**
 * Parses a `label|confidence` reply. Unknown labels or a wrong shape coerce to
 * general at 0.7; a valid label with an unreadable confidence keeps the label.
 */
export function parseClassifierReply(raw: string): IntentClassification {
  const line = raw.trim().split(/\r?\n/)[0] ?? '';
  const parts = line.split('|').map((part) => part.trim());
  if (parts.length !== 2) {
    return {
      intent: 'general',
      confidence: COERCED_CONFIDENCE,
      source: 'coerced',
      signals: [`malformed reply: ${line.slice(0, 60)}`],
    };
  }

  const [rawLabel = '', rawConfidence = ''] = parts;
  const label = rawLabel.toLowerCase().replace(/[^a-z_]/g, '');
  const intent = isIntent(label) ? label : LEGACY_LABELS[label];
  if (!intent) {
    return {
      intent: 'general',
      confidence: COERCED_CONFIDENCE,
      source: 'coerced',
      signals: [`unknown label: ${rawLabel}`],
    };
  }

  const parsed = Number.parseFloat(rawConfidence);
  return {
    intent,
    confidence: Number.isNaN(parsed) ? COERCED_CONFIDENCE : clampConfidence(parsed),
    source: 'llm',
    signals: [`llm label: ${label}`],
  };
}

export class IntentClassifier {
  constructor(
    private readonly llm: LlmClient | null,
    private readonly options: IntentClassifierOptions,
    private readonly logger: Logger
  ) {}

  async classify(text: string, context: ClassifyContext = {}): Promise<IntentClassification> {
    if (!this.llm || text.trim().length === 0) {
      return this.fallback(text);
    }

    const recent = (context.history ?? [])
      .filter((message) => message.role !== 'system')
      .slice(-4)
      .map((message) => `${message.role}: ${message.content}`)
      .join('\n');
    const userContent = recent
      ? `Recent conversation:\n${recent}\n\nMessage to classify:\n${text}`
      : text;

    try {
      const response = await completeWithTimeout(
        this.llm,
        [
          { role: 'system', content: CLASSIFIER_PROMPT },
          { role: 'user', content: userContent },
        ],
        { maxTokens: this.options.maxTokens, temperature: 0 },
        this.options.timeoutMs,
        'intent classification'
      );
      return parseClassifierReply(response.content);
    } catch (error) {
      this.logger.warn('Intent classification failed; using keyword fallback', error);
      return this.fallback(text);
    }
  }

  private fallback(text: string): IntentClassification {
    const detected = detectIntent(text);
    return {
      intent: detected.intent,
      confidence: detected.confidence,
      source: 'heuristic',
      signals: detected.signals,
    };
  }
}
