import { z } from 'zod';

import { completeWithTimeout, type LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import { isQuestionLike, isTopical } from '../intents/heuristics.js';
import type { InboundMessage } from '../types.js';

export type RespondReason =
  | 'empty'
  | 'direct'
  | 'ambient_disabled'
  | 'llm_yes'
  | 'llm_no'
  | 'llm_unparseable'
  | 'llm_failed'
  | 'heuristic_relevant'
  | 'heuristic_irrelevant';

export interface RespondDecision {
  respond: boolean;
  /** An answer to an ambient message is unsolicited and subject to the cooldown. */
  proactive: boolean;
  reason: RespondReason;
}

export interface RespondContext {
  /** Recent channel lines, oldest first, formatted as "name: text". */
  recentMessages: string[];
  /** When the bot last answered this requester in this channel, if ever. */
  lastExchangeAtMs: number | null;
}

export interface ResponseGateOptions {
  ambientReplies: boolean;
  conversationTimeoutSeconds: number;
  timeoutMs: number;
}

const DecisionSchema = z.object({ should_respond: z.boolean() });

const GATE_PROMPT = `You watch a trading community chat on behalf of a trading assistant.
Decide whether the assistant should join in on the latest message. Join only when the
message is about wallets, markets, prices or trades and a reply would clearly help.
Answer with JSON only: {"should_respond": true} or {"should_respond": false}`;

export function parseGateReply(raw: string): boolean | null {
  const match = raw.match(/\{[\s\S]*\}/);
  if (!match) return null;
  try {
    const parsed = DecisionSchema.safeParse(JSON.parse(match[0]));
    return parsed.success ? parsed.data.should_respond : null;
  } catch {
    return null;
  }
}

/**
 * Decides whether a message gets an answer at all. Never mutates state.
 */
export class ResponseDecisionGate {
  constructor(
    private readonly llm: LlmClient | null,
    private readonly options: ResponseGateOptions,
    private readonly logger: Logger
  ) {}

  async shouldRespond(message: InboundMessage, context: RespondContext): Promise<RespondDecision> {
    if (message.text.trim().length === 0) {
      return { respond: false, proactive: false, reason: 'empty' };
    }
    if (message.isDirectAddress || message.isDirectMessage) {
      return { respond: true, proactive: false, reason: 'direct' };
    }
    if (!this.options.ambientReplies) {
      return { respond: false, proactive: true, reason: 'ambient_disabled' };
    }
    if (this.llm) {
      return this.askLlm(this.llm, message, context);
    }
    return this.heuristic(message, context);
  }

  private async askLlm(
    llm: LlmClient,
    message: InboundMessage,
    context: RespondContext
  ): Promise<RespondDecision> {
    const recent = context.recentMessages.length
      ? `Recent messages:\n${context.recentMessages.join('\n')}\n\n`
      : '';
    try {
      const response = await completeWithTimeout(
        llm,
        [
          { role: 'system', content: GATE_PROMPT },
          { role: 'user', content: `${recent}Latest message from ${message.requesterName}:\n${message.text}` },
        ],
        { maxTokens: 20, temperature: 0 },
        this.options.timeoutMs,
        'respond decision'
      );
      const verdict = parseGateReply(response.content);
      if (verdict === null) {
        return { respond: false, proactive: true, reason: 'llm_unparseable' };
      }
      return { respond: verdict, proactive: true, reason: verdict ? 'llm_yes' : 'llm_no' };
    } catch (error) {
      this.logger.warn('Respond decision failed; staying silent', error);
      return { respond: false, proactive: true, reason: 'llm_failed' };
    }
  }

  private heuristic(message: InboundMessage, context: RespondContext): RespondDecision {
    const windowMs = this.options.conversationTimeoutSeconds * 1000;
    const continuing =
      context.lastExchangeAtMs !== null && message.receivedAtMs - context.lastExchangeAtMs <= windowMs;
    const relevant = isTopical(message.text) && (isQuestionLike(message.text) || continuing);
    return {
      respond: relevant,
      proactive: true,
      reason: relevant ? 'heuristic_relevant' : 'heuristic_irrelevant',
    };
  }
}
