import { completeWithTimeout, type ChatMessage, type LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import type { MemoryStore } from '../../memory/store.js';
import type { ConversationStateStore } from '../conversation/state_store.js';
import type { Intent } from '../intents/types.js';
import { buildSystemMessage } from '../persona.js';
import type { Requester } from '../types.js';

export interface SynthesisInput {
  requester: Requester;
  channelId: string;
  originalText: string;
  handlerOutput: string;
  intent: Intent;
}

export interface SynthesisOptions {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface ResponseSynthesizerDeps {
  llm: LlmClient | null;
  conversations: ConversationStateStore;
  memory: MemoryStore | null;
  options: SynthesisOptions;
  logger: Logger;
}

const INTENT_TOOL_NAMES: Record<Intent, string> = {
  wallet: 'wallet lookup',
  market: 'market data',
  critique: 'trade review',
  general: 'knowledge base',
};

export function buildSynthesisPrompt(input: SynthesisInput): string {
  return [
    `${input.requester.name} said: ${input.originalText}`,
    '',
    `Output from the ${INTENT_TOOL_NAMES[input.intent]} tool:`,
    input.handlerOutput,
    '',
    'Reply to them naturally using only this information. Do not contradict the tool output.',
  ].join('\n');
}

/**
 * Turns handler output into the final reply and records the exchange. Without an
 * LLM the handler output is returned unchanged.
 */
export class ResponseSynthesizer {
  constructor(private readonly deps: ResponseSynthesizerDeps) {}

  synthesize(input: SynthesisInput): Promise<string> {
    const requesterId = input.requester.id;
    return this.deps.conversations.runExclusive(requesterId, async () => {
      this.deps.conversations.refreshSystemMessage(requesterId, buildSystemMessage(this.memorySummary(requesterId)));
      const history = this.deps.conversations.history(requesterId);

      const reply = this.deps.llm ? await this.blend(this.deps.llm, history, input) : input.handlerOutput;

      this.deps.conversations.append(requesterId, 'user', input.originalText);
      this.deps.conversations.append(requesterId, 'assistant', reply);
      this.logTurn(input, reply);
      return reply;
    });
  }

  private async blend(llm: LlmClient, history: ChatMessage[], input: SynthesisInput): Promise<string> {
    try {
      const response = await completeWithTimeout(
        llm,
        [...history, { role: 'user', content: buildSynthesisPrompt(input) }],
        { maxTokens: this.deps.options.maxTokens, temperature: this.deps.options.temperature },
        this.deps.options.timeoutMs,
        'response synthesis'
      );
      const content = response.content.trim();
      return content.length > 0 ? content : input.handlerOutput;
    } catch (error) {
      this.deps.logger.warn('Response synthesis failed; sending handler output as-is', error);
      return input.handlerOutput;
    }
  }

  private memorySummary(requesterId: string): string {
    if (!this.deps.memory) return '';
    try {
      return this.deps.memory.getMemorySummary(requesterId);
    } catch (error) {
      this.deps.logger.error(`Failed to build memory summary for ${requesterId}`, error);
      return '';
    }
  }

  private logTurn(input: SynthesisInput, reply: string): void {
    if (!this.deps.memory) return;
    try {
      this.deps.memory.logConversationTurn(input.requester.id, input.channelId, input.originalText, reply);
    } catch (error) {
      this.deps.logger.error(`Failed to log conversation turn for ${input.requester.id}`, error);
    }
  }
}
