/**
 * Workflow Orchestrator
 *
 * Sequences one inbound message through the routing pipeline:
 * RECEIVED → DECIDE_RESPOND → (SUPPRESSED | CLASSIFY → DISPATCH → SYNTHESIZE → EMIT | SUPPRESSED)
 *
 * Classification, dispatch and synthesis run before the proactive cooldown is
 * consulted; the cooldown only gates emission.
 */

import { EventEmitter } from 'eventemitter3';

import type { Logger } from '../../core/logger.js';
import type { MemoryStore } from '../../memory/store.js';
import type { ChannelContext } from '../conversation/channel_context.js';
import type { ConversationStateStore } from '../conversation/state_store.js';
import type { DispatchExecutor, HandlerFailure } from '../dispatch/executor.js';
import type { RespondDecision, ResponseDecisionGate } from '../gate/respond_gate.js';
import type { IntentClassifier } from '../intents/classifier.js';
import type { IntentClassification } from '../intents/types.js';
import type { ProactiveCooldownGate } from '../proactive/cooldown.js';
import type { ResponseSynthesizer } from '../synthesis/synthesizer.js';
import { requesterOf, type InboundMessage } from '../types.js';

export const FALLBACK_REPLY = "Sorry, I couldn't handle that request right now. Please try again in a moment.";

export type WorkflowState =
  | 'RECEIVED'
  | 'DECIDE_RESPOND'
  | 'SUPPRESSED'
  | 'CLASSIFY'
  | 'DISPATCH'
  | 'SYNTHESIZE'
  | 'EMIT';

export type SuppressionReason = 'not_responding' | 'cooldown';

export interface WorkflowOutcome {
  text: string | null;
  isProactive: boolean;
  trail: WorkflowState[];
  decision: RespondDecision | null;
  classification: IntentClassification | null;
  suppressedBy: SuppressionReason | null;
  failure: HandlerFailure | null;
}

export interface WorkflowEvents {
  turn: (outcome: WorkflowOutcome, message: InboundMessage) => void;
  suppressed: (reason: SuppressionReason, message: InboundMessage) => void;
  handler_failed: (failure: HandlerFailure, message: InboundMessage) => void;
}

export interface WorkflowDeps {
  gate: ResponseDecisionGate;
  classifier: IntentClassifier;
  executor: DispatchExecutor;
  synthesizer: ResponseSynthesizer;
  cooldown: ProactiveCooldownGate;
  conversations: ConversationStateStore;
  channels: ChannelContext;
  memory: MemoryStore | null;
  logger: Logger;
  now?: () => number;
}

export class WorkflowOrchestrator extends EventEmitter<WorkflowEvents> {
  private readonly now: () => number;

  constructor(private readonly deps: WorkflowDeps) {
    super();
    this.now = deps.now ?? Date.now;
  }

  async handle(message: InboundMessage): Promise<WorkflowOutcome> {
    const outcome: WorkflowOutcome = {
      text: null,
      isProactive: false,
      trail: ['RECEIVED'],
      decision: null,
      classification: null,
      suppressedBy: null,
      failure: null,
    };

    try {
      await this.run(message, outcome);
    } catch (error) {
      this.deps.logger.error(`Unexpected failure handling message ${message.id}`, error);
      outcome.text = FALLBACK_REPLY;
      outcome.isProactive = false;
      outcome.suppressedBy = null;
      outcome.trail.push('EMIT');
    }

    this.emit('turn', outcome, message);
    return outcome;
  }

  /** Clears the requester's conversation. True when there was one. */
  reset(requesterId: string): boolean {
    return this.deps.conversations.reset(requesterId);
  }

  private async run(message: InboundMessage, outcome: WorkflowOutcome): Promise<void> {
    const { gate, classifier, executor, synthesizer, cooldown, conversations, channels } = this.deps;
    const requester = requesterOf(message);

    outcome.trail.push('DECIDE_RESPOND');
    const context = {
      recentMessages: channels.recent(message.channelId),
      lastExchangeAtMs: channels.lastExchangeAt(message.channelId, message.requesterId),
    };
    channels.record(message.channelId, message.requesterName, message.text);

    const decision = await gate.shouldRespond(message, context);
    outcome.decision = decision;
    if (!decision.respond) {
      this.suppress(outcome, 'not_responding', message);
      return;
    }

    this.touchProfile(message);

    outcome.trail.push('CLASSIFY');
    const classification = await classifier.classify(message.text, {
      history: conversations.history(message.requesterId),
    });
    outcome.classification = classification;
    this.deps.logger.debug(
      `Classified ${message.id} as ${classification.intent} (${classification.confidence.toFixed(2)}, ${classification.source})`
    );

    outcome.trail.push('DISPATCH');
    const result = await executor.execute(classification.intent, message.text, requester);
    if (!result.ok) {
      outcome.failure = result.error;
      this.emit('handler_failed', result.error, message);
      outcome.text = FALLBACK_REPLY;
      outcome.isProactive = false;
      outcome.trail.push('EMIT');
      return;
    }

    outcome.trail.push('SYNTHESIZE');
    const reply = await synthesizer.synthesize({
      requester,
      channelId: message.channelId,
      originalText: message.text,
      handlerOutput: result.value,
      intent: classification.intent,
    });

    const nowMs = this.now();
    if (decision.proactive) {
      const slot = cooldown.tryAcquire(message.channelId, nowMs);
      if (!slot.allowed) {
        outcome.isProactive = false;
        this.suppress(outcome, 'cooldown', message);
        return;
      }
    }

    channels.markExchange(message.channelId, message.requesterId, nowMs);
    outcome.text = reply;
    outcome.isProactive = decision.proactive;
    outcome.trail.push('EMIT');
  }

  private suppress(outcome: WorkflowOutcome, reason: SuppressionReason, message: InboundMessage): void {
    outcome.trail.push('SUPPRESSED');
    outcome.suppressedBy = reason;
    outcome.text = null;
    this.emit('suppressed', reason, message);
  }

  private touchProfile(message: InboundMessage): void {
    if (!this.deps.memory) return;
    try {
      this.deps.memory.getProfile(message.requesterId, message.requesterName);
    } catch (error) {
      this.deps.logger.error(`Failed to update profile for ${message.requesterId}`, error);
    }
  }
}
