import { FALLBACK_REPLY, type WorkflowOrchestrator } from '../agent/orchestrator/workflow.js';
import type { Logger } from '../core/logger.js';
import type { ChatTransport, IncomingChatMessage, IncomingMessageHandler } from '../interface/types.js';
import type { MemoryStore, TradeLedger } from '../memory/store.js';
import { executeCommand, parseCommand } from './commands.js';

export interface IncomingHandlerDeps {
  transport: ChatTransport;
  orchestrator: WorkflowOrchestrator;
  memory: MemoryStore | null;
  ledger: TradeLedger | null;
  commandPrefix: string;
  typingDelayMaxMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Roughly 10ms per character, capped, so long replies do not appear instantly. */
export function typingDelayMs(text: string, maxMs: number): number {
  return Math.min(text.length * 10, Math.max(0, maxMs));
}

export function createIncomingHandler(deps: IncomingHandlerDeps): IncomingMessageHandler {
  const pause = deps.sleep ?? sleep;

  async function reply(message: IncomingChatMessage, text: string, label: string): Promise<void> {
    try {
      await deps.transport.send(message.channelId, text);
      deps.logger.info(`${deps.transport.name} ${label} sent to ${message.channelId}`);
    } catch (error) {
      deps.logger.error(`${deps.transport.name} ${label} failed for ${message.channelId}`, error);
    }
  }

  async function answer(message: IncomingChatMessage): Promise<string | null> {
    const outcome = await deps.orchestrator.handle(message);
    if (outcome.text === null) {
      deps.logger.debug(`No reply for ${message.id}: ${outcome.suppressedBy ?? 'unknown'}`);
      return null;
    }
    await pause(typingDelayMs(outcome.text, deps.typingDelayMaxMs));
    return outcome.text;
  }

  return async (message) => {
    const command = parseCommand(message.text, deps.commandPrefix);
    if (command) {
      let text: string;
      try {
        text = executeCommand(command, {
          prefix: deps.commandPrefix,
          requesterId: message.requesterId,
          resetConversation: (id) => deps.orchestrator.reset(id),
          memory: deps.memory,
          ledger: deps.ledger,
        });
      } catch (error) {
        deps.logger.error(`Command ${command.kind} failed for ${message.requesterId}`, error);
        text = FALLBACK_REPLY;
      }
      await reply(message, text, `${command.kind} command`);
      return;
    }

    const direct = message.isDirectAddress || message.isDirectMessage;
    const text =
      direct && deps.transport.withTyping
        ? await deps.transport.withTyping(message.channelId, () => answer(message))
        : await answer(message);
    if (text !== null) {
      await reply(message, text, 'reply');
    }
  };
}
