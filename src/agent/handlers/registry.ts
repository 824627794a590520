import { INTENTS, type Intent } from '../intents/types.js';
import type { HandlerRegistry, IntentHandler } from './types.js';

export class HandlerRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerRegistryError';
  }
}

/**
 * Builds the intent → handler table. Every intent needs exactly one handler;
 * anything else is a wiring bug and throws here rather than at dispatch time.
 */
export function buildHandlerRegistry(handlers: Iterable<IntentHandler>): HandlerRegistry {
  const byIntent = new Map<Intent, IntentHandler>();
  for (const handler of handlers) {
    if (byIntent.has(handler.intent)) {
      throw new HandlerRegistryError(`Duplicate handler for intent "${handler.intent}"`);
    }
    byIntent.set(handler.intent, handler);
  }

  const missing = INTENTS.filter((intent) => !byIntent.has(intent));
  if (missing.length > 0) {
    throw new HandlerRegistryError(`Missing handler for intent(s): ${missing.join(', ')}`);
  }

  const lookup = (intent: Intent): IntentHandler => {
    const handler = byIntent.get(intent);
    if (!handler) {
      throw new HandlerRegistryError(`Missing handler for intent "${intent}"`);
    }
    return handler;
  };

  return Object.freeze({
    wallet: lookup('wallet'),
    market: lookup('market'),
    critique: lookup('critique'),
    general: lookup('general'),
  });
}
