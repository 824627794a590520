import type { Intent } from '../intents/types.js';
import type { Requester } from '../types.js';

export interface IntentHandler {
  readonly intent: Intent;
  /** Resolves with a user-facing answer; throws on failure. */
  process(text: string, requester: Requester): Promise<string>;
}

export type HandlerRegistry = Readonly<Record<Intent, IntentHandler>>;
