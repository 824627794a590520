import type { Intent } from '../intents/types.js';
import type { IntentHandler } from './types.js';

const FEATURE_NAMES: Record<Intent, string> = {
  wallet: 'Wallet lookup',
  market: 'Market analysis',
  critique: 'Trade review',
  general: 'General help',
};

/** Stands in for a handler switched off in config. */
export class DisabledHandler implements IntentHandler {
  constructor(readonly intent: Intent) {}

  async process(): Promise<string> {
    return `${FEATURE_NAMES[this.intent]} is currently disabled.`;
  }
}
