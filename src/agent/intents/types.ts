export const INTENTS = ['wallet', 'market', 'critique', 'general'] as const;

export type Intent = (typeof INTENTS)[number];

export type ClassificationSource = 'llm' | 'heuristic' | 'coerced';

export interface IntentClassification {
  intent: Intent;
  /** Always within [0, 1]. */
  confidence: number;
  source: ClassificationSource;
  signals: string[];
}

export function isIntent(value: string): value is Intent {
  return INTENTS.some((intent) => intent === value);
}
