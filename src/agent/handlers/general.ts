import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import type { Requester } from '../types.js';
import type { IntentHandler } from './types.js';

const GlossaryEntrySchema = z.object({
  term: z.string().min(1),
  aliases: z.array(z.string()),
  definition: z.string().min(1),
});

const GlossarySchema = z.object({ terms: z.array(GlossaryEntrySchema) });

export type GlossaryEntry = z.infer<typeof GlossaryEntrySchema>;

export function loadGlossary(path?: string): GlossaryEntry[] {
  const file = path ?? join(dirname(fileURLToPath(import.meta.url)), '..', 'data', 'glossary.json');
  return GlossarySchema.parse(JSON.parse(readFileSync(file, 'utf-8'))).terms;
}

const GREETING_PATTERN = /^\s*(hi|hello|hey|gm|yo|good\s+(morning|afternoon|evening))\b/i;
const HELP_PATTERN = /\b(help|what\s+can\s+you\s+do|commands?)\b/i;

export const CAPABILITIES =
  'I can look up or track EVM wallets, check crypto prices and trends, review trades you describe, ' +
  'and explain trading terms. Try "What is the price of ETH?" or "What is a stop loss?"';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class GeneralHandler implements IntentHandler {
  readonly intent = 'general' as const;
  private readonly lookups: Array<{ entry: GlossaryEntry; pattern: RegExp; length: number }>;

  constructor(glossary: GlossaryEntry[] = loadGlossary()) {
    this.lookups = glossary.flatMap((entry) =>
      [entry.term, ...entry.aliases].map((name) => ({
        entry,
        pattern: new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(name)}(?![a-z0-9])`, 'i'),
        length: name.length,
      }))
    );
  }

  /** Longest matching term wins so "stop loss" beats "loss". */
  findTerm(text: string): GlossaryEntry | null {
    let best: { entry: GlossaryEntry; length: number } | null = null;
    for (const lookup of this.lookups) {
      if (lookup.pattern.test(text) && (best === null || lookup.length > best.length)) {
        best = { entry: lookup.entry, length: lookup.length };
      }
    }
    return best?.entry ?? null;
  }

  async process(text: string, requester: Requester): Promise<string> {
    const term = this.findTerm(text);
    if (term) {
      return `${term.term.charAt(0).toUpperCase()}${term.term.slice(1)}: ${term.definition}`;
    }
    if (GREETING_PATTERN.test(text)) {
      return `Hey ${requester.name}! ${CAPABILITIES}`;
    }
    if (HELP_PATTERN.test(text)) {
      return CAPABILITIES;
    }
    return `I'm not sure about that one. ${CAPABILITIES}`;
  }
}
