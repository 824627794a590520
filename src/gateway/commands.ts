import { formatPct } from '../agent/handlers/format.js';
import type { MemoryStore, TradeLedger } from '../memory/store.js';

export type GatewayCommand =
  | { kind: 'help' }
  | { kind: 'reset' }
  | { kind: 'stats' }
  | { kind: 'forget'; topic: string }
  | { kind: 'forget_all' }
  | { kind: 'remember'; topic: string; content: string }
  | { kind: 'invalid'; name: string; usage: string }
  | { kind: 'unknown'; name: string };

/**
 * Parses a prefixed command such as "/tm reset". Returns null when the text is not
 * a command at all.
 */
export function parseCommand(text: string, prefix: string): GatewayCommand | null {
  const trimmed = text.trim();
  const bare = prefix.trim().toLowerCase();
  if (trimmed.toLowerCase() === bare) {
    return { kind: 'help' };
  }
  if (!trimmed.toLowerCase().startsWith(prefix.toLowerCase())) {
    return null;
  }

  const body = trimmed.slice(prefix.length).trim();
  const [rawName = '', ...restParts] = body.split(/\s+/);
  const name = rawName.toLowerCase();
  const rest = body.slice(rawName.length).trim();

  switch (name) {
    case '':
    case 'help':
      return { kind: 'help' };
    case 'reset':
      return { kind: 'reset' };
    case 'stats':
      return { kind: 'stats' };
    case 'forget-all':
      return { kind: 'forget_all' };
    case 'forget':
      if (restParts.length === 0) {
        return { kind: 'invalid', name, usage: `${prefix}forget <topic>` };
      }
      if (rest.toLowerCase() === 'all' || rest.toLowerCase() === 'everything') {
        return { kind: 'forget_all' };
      }
      return { kind: 'forget', topic: rest };
    case 'remember': {
      const separator = rest.indexOf(':');
      const topic = separator > 0 ? rest.slice(0, separator).trim() : '';
      const content = separator > 0 ? rest.slice(separator + 1).trim() : '';
      if (!topic || !content) {
        return { kind: 'invalid', name, usage: `${prefix}remember <topic>: <content>` };
      }
      return { kind: 'remember', topic, content };
    }
    default:
      return { kind: 'unknown', name };
  }
}

export function formatCommandHelp(prefix: string): string {
  return [
    'Commands:',
    `${prefix}help - show this message`,
    `${prefix}reset - clear our conversation history`,
    `${prefix}stats - show your recorded trading stats`,
    `${prefix}remember <topic>: <content> - save a fact about you`,
    `${prefix}forget <topic> - forget what I stored about a topic`,
    `${prefix}forget-all - forget everything I know about you`,
  ].join('\n');
}

export interface CommandContext {
  prefix: string;
  requesterId: string;
  resetConversation: (requesterId: string) => boolean;
  memory: MemoryStore | null;
  ledger: TradeLedger | null;
}

const MEMORY_OFF = 'Memory is turned off, so there is nothing stored about you.';

export function executeCommand(command: GatewayCommand, ctx: CommandContext): string {
  switch (command.kind) {
    case 'help':
      return formatCommandHelp(ctx.prefix);
    case 'reset':
      ctx.resetConversation(ctx.requesterId);
      return 'Conversation history has been reset.';
    case 'stats': {
      const stats = ctx.ledger?.getUserStats(ctx.requesterId) ?? null;
      if (!stats || stats.totalTrades === 0) {
        return 'No completed trades recorded yet. Describe a trade with an entry and exit and I will log it.';
      }
      return [
        `Trades: ${stats.totalTrades} (${stats.winningTrades} winners, ${stats.winRate.toFixed(1)}% win rate)`,
        `Average result: ${formatPct(stats.averageProfitPct)}`,
        `Largest win: ${formatPct(stats.largestWinPct)}`,
        `Largest loss: ${formatPct(stats.largestLossPct)}`,
      ].join('\n');
    }
    case 'forget': {
      if (!ctx.memory) return MEMORY_OFF;
      const removed = ctx.memory.deleteMemoriesByTopic(ctx.requesterId, command.topic);
      return removed > 0
        ? `Forgot ${removed} item(s) about "${command.topic}".`
        : `I had nothing stored about "${command.topic}".`;
    }
    case 'forget_all':
      if (!ctx.memory) return MEMORY_OFF;
      ctx.memory.deleteAllMemories(ctx.requesterId);
      ctx.resetConversation(ctx.requesterId);
      return 'Everything I remembered about you has been deleted.';
    case 'remember':
      if (!ctx.memory) return MEMORY_OFF;
      ctx.memory.addMemory({
        requesterId: ctx.requesterId,
        kind: 'fact',
        topic: command.topic,
        content: command.content,
      });
      return `Got it, I'll remember that about ${command.topic}.`;
    case 'invalid':
      return `Usage: ${command.usage}`;
    case 'unknown':
      return `Unknown command "${command.name}".\n${formatCommandHelp(ctx.prefix)}`;
  }
}
