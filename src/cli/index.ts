#!/usr/bin/env node
/**
 * Tradewatch CLI
 *
 * Local chat, one-shot questions, and direct access to stored memory and trades.
 */

import 'dotenv/config';
import { userInfo } from 'node:os';

import { Command, InvalidArgumentError } from 'commander';
import inquirer from 'inquirer';
import { ZodError } from 'zod';

import { VERSION } from '../index.js';
import { Tradewatch } from '../core/agent.js';
import { getDefaultConfigPath, loadConfig, type TradewatchConfig } from '../core/config.js';
import { createLoggerFromEnv } from '../core/logger.js';
import { installConsoleFileMirrorFromEnv } from '../core/unified-logging.js';
import { formatPct, formatUsd } from '../agent/handlers/format.js';
import { ConsoleTransport } from '../interface/console.js';
import { resolveDbPath } from '../memory/db.js';
import { isMemoryKind, MEMORY_KINDS, type MemoryKind } from '../memory/memories.js';
import { SqliteMemoryStore, SqliteTradeLedger } from '../memory/store.js';
import { isTradeType, TRADE_TYPES, type TradeType } from '../memory/trades.js';

installConsoleFileMirrorFromEnv();
const logger = createLoggerFromEnv();

let cachedConfig: TradewatchConfig | null = null;
function getConfig(): TradewatchConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

function openMemoryStore(): SqliteMemoryStore {
  const config = getConfig();
  return new SqliteMemoryStore({ dbPath: config.memory.dbPath, maxSummaryItems: config.memory.maxSummaryItems });
}

function openTradeLedger(): SqliteTradeLedger {
  return new SqliteTradeLedger({ dbPath: getConfig().memory.dbPath });
}

function defaultUser(): string {
  return process.env.TRADEWATCH_USER ?? userInfo().username;
}

function requesterIdFor(user: string): string {
  return `console:${user}`;
}

function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseKindOption(value: string): MemoryKind {
  if (!isMemoryKind(value)) {
    throw new InvalidArgumentError(`Expected one of: ${MEMORY_KINDS.join(', ')}`);
  }
  return value;
}

function parseTradeTypeOption(value: string): TradeType {
  if (!isTradeType(value)) {
    throw new InvalidArgumentError(`Expected one of: ${TRADE_TYPES.join(', ')}`);
  }
  return value;
}

const program = new Command();

program
  .name('tradewatch')
  .description('Trading community assistant')
  .version(VERSION);

// ============================================================================
// Conversation
// ============================================================================

program
  .command('chat')
  .description('Chat with the assistant in the terminal')
  .option('-u, --user <name>', 'Name to chat as', defaultUser())
  .action(async (options: { user: string }) => {
    const tradewatch = new Tradewatch(getConfig(), { logger });
    console.log('Type "exit" to leave. Commands start with the configured prefix, e.g. "/tm help".');
    await tradewatch.start(
      new ConsoleTransport({ requesterId: requesterIdFor(options.user), requesterName: options.user })
    );
    await tradewatch.stop();
  });

program
  .command('ask')
  .description('Ask a single question and print the reply')
  .argument('<text...>', 'Message text')
  .option('-u, --user <name>', 'Name to ask as', defaultUser())
  .option('-v, --verbose', 'Show routing details')
  .action(async (words: string[], options: { user: string; verbose?: boolean }) => {
    const tradewatch = new Tradewatch(getConfig(), { logger });
    const outcome = await tradewatch.handle({
      id: `cli-${Date.now()}`,
      text: words.join(' '),
      requesterId: requesterIdFor(options.user),
      requesterName: options.user,
      channelId: 'cli',
      channelName: 'cli',
      isDirectAddress: true,
      isDirectMessage: true,
      receivedAtMs: Date.now(),
    });
    if (options.verbose) {
      const classification = outcome.classification;
      console.log(`Path: ${outcome.trail.join(' → ')}`);
      if (classification) {
        console.log(
          `Intent: ${classification.intent} (${classification.confidence.toFixed(2)}, ${classification.source})`
        );
      }
    }
    console.log(outcome.text ?? '(no reply)');
    await tradewatch.stop();
  });

// ============================================================================
// Memory
// ============================================================================

const memory = program.command('memory').description('Inspect and edit stored memory');

memory
  .command('list')
  .description('List stored memories')
  .option('-u, --user <name>', 'User name', defaultUser())
  .option('-k, --kind <kind>', 'Only one kind of memory', parseKindOption)
  .action((options: { user: string; kind?: MemoryKind }) => {
    const store = openMemoryStore();
    const items = store.getMemories(requesterIdFor(options.user), options.kind);
    if (items.length === 0) {
      console.log('No memories stored.');
      return;
    }
    for (const item of items) {
      console.log(`[${item.kind}] ${item.topic}: ${item.content} (updated ${item.updatedAt})`);
    }
  });

memory
  .command('summary')
  .description('Show the context summary used in conversations')
  .option('-u, --user <name>', 'User name', defaultUser())
  .action((options: { user: string }) => {
    const store = openMemoryStore();
    console.log(store.getMemorySummary(requesterIdFor(options.user)) || 'Nothing known yet.');
  });

memory
  .command('remember')
  .description('Store a memory')
  .argument('<topic>', 'Topic')
  .argument('<content...>', 'What to remember')
  .option('-u, --user <name>', 'User name', defaultUser())
  .option('-k, --kind <kind>', 'Memory kind', parseKindOption, 'fact')
  .action((topic: string, content: string[], options: { user: string; kind: MemoryKind }) => {
    const store = openMemoryStore();
    const requesterId = requesterIdFor(options.user);
    store.getProfile(requesterId, options.user);
    store.addMemory({ requesterId, kind: options.kind, topic, content: content.join(' ') });
    console.log(`Stored ${options.kind} "${topic}".`);
  });

memory
  .command('set')
  .description('Save a profile setting shown in the conversation context')
  .argument('<key>', 'Setting name, e.g. risk')
  .argument('<value...>', 'Setting value')
  .option('-u, --user <name>', 'User name', defaultUser())
  .action((key: string, value: string[], options: { user: string }) => {
    const store = openMemoryStore();
    const requesterId = requesterIdFor(options.user);
    store.getProfile(requesterId, options.user);
    store.updatePreferences(requesterId, { [key]: value.join(' ') });
    console.log(`Saved ${key}.`);
  });

memory
  .command('forget')
  .description('Delete memories whose topic contains the given text')
  .argument('<topic>', 'Topic text')
  .option('-u, --user <name>', 'User name', defaultUser())
  .action((topic: string, options: { user: string }) => {
    const removed = openMemoryStore().deleteMemoriesByTopic(requesterIdFor(options.user), topic);
    console.log(`Removed ${removed} memory item(s).`);
  });

memory
  .command('forget-all')
  .description('Delete all memories, history and tracked wallets for a user')
  .option('-u, --user <name>', 'User name', defaultUser())
  .option('-y, --yes', 'Skip confirmation')
  .action(async (options: { user: string; yes?: boolean }) => {
    const store = openMemoryStore();
    if (!options.yes) {
      const answers = await inquirer.prompt<{ confirm: boolean }>([
        {
          type: 'confirm',
          name: 'confirm',
          message: `Delete everything stored about ${options.user}?`,
          default: false,
        },
      ]);
      if (!answers.confirm) {
        console.log('Cancelled.');
        return;
      }
    }
    store.deleteAllMemories(requesterIdFor(options.user));
    console.log('All memories deleted.');
  });

// ============================================================================
// Trades
// ============================================================================

const trades = program.command('trades').description('Trade ledger');

trades
  .command('add')
  .description('Record a trade')
  .requiredOption('-s, --symbol <symbol>', 'Asset symbol')
  .option('-t, --type <type>', 'buy, sell or complete', parseTradeTypeOption, 'complete')
  .option('-a, --amount <amount>', 'Quantity', parseNumberOption, 1)
  .option('--buy <price>', 'Buy price', parseNumberOption)
  .option('--sell <price>', 'Sell price', parseNumberOption)
  .option('-u, --user <name>', 'User name', defaultUser())
  .action(
    (options: {
      symbol: string;
      type: TradeType;
      amount: number;
      buy?: number;
      sell?: number;
      user: string;
    }) => {
      const ledger = openTradeLedger();
      const requesterId = requesterIdFor(options.user);
      const { buy, sell } = options;
      if (options.type === 'complete' && (buy === undefined || sell === undefined)) {
        console.log('A complete trade needs both --buy and --sell.');
        process.exitCode = 1;
        return;
      }
      const closed = options.type === 'complete' && buy !== undefined && sell !== undefined;
      const profitLoss = closed ? (sell - buy) * options.amount : null;
      const profitLossPct = closed && buy !== 0 ? ((sell - buy) / buy) * 100 : null;
      const id = ledger.addTrade({
        requesterId,
        tradeType: options.type,
        symbol: options.symbol,
        amount: options.amount,
        buyPrice: buy ?? null,
        sellPrice: sell ?? null,
        profitLoss,
        profitLossPct,
      });
      console.log(`Recorded trade #${id}.`);
    }
  );

trades
  .command('list')
  .description('List recent trades, newest first')
  .option('-l, --limit <n>', 'How many', parseNumberOption, 10)
  .option('-u, --user <name>', 'User name', defaultUser())
  .action((options: { limit: number; user: string }) => {
    const rows = openTradeLedger().getUserTrades(requesterIdFor(options.user), options.limit);
    if (rows.length === 0) {
      console.log('No trades recorded.');
      return;
    }
    for (const row of rows) {
      const prices = [
        row.buyPrice !== null ? `buy ${formatUsd(row.buyPrice)}` : null,
        row.sellPrice !== null ? `sell ${formatUsd(row.sellPrice)}` : null,
        row.profitLossPct !== null ? formatPct(row.profitLossPct) : null,
      ]
        .filter((part): part is string => part !== null)
        .join(', ');
      console.log(`#${row.id} ${row.timestamp} ${row.tradeType} ${row.amount} ${row.symbol} ${prices}`);
    }
  });

trades
  .command('stats')
  .description('Show trading stats')
  .option('-u, --user <name>', 'User name', defaultUser())
  .option('--recompute', 'Rebuild stats from the full trade history first')
  .action((options: { user: string; recompute?: boolean }) => {
    const ledger = openTradeLedger();
    const requesterId = requesterIdFor(options.user);
    const stats = options.recompute ? ledger.recomputeStats(requesterId) : ledger.getUserStats(requesterId);
    if (!stats || stats.totalTrades === 0) {
      console.log('No completed trades recorded.');
      return;
    }
    console.log(`Trades:       ${stats.totalTrades}`);
    console.log(`Winners:      ${stats.winningTrades} (${stats.winRate.toFixed(1)}%)`);
    console.log(`Average:      ${formatPct(stats.averageProfitPct)}`);
    console.log(`Largest win:  ${formatPct(stats.largestWinPct)}`);
    console.log(`Largest loss: ${formatPct(stats.largestLossPct)}`);
  });

// ============================================================================
// Config
// ============================================================================

const configCommand = program.command('config').description('Configuration');

configCommand
  .command('check')
  .description('Validate the config file and show the effective settings')
  .option('-c, --config <path>', 'Config file', getDefaultConfigPath())
  .action((options: { config: string }) => {
    try {
      const config = loadConfig(options.config);
      console.log(`Config:   ${options.config}`);
      console.log(`LLM:      ${config.llm.apiKey ? config.llm.model : 'not configured (keyword routing)'}`);
      console.log(`Storage:  ${config.memory.enabled ? resolveDbPath(config.memory.dbPath) : 'disabled'}`);
      console.log(`Prefix:   "${config.router.commandPrefix}"`);
      console.log(`Cooldown: ${config.router.cooldownSeconds}s`);
      const handlers = Object.entries(config.handlers)
        .map(([name, settings]) => `${name}=${settings.enabled ? 'on' : 'off'}`)
        .join(' ');
      console.log(`Handlers: ${handlers}`);
      console.log(`RPC:      ${config.handlers.wallet.rpcUrl ? 'configured' : 'not configured'}`);
    } catch (error) {
      if (error instanceof ZodError) {
        console.error('Invalid config:');
        for (const issue of error.issues) {
          console.error(`  ${issue.path.join('.')}: ${issue.message}`);
        }
        process.exitCode = 1;
        return;
      }
      throw error;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exitCode = 1;
});
