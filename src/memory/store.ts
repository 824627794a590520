import { logConversationTurn } from './conversation_log.js';
import {
  addMemory,
  deleteAllMemories,
  deleteMemoriesByTopic,
  getMemories,
  type MemoryInput,
  type MemoryKind,
  type MemoryRecord,
} from './memories.js';
import { getUserProfile, updateUserPreferences, type UserProfile } from './profiles.js';
import { buildMemorySummary } from './summary.js';
import {
  addTrade,
  getUserStats,
  getUserTrades,
  recomputeUserStats,
  type TradeInput,
  type TradeRecord,
  type UserStats,
} from './trades.js';
import { addTrackedWallet, listTrackedWallets, type TrackedWallet } from './wallets.js';

export interface MemoryStore {
  getProfile(requesterId: string, username?: string): UserProfile | null;
  getMemorySummary(requesterId: string): string;
  logConversationTurn(
    requesterId: string,
    channelId: string,
    userText: string,
    botText: string
  ): void;
  addMemory(input: MemoryInput): void;
  getMemories(requesterId: string, kind?: MemoryKind): MemoryRecord[];
  deleteMemoriesByTopic(requesterId: string, topic: string): number;
  deleteAllMemories(requesterId: string): void;
  updatePreferences(requesterId: string, preferences: Record<string, unknown>): boolean;
  trackWallet(input: {
    requesterId: string;
    address: string;
    network: string;
    nickname?: string | null;
  }): { created: boolean };
  listWallets(requesterId: string): TrackedWallet[];
}

export interface TradeLedger {
  addTrade(input: TradeInput): number;
  getUserTrades(requesterId: string, limit?: number): TradeRecord[];
  recomputeStats(requesterId: string): UserStats;
  getUserStats(requesterId: string): UserStats | null;
}

export interface SqliteStoreOptions {
  /** Database file; falls back to TRADEWATCH_DB_PATH, then the home directory. */
  dbPath?: string;
}

/** Backed by the shared connection openDatabase() keeps per file. */
export class SqliteMemoryStore implements MemoryStore {
  private readonly dbPath: string | undefined;
  private readonly maxSummaryItems: number;

  constructor(options: SqliteStoreOptions & { maxSummaryItems?: number } = {}) {
    this.dbPath = options.dbPath;
    this.maxSummaryItems = options.maxSummaryItems ?? 5;
  }

  getProfile(requesterId: string, username?: string): UserProfile | null {
    return getUserProfile(requesterId, username, this.dbPath);
  }

  getMemorySummary(requesterId: string): string {
    return buildMemorySummary(requesterId, this.maxSummaryItems, this.dbPath);
  }

  logConversationTurn(requesterId: string, channelId: string, userText: string, botText: string): void {
    logConversationTurn({ requesterId, channelId, userText, botText }, this.dbPath);
  }

  addMemory(input: MemoryInput): void {
    addMemory(input, this.dbPath);
  }

  getMemories(requesterId: string, kind?: MemoryKind): MemoryRecord[] {
    return getMemories(requesterId, { kind }, this.dbPath);
  }

  deleteMemoriesByTopic(requesterId: string, topic: string): number {
    return deleteMemoriesByTopic(requesterId, topic, this.dbPath);
  }

  deleteAllMemories(requesterId: string): void {
    deleteAllMemories(requesterId, this.dbPath);
  }

  updatePreferences(requesterId: string, preferences: Record<string, unknown>): boolean {
    return updateUserPreferences(requesterId, preferences, this.dbPath);
  }

  trackWallet(input: {
    requesterId: string;
    address: string;
    network: string;
    nickname?: string | null;
  }): { created: boolean } {
    return addTrackedWallet(input, this.dbPath);
  }

  listWallets(requesterId: string): TrackedWallet[] {
    return listTrackedWallets(requesterId, this.dbPath);
  }
}

export class SqliteTradeLedger implements TradeLedger {
  private readonly dbPath: string | undefined;

  constructor(options: SqliteStoreOptions = {}) {
    this.dbPath = options.dbPath;
  }

  addTrade(input: TradeInput): number {
    return addTrade(input, this.dbPath);
  }

  getUserTrades(requesterId: string, limit = 10): TradeRecord[] {
    return getUserTrades(requesterId, limit, this.dbPath);
  }

  recomputeStats(requesterId: string): UserStats {
    return recomputeUserStats(requesterId, this.dbPath);
  }

  getUserStats(requesterId: string): UserStats | null {
    return getUserStats(requesterId, this.dbPath);
  }
}
