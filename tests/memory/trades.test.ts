import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { closeDatabase } from '../../src/memory/db.js';
import {
  addTrade,
  computeUserStats,
  getUserStats,
  getUserTrades,
  recomputeUserStats,
  type TradeRecord,
} from '../../src/memory/trades.js';

const originalDbPath = process.env.TRADEWATCH_DB_PATH;

function setIsolatedDbPath(name: string): void {
  const dir = mkdtempSync(join(tmpdir(), `tradewatch-${name}-`));
  process.env.TRADEWATCH_DB_PATH = join(dir, 'tradewatch.sqlite');
}

afterEach(() => {
  closeDatabase();
  if (originalDbPath === undefined) {
    delete process.env.TRADEWATCH_DB_PATH;
  } else {
    process.env.TRADEWATCH_DB_PATH = originalDbPath;
  }
});

function trade(overrides: Partial<TradeRecord>): TradeRecord {
  return {
    id: 1,
    requesterId: 'u1',
    tradeType: 'complete',
    symbol: 'ETH',
    amount: 1,
    buyPrice: 100,
    sellPrice: 110,
    profitLoss: 10,
    profitLossPct: 10,
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('computeUserStats', () => {
  it('aggregates winners and losers over completed trades', () => {
    const stats = computeUserStats(
      'u1',
      [
        trade({ profitLoss: 10, profitLossPct: 10 }),
        trade({ profitLoss: -5, profitLossPct: -5 }),
        trade({ profitLoss: 25, profitLossPct: 25 }),
        trade({ profitLoss: -20, profitLossPct: -20 }),
      ],
      new Date('2026-02-01T00:00:00.000Z')
    );

    expect(stats).toEqual({
      requesterId: 'u1',
      totalTrades: 4,
      winningTrades: 2,
      winRate: 50,
      averageProfitPct: 2.5,
      largestWinPct: 25,
      largestLossPct: -20,
      lastUpdated: '2026-02-01T00:00:00.000Z',
    });
  });

  it('ignores open positions and trades without a profit/loss', () => {
    const stats = computeUserStats('u1', [
      trade({ tradeType: 'buy', profitLoss: null, profitLossPct: null }),
      trade({ profitLoss: null, profitLossPct: null }),
      trade({ profitLoss: 4, profitLossPct: 4 }),
    ]);

    expect(stats.totalTrades).toBe(1);
    expect(stats.winningTrades).toBe(1);
    expect(stats.averageProfitPct).toBe(4);
    expect(stats.largestLossPct).toBe(0);
  });

  it('counts a break-even trade in the total but not as a win or loss', () => {
    const stats = computeUserStats('u1', [trade({ profitLoss: 0, profitLossPct: 0 })]);
    expect(stats.totalTrades).toBe(1);
    expect(stats.winningTrades).toBe(0);
    expect(stats.largestWinPct).toBe(0);
    expect(stats.largestLossPct).toBe(0);
  });

  it('returns zeros for no trades', () => {
    const stats = computeUserStats('u1', []);
    expect(stats.totalTrades).toBe(0);
    expect(stats.winRate).toBe(0);
    expect(stats.averageProfitPct).toBe(0);
  });
});

describe('trade ledger', () => {
  it('refreshes stats when a completed trade is recorded', () => {
    setIsolatedDbPath('trades-stats');

    addTrade({
      requesterId: 'u1',
      tradeType: 'complete',
      symbol: 'eth',
      amount: 2,
      buyPrice: 1800,
      sellPrice: 2000,
      profitLoss: 400,
      profitLossPct: 11.25,
    });
    addTrade({
      requesterId: 'u1',
      tradeType: 'complete',
      symbol: 'SOL',
      amount: 1,
      buyPrice: 100,
      sellPrice: 90,
      profitLoss: -10,
      profitLossPct: -10,
    });

    const stats = getUserStats('u1');
    expect(stats?.totalTrades).toBe(2);
    expect(stats?.winningTrades).toBe(1);
    expect(stats?.winRate).toBe(50);
    expect(stats?.averageProfitPct).toBeCloseTo(0.625);
    expect(stats?.largestWinPct).toBe(11.25);
    expect(stats?.largestLossPct).toBe(-10);
  });

  it('does not create stats for open positions', () => {
    setIsolatedDbPath('trades-open');

    addTrade({ requesterId: 'u1', tradeType: 'buy', symbol: 'BTC', amount: 0.1, buyPrice: 60000 });
    expect(getUserStats('u1')).toBeNull();
    expect(getUserTrades('u1')).toHaveLength(1);
  });

  it('recomputation from full history is idempotent', () => {
    setIsolatedDbPath('trades-recompute');

    addTrade({
      requesterId: 'u1',
      tradeType: 'complete',
      symbol: 'BTC',
      amount: 1,
      profitLoss: 50,
      profitLossPct: 5,
    });
    const first = recomputeUserStats('u1');
    const second = recomputeUserStats('u1');

    expect({ ...second, lastUpdated: '' }).toEqual({ ...first, lastUpdated: '' });
    expect(getUserStats('u1')?.totalTrades).toBe(1);
  });

  it('lists trades newest first with upper-cased symbols', () => {
    setIsolatedDbPath('trades-list');

    addTrade({
      requesterId: 'u1',
      tradeType: 'buy',
      symbol: 'eth',
      amount: 1,
      timestamp: '2026-01-01T00:00:00.000Z',
    });
    addTrade({
      requesterId: 'u1',
      tradeType: 'sell',
      symbol: 'sol',
      amount: 1,
      timestamp: '2026-01-02T00:00:00.000Z',
    });
    addTrade({ requesterId: 'u2', tradeType: 'buy', symbol: 'btc', amount: 1 });

    const rows = getUserTrades('u1');
    expect(rows.map((row) => [row.symbol, row.tradeType])).toEqual([
      ['SOL', 'sell'],
      ['ETH', 'buy'],
    ]);
    expect(rows[1]?.buyPrice).toBeNull();
  });
});
