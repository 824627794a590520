import { openDatabase } from './db.js';

export const TRADE_TYPES = ['buy', 'sell', 'complete'] as const;
export type TradeType = (typeof TRADE_TYPES)[number];

export interface TradeInput {
  requesterId: string;
  tradeType: TradeType;
  symbol: string;
  amount: number;
  buyPrice?: number | null;
  sellPrice?: number | null;
  profitLoss?: number | null;
  profitLossPct?: number | null;
  timestamp?: string;
}

export interface TradeRecord {
  id: number;
  requesterId: string;
  tradeType: TradeType;
  symbol: string;
  amount: number;
  buyPrice: number | null;
  sellPrice: number | null;
  profitLoss: number | null;
  profitLossPct: number | null;
  timestamp: string;
}

export interface UserStats {
  requesterId: string;
  totalTrades: number;
  winningTrades: number;
  winRate: number;
  averageProfitPct: number;
  largestWinPct: number;
  largestLossPct: number;
  lastUpdated: string;
}

export function isTradeType(value: string): value is TradeType {
  return TRADE_TYPES.some((type) => type === value);
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function mapTrade(row: Record<string, unknown>): TradeRecord | null {
  const tradeType = String(row.tradeType);
  if (!isTradeType(tradeType)) {
    return null;
  }
  return {
    id: Number(row.id),
    requesterId: String(row.requesterId),
    tradeType,
    symbol: String(row.symbol),
    amount: Number(row.amount),
    buyPrice: numberOrNull(row.buyPrice),
    sellPrice: numberOrNull(row.sellPrice),
    profitLoss: numberOrNull(row.profitLoss),
    profitLossPct: numberOrNull(row.profitLossPct),
    timestamp: String(row.timestamp),
  };
}

const TRADE_COLUMNS = `
  id,
  user_id as requesterId,
  trade_type as tradeType,
  symbol,
  amount,
  buy_price as buyPrice,
  sell_price as sellPrice,
  profit_loss as profitLoss,
  profit_loss_pct as profitLossPct,
  timestamp
`;

function selectCompleteTrades(requesterId: string, dbPath?: string): TradeRecord[] {
  const db = openDatabase(dbPath);
  const rows = db
    .prepare(
      `SELECT ${TRADE_COLUMNS} FROM trades WHERE user_id = ? AND trade_type = 'complete' ORDER BY id ASC`
    )
    .all(requesterId) as Array<Record<string, unknown>>;
  const trades: TradeRecord[] = [];
  for (const row of rows) {
    const trade = mapTrade(row);
    if (trade) trades.push(trade);
  }
  return trades;
}

/**
 * Aggregates completed trades that carry a profit/loss. A trade wins when
 * profit_loss > 0 and loses when profit_loss < 0. Averages skip trades without
 * a percentage.
 */
export function computeUserStats(
  requesterId: string,
  trades: readonly TradeRecord[],
  now = new Date()
): UserStats {
  const complete = trades.filter(
    (trade) => trade.tradeType === 'complete' && trade.profitLoss !== null
  );
  const totalTrades = complete.length;
  const winners = complete.filter((trade) => (trade.profitLoss ?? 0) > 0);
  const losers = complete.filter((trade) => (trade.profitLoss ?? 0) < 0);

  const pcts = complete
    .map((trade) => trade.profitLossPct)
    .filter((pct): pct is number => pct !== null);
  const averageProfitPct = pcts.length > 0 ? pcts.reduce((sum, pct) => sum + pct, 0) / pcts.length : 0;

  const winPcts = winners.map((t) => t.profitLossPct).filter((p): p is number => p !== null);
  const lossPcts = losers.map((t) => t.profitLossPct).filter((p): p is number => p !== null);

  return {
    requesterId,
    totalTrades,
    winningTrades: winners.length,
    winRate: totalTrades > 0 ? (winners.length / totalTrades) * 100 : 0,
    averageProfitPct,
    largestWinPct: winPcts.length > 0 ? Math.max(...winPcts) : 0,
    largestLossPct: lossPcts.length > 0 ? Math.min(...lossPcts) : 0,
    lastUpdated: now.toISOString(),
  };
}

/** Rebuilds the stats row from the full set of completed trades. */
export function recomputeUserStats(requesterId: string, dbPath?: string): UserStats {
  const stats = computeUserStats(requesterId, selectCompleteTrades(requesterId, dbPath));
  const db = openDatabase(dbPath);
  db.prepare(
    `
      INSERT INTO user_stats (
        user_id, total_trades, winning_trades, average_profit_pct,
        largest_win_pct, largest_loss_pct, last_updated
      ) VALUES (
        @requesterId, @totalTrades, @winningTrades, @averageProfitPct,
        @largestWinPct, @largestLossPct, @lastUpdated
      )
      ON CONFLICT(user_id) DO UPDATE SET
        total_trades = excluded.total_trades,
        winning_trades = excluded.winning_trades,
        average_profit_pct = excluded.average_profit_pct,
        largest_win_pct = excluded.largest_win_pct,
        largest_loss_pct = excluded.largest_loss_pct,
        last_updated = excluded.last_updated
    `
  ).run({
    requesterId: stats.requesterId,
    totalTrades: stats.totalTrades,
    winningTrades: stats.winningTrades,
    averageProfitPct: stats.averageProfitPct,
    largestWinPct: stats.largestWinPct,
    largestLossPct: stats.largestLossPct,
    lastUpdated: stats.lastUpdated,
  });
  return stats;
}

/**
 * Records a trade and returns its id. A completed trade carrying a profit/loss
 * refreshes the requester's stats in the same transaction.
 */
export function addTrade(input: TradeInput, dbPath?: string): number {
  const db = openDatabase(dbPath);
  const insert = db.transaction((trade: TradeInput): number => {
    const result = db
      .prepare(
        `
          INSERT INTO trades (
            user_id, trade_type, symbol, amount, buy_price, sell_price,
            profit_loss, profit_loss_pct, timestamp
          ) VALUES (
            @requesterId, @tradeType, @symbol, @amount, @buyPrice, @sellPrice,
            @profitLoss, @profitLossPct, @timestamp
          )
        `
      )
      .run({
        requesterId: trade.requesterId,
        tradeType: trade.tradeType,
        symbol: trade.symbol.toUpperCase(),
        amount: trade.amount,
        buyPrice: trade.buyPrice ?? null,
        sellPrice: trade.sellPrice ?? null,
        profitLoss: trade.profitLoss ?? null,
        profitLossPct: trade.profitLossPct ?? null,
        timestamp: trade.timestamp ?? new Date().toISOString(),
      });
    if (trade.tradeType === 'complete' && trade.profitLoss !== undefined && trade.profitLoss !== null) {
      recomputeUserStats(trade.requesterId, dbPath);
    }
    return Number(result.lastInsertRowid);
  });
  return insert(input);
}

/** Newest first. */
export function getUserTrades(requesterId: string, limit = 10, dbPath?: string): TradeRecord[] {
  const db = openDatabase(dbPath);
  const rows = db
    .prepare(
      `SELECT ${TRADE_COLUMNS} FROM trades WHERE user_id = ? ORDER BY timestamp DESC, id DESC LIMIT ?`
    )
    .all(requesterId, Math.max(1, Math.floor(limit))) as Array<Record<string, unknown>>;
  const trades: TradeRecord[] = [];
  for (const row of rows) {
    const trade = mapTrade(row);
    if (trade) trades.push(trade);
  }
  return trades;
}

export function getUserStats(requesterId: string, dbPath?: string): UserStats | null {
  const db = openDatabase(dbPath);
  const row = db
    .prepare(
      `
        SELECT
          user_id as requesterId,
          total_trades as totalTrades,
          winning_trades as winningTrades,
          average_profit_pct as averageProfitPct,
          largest_win_pct as largestWinPct,
          largest_loss_pct as largestLossPct,
          last_updated as lastUpdated
        FROM user_stats
        WHERE user_id = ?
      `
    )
    .get(requesterId) as Record<string, unknown> | undefined;
  if (!row) {
    return null;
  }
  const totalTrades = Number(row.totalTrades ?? 0);
  const winningTrades = Number(row.winningTrades ?? 0);
  return {
    requesterId: String(row.requesterId),
    totalTrades,
    winningTrades,
    winRate: totalTrades > 0 ? (winningTrades / totalTrades) * 100 : 0,
    averageProfitPct: Number(row.averageProfitPct ?? 0),
    largestWinPct: Number(row.largestWinPct ?? 0),
    largestLossPct: Number(row.largestLossPct ?? 0),
    lastUpdated: String(row.lastUpdated),
  };
}
