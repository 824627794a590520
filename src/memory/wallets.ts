import { openDatabase } from './db.js';

export interface TrackedWallet {
  requesterId: string;
  address: string;
  network: string;
  nickname: string | null;
  trackedSince: string;
}

/**
 * Tracks a wallet for a requester. Re-tracking an address keeps tracked_since and
 * only refreshes network and nickname.
 */
export function addTrackedWallet(input: {
  requesterId: string;
  address: string;
  network: string;
  nickname?: string | null;
}, dbPath?: string): { created: boolean } {
  const db = openDatabase(dbPath);
  const existing = db
    .prepare(`SELECT id FROM user_wallets WHERE user_id = ? AND wallet_address = ?`)
    .get(input.requesterId, input.address);

  if (existing) {
    db.prepare(
      `
        UPDATE user_wallets
        SET network = @network, nickname = COALESCE(@nickname, nickname)
        WHERE user_id = @requesterId AND wallet_address = @address
      `
    ).run({
      requesterId: input.requesterId,
      address: input.address,
      network: input.network,
      nickname: input.nickname ?? null,
    });
    return { created: false };
  }

  db.prepare(
    `
      INSERT INTO user_wallets (user_id, wallet_address, network, nickname, tracked_since)
      VALUES (@requesterId, @address, @network, @nickname, @trackedSince)
    `
  ).run({
    requesterId: input.requesterId,
    address: input.address,
    network: input.network,
    nickname: input.nickname ?? null,
    trackedSince: new Date().toISOString(),
  });
  return { created: true };
}

export function listTrackedWallets(requesterId: string, dbPath?: string): TrackedWallet[] {
  const db = openDatabase(dbPath);
  const rows = db
    .prepare(
      `
        SELECT
          user_id as requesterId,
          wallet_address as address,
          network,
          nickname,
          tracked_since as trackedSince
        FROM user_wallets
        WHERE user_id = ?
        ORDER BY tracked_since ASC, id ASC
      `
    )
    .all(requesterId) as Array<Record<string, unknown>>;

  return rows.map((row) => ({
    requesterId: String(row.requesterId),
    address: String(row.address),
    network: String(row.network),
    nickname: typeof row.nickname === 'string' ? row.nickname : null,
    trackedSince: String(row.trackedSince),
  }));
}

export function removeTrackedWallet(requesterId: string, address: string, dbPath?: string): boolean {
  const db = openDatabase(dbPath);
  const result = db
    .prepare(`DELETE FROM user_wallets WHERE user_id = ? AND lower(wallet_address) = lower(?)`)
    .run(requesterId, address);
  return result.changes > 0;
}
