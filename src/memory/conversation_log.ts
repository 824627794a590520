import { openDatabase } from './db.js';

export interface ConversationTurnRecord {
  id: number;
  requesterId: string;
  channelId: string;
  userText: string;
  botText: string;
  timestamp: string;
}

export function logConversationTurn(params: {
  requesterId: string;
  channelId: string;
  userText: string;
  botText: string;
  timestamp?: string;
}, dbPath?: string): number {
  const db = openDatabase(dbPath);
  const result = db
    .prepare(
      `
        INSERT INTO conversation_history (user_id, channel_id, message_content, bot_response, timestamp)
        VALUES (@requesterId, @channelId, @userText, @botText, @timestamp)
      `
    )
    .run({
      requesterId: params.requesterId,
      channelId: params.channelId,
      userText: params.userText,
      botText: params.botText,
      timestamp: params.timestamp ?? new Date().toISOString(),
    });
  return Number(result.lastInsertRowid);
}

/** Newest first. */
export function listConversationHistory(
  requesterId: string,
  limit = 10,
  dbPath?: string
): ConversationTurnRecord[] {
  const db = openDatabase(dbPath);
  const rows = db
    .prepare(
      `
        SELECT
          id,
          user_id as requesterId,
          channel_id as channelId,
          message_content as userText,
          bot_response as botText,
          timestamp
        FROM conversation_history
        WHERE user_id = ?
        ORDER BY timestamp DESC, id DESC
        LIMIT ?
      `
    )
    .all(requesterId, Math.max(1, Math.floor(limit))) as Array<Record<string, unknown>>;

  return rows.map((row) => ({
    id: Number(row.id),
    requesterId: String(row.requesterId),
    channelId: String(row.channelId),
    userText: String(row.userText),
    botText: String(row.botText),
    timestamp: String(row.timestamp),
  }));
}

export function pruneConversationHistory(retentionDays: number, nowMs = Date.now(), dbPath?: string): number {
  const days = Math.max(1, Math.floor(retentionDays));
  const cutoff = new Date(nowMs - days * 24 * 60 * 60 * 1000).toISOString();
  const db = openDatabase(dbPath);
  const result = db.prepare(`DELETE FROM conversation_history WHERE timestamp < ?`).run(cutoff);
  return result.changes;
}
