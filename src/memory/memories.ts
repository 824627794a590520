import { z } from 'zod';

import { openDatabase } from './db.js';

export const MEMORY_KINDS = ['fact', 'preference', 'wallet_info', 'interaction'] as const;
export type MemoryKind = (typeof MEMORY_KINDS)[number];

export interface MemoryRecord {
  id: number;
  requesterId: string;
  kind: MemoryKind;
  topic: string;
  content: string;
  metadata: Record<string, unknown> | null;
  createdAt: string;
  updatedAt: string;
}

export interface MemoryInput {
  requesterId: string;
  kind: MemoryKind;
  topic: string;
  content: string;
  metadata?: Record<string, unknown> | null;
}

const MetadataSchema = z.record(z.unknown());

export function isMemoryKind(value: string): value is MemoryKind {
  return MEMORY_KINDS.some((kind) => kind === value);
}

function parseMetadata(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }
  try {
    const parsed = MetadataSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function mapMemory(row: Record<string, unknown>): MemoryRecord | null {
  const kind = String(row.kind);
  if (!isMemoryKind(kind)) {
    return null;
  }
  return {
    id: Number(row.id),
    requesterId: String(row.requesterId),
    kind,
    topic: String(row.topic),
    content: String(row.content),
    metadata: parseMetadata(row.metadata),
    createdAt: String(row.createdAt),
    updatedAt: String(row.updatedAt),
  };
}

/** Upserts on (requester, kind, topic); the newer content wins. */
export function addMemory(input: MemoryInput, dbPath?: string): void {
  const db = openDatabase(dbPath);
  const now = new Date().toISOString();
  db.prepare(
    `
      INSERT INTO conversation_memory (user_id, memory_type, topic, content, metadata, created_at, updated_at)
      VALUES (@requesterId, @kind, @topic, @content, @metadata, @now, @now)
      ON CONFLICT(user_id, memory_type, topic) DO UPDATE SET
        content = excluded.content,
        metadata = excluded.metadata,
        updated_at = excluded.updated_at
    `
  ).run({
    requesterId: input.requesterId,
    kind: input.kind,
    topic: input.topic,
    content: input.content,
    metadata: input.metadata ? JSON.stringify(input.metadata) : null,
    now,
  });
}

/** Most recently updated first. */
export function getMemories(
  requesterId: string,
  options?: { kind?: MemoryKind; limit?: number },
  dbPath?: string
): MemoryRecord[] {
  const db = openDatabase(dbPath);
  const limit = Math.max(1, Math.floor(options?.limit ?? 50));
  const rows = db
    .prepare(
      `
        SELECT
          id,
          user_id as requesterId,
          memory_type as kind,
          topic,
          content,
          metadata,
          created_at as createdAt,
          updated_at as updatedAt
        FROM conversation_memory
        WHERE user_id = @requesterId
          AND (@kind IS NULL OR memory_type = @kind)
        ORDER BY updated_at DESC, id DESC
        LIMIT @limit
      `
    )
    .all({ requesterId, kind: options?.kind ?? null, limit }) as Array<Record<string, unknown>>;

  const records: MemoryRecord[] = [];
  for (const row of rows) {
    const record = mapMemory(row);
    if (record) records.push(record);
  }
  return records;
}

/** Case-insensitive substring match on topic. Returns the number of rows removed. */
export function deleteMemoriesByTopic(requesterId: string, topic: string, dbPath?: string): number {
  const needle = topic.trim();
  if (!needle) {
    return 0;
  }
  const db = openDatabase(dbPath);
  const result = db
    .prepare(
      `DELETE FROM conversation_memory WHERE user_id = ? AND instr(lower(topic), lower(?)) > 0`
    )
    .run(requesterId, needle);
  return result.changes;
}

/**
 * Forgets everything about a requester: memories, conversation history and tracked
 * wallets. The profile row survives with its preferences cleared and counter reset.
 * Trades and stats are kept.
 */
export function deleteAllMemories(requesterId: string, dbPath?: string): void {
  const db = openDatabase(dbPath);
  const wipe = db.transaction((id: string) => {
    db.prepare(`DELETE FROM conversation_memory WHERE user_id = ?`).run(id);
    db.prepare(`DELETE FROM conversation_history WHERE user_id = ?`).run(id);
    db.prepare(`DELETE FROM user_wallets WHERE user_id = ?`).run(id);
    db.prepare(
      `UPDATE user_profiles SET preferences = NULL, interactions_count = 0 WHERE user_id = ?`
    ).run(id);
  });
  wipe(requesterId);
}
