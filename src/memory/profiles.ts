import { z } from 'zod';

import { openDatabase } from './db.js';

export interface UserProfile {
  requesterId: string;
  username: string;
  firstSeen: string;
  lastSeen: string;
  interactionsCount: number;
  preferences: Record<string, unknown> | null;
}

const PreferencesSchema = z.record(z.unknown());

function parsePreferences(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }
  try {
    const parsed = PreferencesSchema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function mapProfile(row: Record<string, unknown>): UserProfile {
  return {
    requesterId: String(row.userId),
    username: String(row.username),
    firstSeen: String(row.firstSeen),
    lastSeen: String(row.lastSeen),
    interactionsCount: Number(row.interactionsCount ?? 0),
    preferences: parsePreferences(row.preferences),
  };
}

/** Reads a profile without touching its counters. */
export function findUserProfile(requesterId: string, dbPath?: string): UserProfile | null {
  const db = openDatabase(dbPath);
  const row = db
    .prepare(
      `
        SELECT
          user_id as userId,
          username,
          first_seen as firstSeen,
          last_seen as lastSeen,
          interactions_count as interactionsCount,
          preferences
        FROM user_profiles
        WHERE user_id = ?
      `
    )
    .get(requesterId) as Record<string, unknown> | undefined;
  return row ? mapProfile(row) : null;
}

/**
 * Returns the profile, bumping last_seen and interactions_count when it exists.
 * A missing profile is created only when a username is supplied.
 */
export function getUserProfile(requesterId: string, username?: string, dbPath?: string): UserProfile | null {
  const db = openDatabase(dbPath);
  const now = new Date().toISOString();

  const bumped = db
    .prepare(
      `
        UPDATE user_profiles
        SET last_seen = ?, interactions_count = interactions_count + 1
        WHERE user_id = ?
      `
    )
    .run(now, requesterId);

  if (bumped.changes === 0) {
    if (!username) {
      return null;
    }
    db.prepare(
      `
        INSERT INTO user_profiles (user_id, username, first_seen, last_seen, interactions_count)
        VALUES (@requesterId, @username, @now, @now, 1)
      `
    ).run({ requesterId, username, now });
  }

  return findUserProfile(requesterId, dbPath);
}

/** Shallow-merges into the stored preferences object. Returns false for unknown users. */
export function updateUserPreferences(
  requesterId: string,
  preferences: Record<string, unknown>,
  dbPath?: string
): boolean {
  const existing = findUserProfile(requesterId, dbPath);
  if (!existing) {
    return false;
  }
  const merged = { ...(existing.preferences ?? {}), ...preferences };
  const db = openDatabase(dbPath);
  db.prepare(`UPDATE user_profiles SET preferences = ? WHERE user_id = ?`).run(
    JSON.stringify(merged),
    requesterId
  );
  return true;
}
