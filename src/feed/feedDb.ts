import type Database from 'better-sqlite3';
import type { Channel, Entry, StoredChannel } from './model.js';
import { fromIsoOrNull, toIsoOrNull } from './dates.js';
import { generateId, nowISO } from '../shared/utils.js';
import { DbError, StorageConsistencyError, SubscriptionError, errorMessage } from '../shared/errors.js';

/**
 * Database row shape for the channels table.
 */
export interface ChannelRow {
  id: string;
  title: string;
  link: string;
  description: string;
  last_build_date: string | null;
  created_at: string;
}

/**
 * Database row shape for the entries table.
 */
export interface EntryRow {
  identity: string;
  channel_id: string;
  primary_text: string;
  link: string | null;
  published_at: string | null;
  read: number;
  fetched_at: string;
}

export interface ChannelSummary {
  id: string;
  title: string;
  link: string;
  unread: number;
  total: number;
}

export function rowToEntry(row: EntryRow): Entry {
  return {
    primaryText: row.primary_text,
    identity: row.identity,
    link: row.link,
    publishedAt: fromIsoOrNull(row.published_at),
    read: row.read === 1,
  };
}

function rowToChannel(row: ChannelRow, entries: Entry[]): StoredChannel {
  return {
    id: row.id,
    title: row.title,
    link: row.link,
    description: row.description,
    lastBuildDate: fromIsoOrNull(row.last_build_date),
    createdAt: row.created_at,
    entries,
  };
}

// ================================================================
// Channels
// ================================================================

/**
 * Insert a channel (without entries). Fails with SubscriptionError when a
 * channel with the same link already exists.
 */
export function insertChannel(db: Database.Database, channel: Channel): string {
  const id = generateId();
  try {
    db.prepare(
      `INSERT INTO channels (id, title, link, description, last_build_date, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ).run(id, channel.title, channel.link, channel.description, toIsoOrNull(channel.lastBuildDate), nowISO());
    return id;
  } catch (err) {
    if (err instanceof Error && err.message.includes('UNIQUE')) {
      throw new SubscriptionError(`Already subscribed to ${channel.link}`, { link: channel.link });
    }
    throw new DbError(`Failed to add channel: ${errorMessage(err)}`, { link: channel.link });
  }
}

export function listChannels(db: Database.Database): StoredChannel[] {
  const rows = db.prepare('SELECT * FROM channels ORDER BY created_at, title, link').all() as ChannelRow[];
  return rows.map((row) => rowToChannel(row, []));
}

export function listChannelSummaries(db: Database.Database): ChannelSummary[] {
  return db
    .prepare(
      `SELECT c.id, c.title, c.link,
              COALESCE(SUM(CASE WHEN e.read = 0 THEN 1 ELSE 0 END), 0) AS unread,
              COUNT(e.identity) AS total
       FROM channels c LEFT JOIN entries e ON e.channel_id = c.id
       GROUP BY c.id
       ORDER BY c.created_at, c.title, c.link`,
    )
    .all() as ChannelSummary[];
}

export function getEntriesForChannel(db: Database.Database, channelId: string): Entry[] {
  const rows = db
    .prepare('SELECT * FROM entries WHERE channel_id = ? ORDER BY published_at, identity')
    .all(channelId) as EntryRow[];
  return rows.map(rowToEntry);
}

/**
 * Load a channel with all of its stored entries.
 */
export function loadChannel(db: Database.Database, id: string): StoredChannel | undefined {
  const row = db.prepare('SELECT * FROM channels WHERE id = ?').get(id) as ChannelRow | undefined;
  return row ? rowToChannel(row, getEntriesForChannel(db, id)) : undefined;
}

export function findChannelByLink(db: Database.Database, link: string): StoredChannel | undefined {
  const row = db.prepare('SELECT * FROM channels WHERE link = ?').get(link) as ChannelRow | undefined;
  return row ? rowToChannel(row, getEntriesForChannel(db, row.id)) : undefined;
}

export function updateLastBuildDate(db: Database.Database, id: string, lastBuildDate: Date | null): void {
  db.prepare('UPDATE channels SET last_build_date = ? WHERE id = ?').run(toIsoOrNull(lastBuildDate), id);
}

/**
 * Delete a channel. Its entries, and their quickmarks, go with it.
 */
export function deleteChannel(db: Database.Database, id: string): boolean {
  const result = db.prepare('DELETE FROM channels WHERE id = ?').run(id);
  return result.changes > 0;
}

// ================================================================
// Entries
// ================================================================

/**
 * Store entries for a channel. An identity already present anywhere in the
 * store is left alone. Returns the entries that were actually inserted.
 */
export function storeEntries(db: Database.Database, channelId: string, entries: readonly Entry[]): Entry[] {
  const statement = db.prepare(
    `INSERT OR IGNORE INTO entries (identity, channel_id, primary_text, link, published_at, read, fetched_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
  );
  const fetchedAt = nowISO();
  const inserted: Entry[] = [];

  const insertAll = db.transaction(() => {
    for (const entry of entries) {
      const result = statement.run(
        entry.identity,
        channelId,
        entry.primaryText,
        entry.link,
        toIsoOrNull(entry.publishedAt),
        entry.read ? 1 : 0,
        fetchedAt,
      );
      if (result.changes > 0) inserted.push(entry);
    }
  });

  try {
    insertAll();
  } catch (err) {
    throw new DbError(`Failed to store entries: ${errorMessage(err)}`, { channelId });
  }
  return inserted;
}

export function getEntry(db: Database.Database, identity: string): Entry | undefined {
  const row = db.prepare('SELECT * FROM entries WHERE identity = ?').get(identity) as EntryRow | undefined;
  return row ? rowToEntry(row) : undefined;
}

export function loadUnreadEntries(db: Database.Database): Entry[] {
  const rows = db.prepare('SELECT * FROM entries WHERE read = 0').all() as EntryRow[];
  return rows.map(rowToEntry);
}

export function countEntries(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM entries').get() as { count: number };
  return row.count;
}

/**
 * Set the read flag of one entry. Returns whether the flag changed; zero rows
 * means the entry is unknown or already in that state.
 */
export function setRead(db: Database.Database, identity: string, read: boolean): boolean {
  const flag = read ? 1 : 0;
  const result = db.prepare('UPDATE entries SET read = ? WHERE identity = ? AND read != ?').run(flag, identity, flag);
  if (result.changes > 1) {
    throw new StorageConsistencyError(`Marking ${identity} affected ${result.changes} entries`, {
      identity,
      changes: result.changes,
    });
  }
  return result.changes === 1;
}

/**
 * Mark every unread entry read and return their identities.
 */
export function markAllRead(db: Database.Database): string[] {
  const rows = db.prepare('SELECT identity FROM entries WHERE read = 0').all() as Array<{ identity: string }>;
  db.prepare('UPDATE entries SET read = 1 WHERE read = 0').run();
  return rows.map((r) => r.identity);
}
