import type Database from 'better-sqlite3';

/**
 * Persisted position -> identity map. Only the overlay writes to it.
 */

export interface QuickmarkRow {
  position: number;
  identity: string;
}

/**
 * Replace every quickmark with positions 1..N over `identities`, in order.
 */
export function resetAll(db: Database.Database, identities: readonly string[]): QuickmarkRow[] {
  const insert = db.prepare('INSERT INTO quickmarks (position, identity) VALUES (?, ?)');
  const rows = identities.map((identity, i) => ({ position: i + 1, identity }));

  db.transaction(() => {
    db.prepare('DELETE FROM quickmarks').run();
    for (const row of rows) insert.run(row.position, row.identity);
  })();

  return rows;
}

/**
 * Give each identity that has no quickmark yet the next position after the
 * current maximum. Existing quickmarks are untouched.
 */
export function append(db: Database.Database, identities: readonly string[]): QuickmarkRow[] {
  const exists = db.prepare('SELECT 1 FROM quickmarks WHERE identity = ?');
  const insert = db.prepare('INSERT INTO quickmarks (position, identity) VALUES (?, ?)');
  const rows: QuickmarkRow[] = [];

  db.transaction(() => {
    let next = maxPosition(db) + 1;
    for (const identity of identities) {
      if (exists.get(identity) !== undefined) continue;
      insert.run(next, identity);
      rows.push({ position: next, identity });
      next++;
    }
  })();

  return rows;
}

export function deleteFor(db: Database.Database, identity: string): boolean {
  return db.prepare('DELETE FROM quickmarks WHERE identity = ?').run(identity).changes > 0;
}

export function deleteAllForChannel(db: Database.Database, channelId: string): number {
  return db
    .prepare('DELETE FROM quickmarks WHERE identity IN (SELECT identity FROM entries WHERE channel_id = ?)')
    .run(channelId).changes;
}

export function lookupByPosition(db: Database.Database, position: number): string | undefined {
  const row = db.prepare('SELECT identity FROM quickmarks WHERE position = ?').get(position) as
    | { identity: string }
    | undefined;
  return row?.identity;
}

export function listQuickmarks(db: Database.Database): QuickmarkRow[] {
  return db.prepare('SELECT position, identity FROM quickmarks ORDER BY position').all() as QuickmarkRow[];
}

export function maxPosition(db: Database.Database): number {
  const row = db.prepare('SELECT COALESCE(MAX(position), 0) AS max FROM quickmarks').get() as { max: number };
  return row.max;
}
