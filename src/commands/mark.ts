import type Database from 'better-sqlite3';
import { getEntry, markAllRead, setRead } from '../feed/feedDb.js';
import { QuickmarkOverlay } from '../quickmark/overlay.js';

export type MarkStatus = 'marked' | 'already-read' | 'unknown-identity' | 'no-quickmark';

export interface MarkResult {
  /** The identity or position the caller asked for. */
  target: string;
  identity: string | null;
  status: MarkStatus;
}

function markOne(db: Database.Database, overlay: QuickmarkOverlay, target: string, identity: string): MarkResult {
  const changed = db.transaction(() => {
    const flipped = setRead(db, identity, true);
    overlay.release(identity);
    return flipped;
  })();

  if (changed) return { target, identity, status: 'marked' };
  const status: MarkStatus = getEntry(db, identity) ? 'already-read' : 'unknown-identity';
  return { target, identity, status };
}

/**
 * Mark entries read by identity. Each identity is handled on its own; unknown
 * or already-read ones are reported and skipped.
 */
export function markByIdentity(db: Database.Database, identities: readonly string[]): MarkResult[] {
  const overlay = new QuickmarkOverlay(db);
  return identities.map((identity) => markOne(db, overlay, identity, identity));
}

/**
 * Mark entries read by quickmark position. A position with no quickmark is
 * reported and the rest of the batch continues.
 */
export function markByPosition(db: Database.Database, positions: readonly number[]): MarkResult[] {
  const overlay = new QuickmarkOverlay(db);
  return positions.map((position): MarkResult => {
    const target = String(position);
    const identity = overlay.resolve(position);
    if (identity === undefined) {
      return { target, identity: null, status: 'no-quickmark' };
    }
    return markOne(db, overlay, target, identity);
  });
}

/**
 * Mark every unread entry read. Returns how many were marked.
 */
export function markEverything(db: Database.Database): number {
  const overlay = new QuickmarkOverlay(db);
  return db.transaction(() => {
    const identities = markAllRead(db);
    for (const identity of identities) overlay.release(identity);
    return identities.length;
  })();
}
