import type Database from 'better-sqlite3';
import type { Entry } from '../feed/model.js';
import { loadUnreadEntries } from '../feed/feedDb.js';
import * as quickmarkDb from './quickmarkDb.js';

export interface QuickmarkedEntry {
  position: number;
  entry: Entry;
}

/**
 * Numbering order: publish date ascending, undated entries last, ties by identity.
 */
export function compareForNumbering(a: Entry, b: Entry): number {
  const at = a.publishedAt?.getTime();
  const bt = b.publishedAt?.getTime();
  if (at !== bt) {
    if (at === undefined) return 1;
    if (bt === undefined) return -1;
    return at - bt;
  }
  if (a.identity === b.identity) return 0;
  return a.identity < b.identity ? -1 : 1;
}

function pairUp(rows: readonly quickmarkDb.QuickmarkRow[], entries: readonly Entry[]): QuickmarkedEntry[] {
  const byIdentity = new Map(entries.map((e) => [e.identity, e]));
  const paired: QuickmarkedEntry[] = [];
  for (const row of rows) {
    const entry = byIdentity.get(row.identity);
    if (entry) paired.push({ position: row.position, entry });
  }
  return paired;
}

/**
 * Stable numbered handles for unread entries.
 *
 * Listing resets the numbering densely from 1. Subscribing and updating only
 * append after the current maximum. Marking an entry read drops its number and
 * leaves gaps; nothing is compacted until the next reset.
 */
export class QuickmarkOverlay {
  constructor(private readonly db: Database.Database) {}

  /** Renumber all unread entries from 1 in publish order. */
  reset(): QuickmarkedEntry[] {
    const unread = loadUnreadEntries(this.db).sort(compareForNumbering);
    const rows = quickmarkDb.resetAll(
      this.db,
      unread.map((e) => e.identity),
    );
    return pairUp(rows, unread);
  }

  /** Number newly stored entries after the current maximum. */
  extend(entries: readonly Entry[]): QuickmarkedEntry[] {
    const unread = entries.filter((e) => !e.read).sort(compareForNumbering);
    const rows = quickmarkDb.append(
      this.db,
      unread.map((e) => e.identity),
    );
    return pairUp(rows, unread);
  }

  /** Drop the quickmark of an entry that was marked read. */
  release(identity: string): boolean {
    return quickmarkDb.deleteFor(this.db, identity);
  }

  /** Drop every quickmark of a channel about to be removed. */
  releaseChannel(channelId: string): number {
    return quickmarkDb.deleteAllForChannel(this.db, channelId);
  }

  resolve(position: number): string | undefined {
    return quickmarkDb.lookupByPosition(this.db, position);
  }
}
