import type Database from 'better-sqlite3';
import { type ChannelSummary, listChannelSummaries } from '../feed/feedDb.js';
import { type QuickmarkedEntry, QuickmarkOverlay } from '../quickmark/overlay.js';

/**
 * All unread entries, renumbered from 1.
 */
export function listNew(db: Database.Database): QuickmarkedEntry[] {
  return new QuickmarkOverlay(db).reset();
}

export function listFeeds(db: Database.Database): ChannelSummary[] {
  return listChannelSummaries(db);
}
