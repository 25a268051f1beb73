import type { Channel, Entry } from '../feed/model.js';
import { entryIdentities } from '../feed/model.js';

export type SyncOutcome =
  | { kind: 'unchanged'; reason: 'build-date' | 'no-new-entries' }
  | { kind: 'new-entries'; entries: Entry[] };

/**
 * True when the stored build date shows the fetched document holds nothing newer.
 *
 * This trusts the source to move its build date forward whenever it publishes.
 * A feed that reuses or rolls back the stamp will have its new entries missed
 * until the date moves past the stored one.
 */
export function isUpToDate(stored: Channel, fetched: Channel): boolean {
  if (!stored.lastBuildDate || !fetched.lastBuildDate) return false;
  return stored.lastBuildDate.getTime() >= fetched.lastBuildDate.getTime();
}

/**
 * Entries of `fetched` whose identity is not among `stored`'s. Repeats inside
 * the fetched document count once.
 */
export function newEntries(stored: Channel, fetched: Channel): Entry[] {
  const seen = entryIdentities(stored.entries);
  const fresh: Entry[] = [];
  for (const entry of fetched.entries) {
    if (seen.has(entry.identity)) continue;
    seen.add(entry.identity);
    fresh.push(entry);
  }
  return fresh;
}

export function synchronize(stored: Channel, fetched: Channel): SyncOutcome {
  if (isUpToDate(stored, fetched)) {
    return { kind: 'unchanged', reason: 'build-date' };
  }
  const entries = newEntries(stored, fetched);
  if (entries.length === 0) {
    return { kind: 'unchanged', reason: 'no-new-entries' };
  }
  return { kind: 'new-entries', entries };
}
