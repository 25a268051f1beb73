/**
 * A single post within a channel.
 *
 * `primaryText` is the title, or the description when the source gave no title.
 * `identity` is derived from `primaryText` and `link` and never changes.
 */
export interface Entry {
  primaryText: string;
  identity: string;
  link: string | null;
  /** UTC instant; sources with other offsets are normalized on parse. */
  publishedAt: Date | null;
  read: boolean;
}

/**
 * A subscribed feed and the entries known for it.
 */
export interface Channel {
  title: string;
  /** URL the feed is re-fetched from. */
  link: string;
  description: string;
  lastBuildDate: Date | null;
  entries: Entry[];
}

/**
 * A channel as held by the store.
 */
export interface StoredChannel extends Channel {
  id: string;
  createdAt: string;
}

export function sameEntry(a: Entry, b: Entry): boolean {
  return a.identity === b.identity;
}

export function entryIdentities(entries: readonly Entry[]): Set<string> {
  return new Set(entries.map((e) => e.identity));
}
