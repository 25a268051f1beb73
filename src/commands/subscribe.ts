import type Database from 'better-sqlite3';
import type { Channel, StoredChannel } from '../feed/model.js';
import type { FeedTransport } from '../feed/transport.js';
import type { IdentityScheme } from '../feed/identity.js';
import { DEFAULT_IDENTITY_SCHEME } from '../feed/identity.js';
import { candidateUrls, resolveFeed } from '../feed/transport.js';
import { parseFeed } from '../feed/parser.js';
import { deleteChannel, findChannelByLink, insertChannel, storeEntries } from '../feed/feedDb.js';
import { type QuickmarkedEntry, QuickmarkOverlay } from '../quickmark/overlay.js';
import { SubscriptionError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface AddFeedResult {
  channelId: string;
  channel: Channel;
  entries: QuickmarkedEntry[];
}

export interface RemoveFeedResult {
  channel: StoredChannel;
  quickmarksReleased: number;
}

/**
 * Subscribe to the feed at `input`. The URL that answered becomes the channel
 * link. Nothing is stored unless the whole subscription succeeds.
 */
export async function addFeed(
  db: Database.Database,
  transport: FeedTransport,
  input: string,
  scheme: IdentityScheme = DEFAULT_IDENTITY_SCHEME,
): Promise<AddFeedResult> {
  const existing = candidateUrls(input).find((url) => findChannelByLink(db, url) !== undefined);
  if (existing) {
    throw new SubscriptionError(`Already subscribed to ${existing}`, { link: existing });
  }

  const resolved = await resolveFeed(transport, input);
  const parsed = parseFeed(resolved.body, scheme);
  const channel: Channel = { ...parsed, link: resolved.url };

  const subscribe = db.transaction(() => {
    const channelId = insertChannel(db, channel);
    const inserted = storeEntries(db, channelId, channel.entries);
    const entries = new QuickmarkOverlay(db).extend(inserted);
    return { channelId, channel, entries };
  });

  const result = subscribe();
  logger.info({ link: channel.link, entries: result.entries.length }, 'Subscribed');
  return result;
}

/**
 * Unsubscribe from the channel stored under `input`, trying the same URL
 * candidates `addFeed` would.
 */
export function removeFeed(db: Database.Database, input: string): RemoveFeedResult {
  const channel = candidateUrls(input)
    .map((url) => findChannelByLink(db, url))
    .find((c): c is StoredChannel => c !== undefined);
  if (!channel) {
    throw new SubscriptionError(`Not subscribed to ${input}`, { input });
  }

  const overlay = new QuickmarkOverlay(db);
  const quickmarksReleased = db.transaction(() => {
    const released = overlay.releaseChannel(channel.id);
    deleteChannel(db, channel.id);
    return released;
  })();

  logger.info({ link: channel.link, quickmarksReleased }, 'Unsubscribed');
  return { channel, quickmarksReleased };
}
