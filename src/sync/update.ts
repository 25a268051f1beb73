import type Database from 'better-sqlite3';
import type { StoredChannel } from '../feed/model.js';
import type { FeedTransport } from '../feed/transport.js';
import type { IdentityScheme } from '../feed/identity.js';
import { DEFAULT_IDENTITY_SCHEME } from '../feed/identity.js';
import { parseFeed } from '../feed/parser.js';
import { listChannels, loadChannel, storeEntries, updateLastBuildDate } from '../feed/feedDb.js';
import { type QuickmarkedEntry, QuickmarkOverlay } from '../quickmark/overlay.js';
import { synchronize } from './synchronize.js';
import { FeedParseError, FeedmarkError, errorMessage } from '../shared/errors.js';
import { withConcurrency } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface ChannelRef {
  id: string;
  title: string;
  link: string;
}

export type ChannelUpdateReport =
  | { status: 'new-entries'; channel: ChannelRef; entries: QuickmarkedEntry[] }
  | { status: 'unchanged'; channel: ChannelRef; reason: 'build-date' | 'no-new-entries' }
  | { status: 'failed'; channel: ChannelRef; code: string; error: string };

export interface UpdateOptions {
  concurrency?: number;
  scheme?: IdentityScheme;
  /** Called as each channel finishes, in completion order. */
  onReport?: (report: ChannelUpdateReport) => void;
}

export interface UpdateStats {
  channelsChecked: number;
  channelsUpdated: number;
  channelsFailed: number;
  entriesNew: number;
  reports: ChannelUpdateReport[];
  durationMs: number;
}

function failureCode(err: unknown): string {
  if (err instanceof FeedParseError) return err.kind;
  if (err instanceof FeedmarkError) return err.code;
  return 'UNKNOWN_ERROR';
}

function refOf(channel: StoredChannel): ChannelRef {
  return { id: channel.id, title: channel.title, link: channel.link };
}

async function updateChannel(
  db: Database.Database,
  transport: FeedTransport,
  overlay: QuickmarkOverlay,
  channel: StoredChannel,
  scheme: IdentityScheme,
): Promise<ChannelUpdateReport> {
  const body = await transport.fetch(channel.link);
  const fetched = parseFeed(body, scheme);

  // Reload after the await so the snapshot is current for this diff.
  const stored = loadChannel(db, channel.id);
  if (!stored) {
    return { status: 'unchanged', channel: refOf(channel), reason: 'no-new-entries' };
  }

  const outcome = synchronize(stored, fetched);
  if (outcome.kind === 'unchanged') {
    if (outcome.reason === 'no-new-entries' && fetched.lastBuildDate) {
      updateLastBuildDate(db, stored.id, fetched.lastBuildDate);
    }
    return { status: 'unchanged', channel: refOf(stored), reason: outcome.reason };
  }

  const entries = db.transaction(() => {
    const inserted = storeEntries(db, stored.id, outcome.entries);
    if (fetched.lastBuildDate) {
      updateLastBuildDate(db, stored.id, fetched.lastBuildDate);
    }
    return overlay.extend(inserted);
  })();

  if (entries.length === 0) {
    return { status: 'unchanged', channel: refOf(stored), reason: 'no-new-entries' };
  }
  return { status: 'new-entries', channel: refOf(stored), entries };
}

/**
 * Check every subscribed channel for new entries. Channels are fetched
 * concurrently; a failing channel is reported and the rest carry on.
 */
export async function runUpdate(
  db: Database.Database,
  transport: FeedTransport,
  options: UpdateOptions = {},
): Promise<UpdateStats> {
  const startTime = Date.now();
  const scheme = options.scheme ?? DEFAULT_IDENTITY_SCHEME;
  const overlay = new QuickmarkOverlay(db);

  const stats: UpdateStats = {
    channelsChecked: 0,
    channelsUpdated: 0,
    channelsFailed: 0,
    entriesNew: 0,
    reports: [],
    durationMs: 0,
  };

  const channels = listChannels(db);
  if (channels.length === 0) {
    logger.info('No channels to update');
    stats.durationMs = Date.now() - startTime;
    return stats;
  }

  await withConcurrency(channels, options.concurrency ?? 8, async (channel) => {
    let report: ChannelUpdateReport;
    try {
      report = await updateChannel(db, transport, overlay, channel, scheme);
      stats.channelsChecked++;
      if (report.status === 'new-entries') {
        stats.channelsUpdated++;
        stats.entriesNew += report.entries.length;
      }
    } catch (err) {
      stats.channelsFailed++;
      const code = failureCode(err);
      report = { status: 'failed', channel: refOf(channel), code, error: errorMessage(err) };
      logger.warn({ channel: channel.link, code, error: report.error }, 'Channel update failed');
    }
    stats.reports.push(report);
    try {
      options.onReport?.(report);
    } catch (err) {
      logger.warn({ channel: channel.link, error: errorMessage(err) }, 'Update report callback failed');
    }
  });

  stats.durationMs = Date.now() - startTime;
  logger.info(
    {
      channelsChecked: stats.channelsChecked,
      channelsFailed: stats.channelsFailed,
      entriesNew: stats.entriesNew,
      durationMs: stats.durationMs,
    },
    'Update complete',
  );

  return stats;
}
