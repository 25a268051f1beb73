#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import type Database from 'better-sqlite3';
import { type Config, loadConfig, writeDefaultConfig, getConfigPath } from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { FeedmarkError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb, ensureIdentityScheme } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { type IdentityScheme, getIdentityScheme } from '../feed/identity.js';
import { HttpTransport } from '../feed/transport.js';
import { addFeed, removeFeed } from '../commands/subscribe.js';
import { listFeeds, listNew } from '../commands/listing.js';
import { markByIdentity, markByPosition, markEverything } from '../commands/mark.js';
import { runUpdate } from '../sync/update.js';
import {
  formatEntryLine,
  formatFeedLine,
  formatMarkResult,
  formatUpdateReport,
  parsePositions,
} from './format.js';

const program = new Command();

program
  .name('feedmark')
  .description('Follow RSS and Atom feeds and mark entries read with stable numbers')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = getConfigPath();
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const db = initDb(resolvePath(config.db.path));
    const { applied } = runMigrations(db);
    ensureIdentityScheme(db, config.identity.scheme);
    if (applied.length > 0) {
      log(`✓ ${config.db.path} created (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${config.db.path} already up to date`);
    }
    closeDb();
  });

// === add ===
program
  .command('add <url>')
  .description('Subscribe to a feed; a bare host is tried over https, then http')
  .action(async (url: string) => {
    const { db, config, scheme, cleanup } = await openStore();
    try {
      const transport = new HttpTransport(config.fetch.timeout_ms, config.fetch.user_agent);
      const result = await addFeed(db, transport, url, scheme);
      log(`✓ Subscribed to ${result.channel.title} (${result.channel.link})`);
      for (const entry of result.entries) log(`  ${formatEntryLine(entry)}`);
    } finally {
      cleanup();
    }
  });

// === up ===
program
  .command('up')
  .description('Check every subscribed feed for new entries')
  .action(async () => {
    const { db, config, scheme, cleanup } = await openStore();
    try {
      const transport = new HttpTransport(config.fetch.timeout_ms, config.fetch.user_agent);
      const stats = await runUpdate(db, transport, {
        concurrency: config.fetch.concurrency,
        scheme,
        onReport: (report) => {
          for (const line of formatUpdateReport(report)) log(line);
        },
      });
      if (stats.channelsFailed > 0) process.exitCode = 1;
    } finally {
      cleanup();
    }
  });

// === feeds ===
program
  .command('feeds')
  .description('List subscribed feeds')
  .action(async () => {
    const { db, cleanup } = await openStore();
    try {
      for (const feed of listFeeds(db)) log(formatFeedLine(feed));
    } finally {
      cleanup();
    }
  });

// === new ===
program
  .command('new')
  .description('List unread entries, renumbering them from 1')
  .action(async () => {
    const { db, cleanup } = await openStore();
    try {
      for (const entry of listNew(db)) log(formatEntryLine(entry));
    } finally {
      cleanup();
    }
  });

// === mark ===
program
  .command('mark [positions...]')
  .description('Mark entries read by their number')
  .option('-a, --all', 'Mark every unread entry read', false)
  .action(async (tokens: string[], opts: { all: boolean }) => {
    const { db, cleanup } = await openStore();
    try {
      if (opts.all) {
        const count = markEverything(db);
        log(`✓ ${count} entries marked as read`);
        return;
      }
      if (tokens.length === 0) {
        throw new FeedmarkError('Give at least one entry number, or --all', 'USAGE_ERROR');
      }
      const { positions, invalid } = parsePositions(tokens);
      for (const token of invalid) log(`${token}: not an entry number`);
      for (const result of markByPosition(db, positions)) log(formatMarkResult(result));
    } finally {
      cleanup();
    }
  });

// === markhash ===
program
  .command('markhash <identities...>')
  .description('Mark entries read by their identity hash')
  .action(async (identities: string[]) => {
    const { db, cleanup } = await openStore();
    try {
      for (const result of markByIdentity(db, identities)) log(formatMarkResult(result));
    } finally {
      cleanup();
    }
  });

// === remove ===
program
  .command('remove <url>')
  .description('Unsubscribe from a feed and forget its entries')
  .action(async (url: string) => {
    const { db, cleanup } = await openStore();
    try {
      const { channel } = removeFeed(db, url);
      log(`✓ Unsubscribed from ${channel.title} (${channel.link})`);
    } finally {
      cleanup();
    }
  });

// === Helper to open the store ===
async function openStore(): Promise<{
  db: Database.Database;
  config: Config;
  scheme: IdentityScheme;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);
  ensureIdentityScheme(db, config.identity.scheme);

  return {
    db,
    config,
    scheme: getIdentityScheme(config.identity.scheme),
    cleanup: closeDb,
  };
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof FeedmarkError) {
    logger.debug({ code: err.code, details: err.details }, err.message);
  } else {
    logger.error({ err }, 'Unexpected failure');
  }
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
