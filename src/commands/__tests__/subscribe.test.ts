import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { countEntries, listChannels } from '../../feed/feedDb.js';
import { deriveIdentity, SHA256_V1 } from '../../feed/identity.js';
import { listQuickmarks } from '../../quickmark/quickmarkDb.js';
import { FeedParseError, SubscriptionError, TransportError } from '../../shared/errors.js';
import { FakeTransport, rssDocument } from '../../feed/__tests__/helpers.js';
import { addFeed, removeFeed } from '../subscribe.js';

let db: Database.Database;
let transport: FakeTransport;

const JAN_1 = 'Mon, 01 Jan 2024 00:00:00 GMT';
const JAN_2 = 'Tue, 02 Jan 2024 00:00:00 GMT';

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  transport = new FakeTransport();
});

afterEach(() => {
  db.close();
});

describe('addFeed', () => {
  it('stores the channel under the URL that answered and numbers its entries', async () => {
    transport.serve(
      'https://a.example/feed',
      rssDocument([
        { title: 'bzz', pubDate: JAN_2 },
        { title: 'azz', pubDate: JAN_1 },
      ]),
    );

    const result = await addFeed(db, transport, 'https://a.example/feed');

    expect(result.channel.link).toBe('https://a.example/feed');
    expect(result.channel.title).toBe('Feed');
    expect(result.entries.map((q) => [q.position, q.entry.primaryText])).toEqual([
      [1, 'azz'],
      [2, 'bzz'],
    ]);
    expect(listChannels(db).map((c) => c.link)).toEqual(['https://a.example/feed']);
    expect(countEntries(db)).toBe(2);
  });

  it('tries https before http for a bare host', async () => {
    transport.serve('http://plain.example/rss', rssDocument([{ title: 'one' }]));

    const result = await addFeed(db, transport, 'plain.example/rss');

    expect(transport.requests).toEqual(['https://plain.example/rss', 'http://plain.example/rss']);
    expect(result.channel.link).toBe('http://plain.example/rss');
  });

  it('refuses a second subscription without fetching again', async () => {
    transport.serve('https://a.example/feed', rssDocument([{ title: 'one' }]));
    await addFeed(db, transport, 'https://a.example/feed');

    await expect(addFeed(db, transport, 'a.example/feed')).rejects.toBeInstanceOf(SubscriptionError);
    expect(transport.requests).toEqual(['https://a.example/feed']);
    expect(listChannels(db)).toHaveLength(1);
    expect(countEntries(db)).toBe(1);
  });

  it('stores nothing when the document does not parse', async () => {
    transport.serve('https://a.example/feed', '<rss version="2.0"><channel><link>x</link></channel></rss>');

    await expect(addFeed(db, transport, 'https://a.example/feed')).rejects.toBeInstanceOf(FeedParseError);
    expect(listChannels(db)).toEqual([]);
    expect(countEntries(db)).toBe(0);
  });

  it('reports every failed candidate when nothing answers', async () => {
    const failure = await addFeed(db, transport, 'gone.example').catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(TransportError);
    if (failure instanceof TransportError) {
      expect(failure.message).toBe('Could not fetch a feed from gone.example');
      expect(failure.details?.attempts).toEqual([
        { url: 'https://gone.example', error: 'Feed fetch failed: connection refused for https://gone.example' },
        { url: 'http://gone.example', error: 'Feed fetch failed: connection refused for http://gone.example' },
      ]);
    }
  });

  it('numbers only entries the store did not already hold', async () => {
    transport.serve('https://a.example/feed', rssDocument([{ title: 'shared' }]));
    transport.serve('https://b.example/feed', rssDocument([{ title: 'shared' }, { title: 'own' }]));
    await addFeed(db, transport, 'https://a.example/feed');

    const result = await addFeed(db, transport, 'https://b.example/feed');

    expect(result.entries.map((q) => [q.position, q.entry.primaryText])).toEqual([[2, 'own']]);
    expect(countEntries(db)).toBe(2);
  });

  it('derives identities with the scheme it is given', async () => {
    transport.serve('https://a.example/feed', rssDocument([{ title: 'azz' }]));

    const result = await addFeed(db, transport, 'https://a.example/feed', SHA256_V1);
    expect(result.entries[0]?.entry.identity).toBe(deriveIdentity('azz', null, SHA256_V1));
  });
});

describe('removeFeed', () => {
  beforeEach(async () => {
    transport.serve('https://a.example/feed', rssDocument([{ title: 'a1' }, { title: 'a2' }]));
    transport.serve('https://b.example/feed', rssDocument([{ title: 'b1' }]));
    await addFeed(db, transport, 'https://a.example/feed');
    await addFeed(db, transport, 'https://b.example/feed');
  });

  it('finds the channel from a bare host and drops its entries and quickmarks', () => {
    const result = removeFeed(db, 'a.example/feed');

    expect(result.channel.link).toBe('https://a.example/feed');
    expect(result.quickmarksReleased).toBe(2);
    expect(listChannels(db).map((c) => c.link)).toEqual(['https://b.example/feed']);
    expect(countEntries(db)).toBe(1);
    expect(listQuickmarks(db)).toEqual([{ position: 3, identity: deriveIdentity('b1', null) }]);
  });

  it('fails for a feed that is not subscribed', () => {
    expect(() => removeFeed(db, 'c.example/feed')).toThrow('Not subscribed to c.example/feed');
    expect(listChannels(db)).toHaveLength(2);
  });
});
