import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import type { Entry } from '../../feed/model.js';
import { deriveIdentity } from '../../feed/identity.js';
import { insertChannel, storeEntries, setRead, deleteChannel } from '../../feed/feedDb.js';
import { QuickmarkOverlay, compareForNumbering } from '../overlay.js';
import { listQuickmarks, maxPosition } from '../quickmarkDb.js';

let db: Database.Database;
let overlay: QuickmarkOverlay;

function makeEntry(primaryText: string, day: number | null): Entry {
  return {
    primaryText,
    identity: deriveIdentity(primaryText, null),
    link: null,
    publishedAt: day === null ? null : new Date(Date.UTC(2024, 0, day)),
    read: false,
  };
}

function addChannel(link: string, entries: Entry[]): string {
  const id = insertChannel(db, { title: link, link, description: '', lastBuildDate: null, entries: [] });
  storeEntries(db, id, entries);
  return id;
}

function numbering(): Array<[number, string]> {
  const rows = listQuickmarks(db);
  const text = new Map(
    (db.prepare('SELECT identity, primary_text FROM entries').all() as Array<{ identity: string; primary_text: string }>).map(
      (r) => [r.identity, r.primary_text],
    ),
  );
  return rows.map((r) => [r.position, text.get(r.identity) ?? '?']);
}

beforeEach(() => {
  db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  overlay = new QuickmarkOverlay(db);
});

afterEach(() => {
  db.close();
});

describe('compareForNumbering', () => {
  it('orders by date, then undated, then identity', () => {
    const entries = [makeEntry('late', 9), makeEntry('undated', null), makeEntry('early', 1)];
    expect(entries.sort(compareForNumbering).map((e) => e.primaryText)).toEqual(['early', 'late', 'undated']);
  });

  it('breaks date ties by identity', () => {
    const a = makeEntry('a', 1);
    const b = makeEntry('b', 1);
    const expected = [a, b].sort((x, y) => (x.identity < y.identity ? -1 : 1)).map((e) => e.primaryText);
    expect([b, a].sort(compareForNumbering).map((e) => e.primaryText)).toEqual(expected);
  });
});

describe('reset', () => {
  it('numbers unread entries 1..N in ascending publish order', () => {
    addChannel('https://a.example', [makeEntry('three', 3), makeEntry('one', 1), makeEntry('two', 2)]);

    const listed = overlay.reset();
    expect(listed.map((q) => [q.position, q.entry.primaryText])).toEqual([
      [1, 'one'],
      [2, 'two'],
      [3, 'three'],
    ]);
    expect(numbering()).toEqual([
      [1, 'one'],
      [2, 'two'],
      [3, 'three'],
    ]);
  });

  it('ignores prior numbering and read entries', () => {
    const [three, one, two] = [makeEntry('three', 3), makeEntry('one', 1), makeEntry('two', 2)];
    addChannel('https://a.example', [three, one, two]);
    overlay.extend([three]);
    overlay.extend([one, two]);
    expect(numbering()).toEqual([
      [1, 'three'],
      [2, 'one'],
      [3, 'two'],
    ]);
    setRead(db, one.identity, true);

    overlay.reset();
    expect(numbering()).toEqual([
      [1, 'two'],
      [2, 'three'],
    ]);
  });

  it('clears every position when nothing is unread', () => {
    const entry = makeEntry('only', 1);
    addChannel('https://a.example', [entry]);
    overlay.reset();
    setRead(db, entry.identity, true);

    expect(overlay.reset()).toEqual([]);
    expect(maxPosition(db)).toBe(0);
  });
});

describe('extend', () => {
  it('keeps 1..N and appends N+1..N+M', () => {
    addChannel('https://a.example', [makeEntry('a1', 1), makeEntry('a2', 2)]);
    overlay.reset();

    const fresh = [makeEntry('b2', 20), makeEntry('b1', 10), makeEntry('b0', null)];
    addChannel('https://b.example', fresh);
    const appended = overlay.extend(fresh);

    expect(appended.map((q) => [q.position, q.entry.primaryText])).toEqual([
      [3, 'b1'],
      [4, 'b2'],
      [5, 'b0'],
    ]);
    expect(numbering()).toEqual([
      [1, 'a1'],
      [2, 'a2'],
      [3, 'b1'],
      [4, 'b2'],
      [5, 'b0'],
    ]);
  });

  it('appends after the current maximum position', () => {
    const entries = [makeEntry('a1', 1), makeEntry('a2', 2)];
    addChannel('https://a.example', entries);
    overlay.reset();
    overlay.release(entries[1].identity);

    const fresh = [makeEntry('b1', 1)];
    addChannel('https://b.example', fresh);
    expect(overlay.extend(fresh).map((q) => q.position)).toEqual([2]);

    overlay.release(entries[0].identity);
    const more = [makeEntry('c1', 1)];
    addChannel('https://c.example', more);
    expect(overlay.extend(more).map((q) => q.position)).toEqual([3]);
  });

  it('does not number an entry twice or number read entries', () => {
    const entry = makeEntry('a1', 1);
    addChannel('https://a.example', [entry]);
    overlay.extend([entry]);

    expect(overlay.extend([entry])).toEqual([]);
    expect(overlay.extend([{ ...makeEntry('read', 2), read: true }])).toEqual([]);
    expect(maxPosition(db)).toBe(1);
  });
});

describe('release', () => {
  it('drops one position and leaves the others alone', () => {
    const entries = [makeEntry('one', 1), makeEntry('two', 2), makeEntry('three', 3)];
    addChannel('https://a.example', entries);
    overlay.reset();

    expect(overlay.release(entries[1].identity)).toBe(true);
    expect(numbering()).toEqual([
      [1, 'one'],
      [3, 'three'],
    ]);
    expect(overlay.resolve(2)).toBeUndefined();
    expect(overlay.resolve(3)).toBe(entries[2].identity);
  });

  it('reports when there was nothing to release', () => {
    expect(overlay.release('0'.repeat(40))).toBe(false);
  });
});

describe('releaseChannel', () => {
  it('drops only the positions of that channel', () => {
    const aId = addChannel('https://a.example', [makeEntry('a1', 1), makeEntry('a2', 3)]);
    addChannel('https://b.example', [makeEntry('b1', 2)]);
    overlay.reset();

    expect(overlay.releaseChannel(aId)).toBe(2);
    expect(numbering()).toEqual([[2, 'b1']]);
  });

  it('is also enforced by the channel delete cascade', () => {
    const aId = addChannel('https://a.example', [makeEntry('a1', 1)]);
    addChannel('https://b.example', [makeEntry('b1', 2)]);
    overlay.reset();

    deleteChannel(db, aId);
    expect(numbering()).toEqual([[2, 'b1']]);
  });
});
