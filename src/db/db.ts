import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

let dbInstance: Database.Database | null = null;

export function initDb(dbPath: string): Database.Database {
  if (dbInstance) return dbInstance;

  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  try {
    const db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');

    dbInstance = db;
    logger.debug({ path: resolved }, 'Database initialized');
    return db;
  } catch (err) {
    throw new DbError(`Failed to initialize database at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
}

export function closeDb(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}

/**
 * Record the identity scheme on first use and reject a store created with another one.
 * Entries hashed under different schemes would never deduplicate against each other.
 */
export function ensureIdentityScheme(db: Database.Database, version: string): void {
  const row = db.prepare("SELECT value FROM store_meta WHERE key = 'identity_scheme'").get() as
    | { value: string }
    | undefined;

  if (!row) {
    db.prepare("INSERT INTO store_meta (key, value) VALUES ('identity_scheme', ?)").run(version);
    return;
  }
  if (row.value !== version) {
    throw new DbError(`Store uses identity scheme ${row.value}, but ${version} is configured`, {
      stored: row.value,
      configured: version,
    });
  }
}
