/**
 * The ranking database lives beside the files it ranks. One connection is
 * held per process; opening another closes the first.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

/**
 * Database file name, created inside the ranked directory.
 */
export const DB_NAME = '.pairwise-elo.db';

export const MEMORY_DB = ':memory:';

let _db: Database.Database | null = null;

export function dbPathFor(targetDir: string): string {
  return path.join(targetDir, DB_NAME);
}

/**
 * Open `dbPath`, creating its directory when needed. `:memory:` gives a
 * throwaway in-process database.
 */
export function openDb(dbPath: string): Database.Database {
  closeDb();

  if (dbPath !== MEMORY_DB) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  _db = new Database(dbPath);

  // WAL journal; writes happen one bout at a time
  _db.pragma('journal_mode = WAL');
  _db.pragma('foreign_keys = ON');

  return _db;
}

/** Safe to call when nothing is open. */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
