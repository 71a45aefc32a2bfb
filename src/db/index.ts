/**
 * Database module - SQLite persistence layer.
 */

import type Database from 'better-sqlite3';
import { openDb } from './connection';
import { migrate } from './migrations';
import { EntrantStore } from './store';
import type { EntrantStoreOptions } from './store';

export { openDb, closeDb, dbPathFor, DB_NAME, MEMORY_DB } from './connection';
export { migrate, getCurrentVersion, migrations } from './migrations';
export type { Migration } from './migrations';
export { EntrantStore } from './store';
export type { EntrantStoreOptions, UpsertResult } from './store';

/**
 * Open the database at `dbPath`, bring its schema up to date and wrap it in
 * a store.
 */
export function openStore(
  dbPath: string,
  options: EntrantStoreOptions = {}
): { db: Database.Database; store: EntrantStore } {
  const db = openDb(dbPath);
  migrate(db);
  return { db, store: new EntrantStore(db, options) };
}
