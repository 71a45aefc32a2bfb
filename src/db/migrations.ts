/**
 * Versioned schema for the ranking database.
 *
 * Applied versions are recorded in `schema_migrations`; `migrate` brings a
 * database from whatever version it is at up to the latest, all pending
 * steps in a single transaction.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  /** SQL run once when the version is applied */
  up: string;
}

/**
 * Ordered by version. New versions go at the end.
 */
export const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      CREATE TABLE entrants (
        id INTEGER PRIMARY KEY,
        path TEXT UNIQUE NOT NULL,
        elo REAL NOT NULL DEFAULT 1000,
        wins INTEGER NOT NULL DEFAULT 0 CHECK (wins >= 0),
        losses INTEGER NOT NULL DEFAULT 0 CHECK (losses >= 0),
        ties INTEGER NOT NULL DEFAULT 0 CHECK (ties >= 0)
      );

      CREATE TABLE games (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        entrant_a_id INTEGER NOT NULL REFERENCES entrants(id) ON DELETE CASCADE,
        entrant_b_id INTEGER NOT NULL REFERENCES entrants(id) ON DELETE CASCADE,
        result TEXT NOT NULL CHECK (result IN ('A', 'B', 'tie')),
        timestamp TEXT NOT NULL
      );

      CREATE TABLE eliminations (
        entrant_id INTEGER PRIMARY KEY REFERENCES entrants(id) ON DELETE CASCADE,
        eliminated_at TEXT NOT NULL
      );

      CREATE TABLE knockout_pool (
        entrant_id INTEGER PRIMARY KEY REFERENCES entrants(id) ON DELETE CASCADE
      );

      CREATE INDEX idx_games_entrant_a ON games(entrant_a_id);
      CREATE INDEX idx_games_entrant_b ON games(entrant_b_id);
      CREATE INDEX idx_entrants_elo ON entrants(elo DESC);
    `,
  },
  {
    version: 2,
    name: 'knockout_pool_size',
    up: `
      CREATE TABLE knockout_meta (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        pool_size INTEGER NOT NULL CHECK (pool_size > 0)
      );

      INSERT INTO knockout_meta (id, pool_size)
        SELECT 1, n FROM (SELECT COUNT(*) AS n FROM knockout_pool) WHERE n > 0;
    `,
  },
];

const MIGRATIONS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

/**
 * Highest applied version, 0 for a fresh database.
 */
export function getCurrentVersion(db: Database.Database): number {
  db.exec(MIGRATIONS_TABLE_SQL);
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
    .get();
  return row?.version ?? 0;
}

/**
 * Apply every migration newer than the current version. Either all of them
 * land or none do.
 *
 * @returns How many versions were applied
 */
export function migrate(db: Database.Database): number {
  const from = getCurrentVersion(db);
  const pending = migrations.filter((m) => m.version > from);

  const record = db.prepare<[number, string]>('INSERT INTO schema_migrations (version, name) VALUES (?, ?)');
  db.transaction((steps: Migration[]) => {
    for (const step of steps) {
      db.exec(step.up);
      record.run(step.version, step.name);
    }
  })(pending);

  return pending.length;
}
