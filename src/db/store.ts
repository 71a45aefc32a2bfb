/**
 * EntrantStore - SQLite-backed persistence for entrants, games and knockout
 * state.
 *
 * The store is the single source of truth: the session loop re-reads it at
 * the top of every iteration instead of keeping parallel in-memory sets.
 */

import type Database from 'better-sqlite3';
import type {
  BoutResult,
  EliminationMark,
  Entrant,
  EntrantId,
  EntrantRepository,
  GameRecord,
  RatingUpdate,
  RecordColumn,
  StandingRow,
} from '../ranking/types';
import { DEFAULT_ELO } from '../ranking/elo';

interface EntrantRow {
  id: number;
  path: string;
  elo: number;
  wins: number;
  losses: number;
  ties: number;
}

interface GameRow {
  id: number;
  entrant_a_id: number;
  entrant_b_id: number;
  result: BoutResult;
  timestamp: string;
}

interface StandingDbRow extends EntrantRow {
  eliminated_at: string | null;
}

export interface EntrantStoreOptions {
  /** Clock used for game and elimination timestamps */
  now?: () => Date;
}

export interface UpsertResult {
  entrant: Entrant;
  created: boolean;
}

function toEntrant(row: EntrantRow): Entrant {
  return {
    id: row.id,
    path: row.path,
    elo: row.elo,
    wins: row.wins,
    losses: row.losses,
    ties: row.ties,
  };
}

function toGame(row: GameRow): GameRecord {
  return {
    id: row.id,
    entrantA: row.entrant_a_id,
    entrantB: row.entrant_b_id,
    result: row.result,
    timestamp: row.timestamp,
  };
}

const RECORD_UPDATE_SQL: Record<RecordColumn, string> = {
  wins: 'UPDATE entrants SET elo = ?, wins = wins + 1 WHERE id = ?',
  losses: 'UPDATE entrants SET elo = ?, losses = losses + 1 WHERE id = ?',
  ties: 'UPDATE entrants SET elo = ?, ties = ties + 1 WHERE id = ?',
};

export class EntrantStore implements EntrantRepository {
  private db: Database.Database;
  private now: () => Date;

  constructor(db: Database.Database, options: EntrantStoreOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
  }

  getEntrant(id: EntrantId): Entrant | undefined {
    const row = this.db
      .prepare<[number], EntrantRow>('SELECT id, path, elo, wins, losses, ties FROM entrants WHERE id = ?')
      .get(id);
    return row ? toEntrant(row) : undefined;
  }

  getEntrantByPath(path: string): Entrant | undefined {
    const row = this.db
      .prepare<[string], EntrantRow>('SELECT id, path, elo, wins, losses, ties FROM entrants WHERE path = ?')
      .get(path);
    return row ? toEntrant(row) : undefined;
  }

  /**
   * All entrants, optionally narrowed by a predicate over the record.
   */
  listEntrants(filter?: (entrant: Entrant) => boolean): Entrant[] {
    const rows = this.db
      .prepare<[], EntrantRow>('SELECT id, path, elo, wins, losses, ties FROM entrants ORDER BY id')
      .all();
    const entrants = rows.map(toEntrant);
    return filter ? entrants.filter(filter) : entrants;
  }

  countEntrants(excludedId?: EntrantId): number {
    if (excludedId === undefined) {
      const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM entrants').get();
      return row?.count ?? 0;
    }
    const row = this.db
      .prepare<[number], { count: number }>('SELECT COUNT(*) as count FROM entrants WHERE id != ?')
      .get(excludedId);
    return row?.count ?? 0;
  }

  /**
   * Insert an entrant at the default rating. Idempotent: an existing path
   * keeps its record untouched.
   */
  upsertEntrant(path: string): UpsertResult {
    const info = this.db
      .prepare<[string, number]>('INSERT OR IGNORE INTO entrants (path, elo) VALUES (?, ?)')
      .run(path, DEFAULT_ELO);
    const entrant = this.getEntrantByPath(path);
    if (!entrant) {
      throw new Error(`Failed to upsert entrant: ${path}`);
    }
    return { entrant, created: info.changes === 1 };
  }

  renameEntrant(id: EntrantId, newPath: string): void {
    this.db.prepare<[string, number]>('UPDATE entrants SET path = ? WHERE id = ?').run(newPath, id);
  }

  updateRatings(a: RatingUpdate, b: RatingUpdate): void {
    this.transaction(() => {
      for (const update of [a, b]) {
        this.db.prepare<[number, number]>(RECORD_UPDATE_SQL[update.record]).run(update.elo, update.id);
      }
    });
  }

  appendGame(entrantA: EntrantId, entrantB: EntrantId, result: BoutResult): GameRecord {
    const timestamp = this.now().toISOString();
    const info = this.db
      .prepare<[number, number, BoutResult, string]>(
        'INSERT INTO games (entrant_a_id, entrant_b_id, result, timestamp) VALUES (?, ?, ?, ?)'
      )
      .run(entrantA, entrantB, result, timestamp);
    return {
      id: Number(info.lastInsertRowid),
      entrantA,
      entrantB,
      result,
      timestamp,
    };
  }

  /**
   * Games involving the given entrant, or every game, oldest first.
   */
  listGames(entrantId?: EntrantId): GameRecord[] {
    if (entrantId === undefined) {
      return this.db
        .prepare<[], GameRow>('SELECT id, entrant_a_id, entrant_b_id, result, timestamp FROM games ORDER BY id')
        .all()
        .map(toGame);
    }
    return this.db
      .prepare<[number, number], GameRow>(
        'SELECT id, entrant_a_id, entrant_b_id, result, timestamp FROM games WHERE entrant_a_id = ? OR entrant_b_id = ? ORDER BY id'
      )
      .all(entrantId, entrantId)
      .map(toGame);
  }

  adjustRatings(amount: number, excludedId: EntrantId): number {
    const info = this.db
      .prepare<[number, number]>('UPDATE entrants SET elo = elo + ? WHERE id != ?')
      .run(amount, excludedId);
    return info.changes;
  }

  deleteEntrant(id: EntrantId): void {
    // Children first, so this also holds with foreign_keys off
    this.transaction(() => {
      this.db.prepare<[number]>('DELETE FROM eliminations WHERE entrant_id = ?').run(id);
      this.db.prepare<[number]>('DELETE FROM knockout_pool WHERE entrant_id = ?').run(id);
      this.db
        .prepare<[number, number]>('DELETE FROM games WHERE entrant_a_id = ? OR entrant_b_id = ?')
        .run(id, id);
      this.db.prepare<[number]>('DELETE FROM entrants WHERE id = ?').run(id);
    });
  }

  markEliminated(ids: EntrantId[]): void {
    const eliminatedAt = this.now().toISOString();
    const insert = this.db.prepare<[number, string]>(
      'INSERT OR IGNORE INTO eliminations (entrant_id, eliminated_at) VALUES (?, ?)'
    );
    this.transaction(() => {
      for (const id of ids) {
        insert.run(id, eliminatedAt);
      }
    });
  }

  listEliminations(): EliminationMark[] {
    return this.db
      .prepare<[], { entrant_id: number; eliminated_at: string }>(
        'SELECT entrant_id, eliminated_at FROM eliminations ORDER BY eliminated_at, entrant_id'
      )
      .all()
      .map((row) => ({ entrantId: row.entrant_id, eliminatedAt: row.eliminated_at }));
  }

  clearEliminations(): void {
    this.db.prepare('DELETE FROM eliminations').run();
  }

  /**
   * Replace the knockout pool with the given ids. Its size is recorded
   * separately and stays fixed while members are removed.
   */
  savePool(ids: EntrantId[]): void {
    const insert = this.db.prepare<[number]>('INSERT OR IGNORE INTO knockout_pool (entrant_id) VALUES (?)');
    const members = new Set(ids);
    this.transaction(() => {
      this.clearPool();
      for (const id of members) {
        insert.run(id);
      }
      if (members.size > 0) {
        this.db.prepare<[number]>('INSERT INTO knockout_meta (id, pool_size) VALUES (1, ?)').run(members.size);
      }
    });
  }

  loadPool(): EntrantId[] {
    return this.db
      .prepare<[], { entrant_id: number }>('SELECT entrant_id FROM knockout_pool ORDER BY entrant_id')
      .all()
      .map((row) => row.entrant_id);
  }

  poolSize(): number {
    const row = this.db.prepare<[], { pool_size: number }>('SELECT pool_size FROM knockout_meta WHERE id = 1').get();
    return row?.pool_size ?? 0;
  }

  clearPool(): void {
    this.transaction(() => {
      this.db.prepare('DELETE FROM knockout_pool').run();
      this.db.prepare('DELETE FROM knockout_meta').run();
    });
  }

  /**
   * Current rank of every entrant, 1 = highest Elo. Equal ratings are
   * ordered by id so the ranking is deterministic.
   */
  rankings(): Map<EntrantId, number> {
    const rows = this.db
      .prepare<[], { id: number }>('SELECT id FROM entrants ORDER BY elo DESC, id ASC')
      .all();
    const ranks = new Map<EntrantId, number>();
    rows.forEach((row, index) => ranks.set(row.id, index + 1));
    return ranks;
  }

  /**
   * Knockout standings: the uneliminated entrant first, then by elimination
   * time (latest first), then by Elo. Restricted to the pool when one exists.
   */
  standings(): StandingRow[] {
    const rows = this.db
      .prepare<[], StandingDbRow>(
        `SELECT e.id, e.path, e.elo, e.wins, e.losses, e.ties, k.eliminated_at
         FROM entrants e
         LEFT JOIN eliminations k ON e.id = k.entrant_id
         WHERE NOT EXISTS (SELECT 1 FROM knockout_pool)
            OR e.id IN (SELECT entrant_id FROM knockout_pool)
         ORDER BY
           CASE WHEN k.eliminated_at IS NULL THEN 0 ELSE 1 END,
           k.eliminated_at DESC,
           e.elo DESC,
           e.id ASC`
      )
      .all();
    return rows.map((row) => ({ entrant: toEntrant(row), eliminatedAt: row.eliminated_at }));
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}
