/**
 * Core types for pairwise Elo ranking.
 *
 * Entrants are ranked through judged bouts in either ladder mode (ratings
 * evolve indefinitely) or knockout mode (entrants are eliminated until a
 * single winner remains).
 */

/**
 * Unique identifier for an entrant (database row id).
 */
export type EntrantId = number;

/**
 * A ranked competitor. `path` is the file it stands for, relative to the
 * target directory.
 */
export interface Entrant {
  id: EntrantId;
  path: string;
  /** Current Elo rating */
  elo: number;
  wins: number;
  losses: number;
  ties: number;
}

/**
 * Outcome of a bout from side A's point of view.
 */
export type BoutResult = 'A' | 'B' | 'tie';

/**
 * A single judged bout, as stored. Never modified after it is written.
 */
export interface GameRecord {
  id: number;
  entrantA: EntrantId;
  entrantB: EntrantId;
  result: BoutResult;
  /** ISO 8601 timestamp */
  timestamp: string;
}

export interface EliminationMark {
  entrantId: EntrantId;
  /** ISO 8601 timestamp with millisecond precision */
  eliminatedAt: string;
}

/**
 * Judged outcome of the current bout, including the knockout suffixes.
 *
 * A trailing `-` eliminates the named side whatever the result, a trailing
 * `+` on a win spares the loser.
 */
export type ResultCommand = 'A' | 'B' | 'tie' | 'A-' | 'B-' | 'A+' | 'B+' | 'TA-' | 'TB-' | 'T-';

export type KnockoutState = 'ACTIVE' | 'ELIMINATED';

/**
 * Two entrants facing each other. `a` is always the first pick.
 */
export interface Bout {
  a: Entrant;
  b: Entrant;
}

/**
 * Per-entrant counter to increment alongside a rating update.
 */
export type RecordColumn = 'wins' | 'losses' | 'ties';

export interface RatingUpdate {
  id: EntrantId;
  elo: number;
  record: RecordColumn;
}

/**
 * Rating movement produced by one recorded bout.
 */
export interface BoutOutcome {
  game: GameRecord;
  a: { id: EntrantId; oldElo: number; newElo: number };
  b: { id: EntrantId; oldElo: number; newElo: number };
}

/**
 * A row of the knockout standings: winner first, then most recently
 * eliminated.
 */
export interface StandingRow {
  entrant: Entrant;
  eliminatedAt: string | null;
}

/**
 * Persistence operations the engine relies on. Implemented over SQLite by
 * `EntrantStore`; every method is synchronous.
 */
export interface EntrantRepository {
  getEntrant(id: EntrantId): Entrant | undefined;
  listEntrants(): Entrant[];
  countEntrants(excludedId?: EntrantId): number;
  /** Writes both ratings and increments the named counters. */
  updateRatings(a: RatingUpdate, b: RatingUpdate): void;
  appendGame(entrantA: EntrantId, entrantB: EntrantId, result: BoutResult): GameRecord;
  /** Adds `amount` to every entrant except `excludedId`; returns rows changed. */
  adjustRatings(amount: number, excludedId: EntrantId): number;
  /** Deletes the entrant together with its games, mark and pool membership. */
  deleteEntrant(id: EntrantId): void;
  markEliminated(ids: EntrantId[]): void;
  listEliminations(): EliminationMark[];
  clearEliminations(): void;
  savePool(ids: EntrantId[]): void;
  loadPool(): EntrantId[];
  /** Size the pool was created with, 0 when there is none. Removals do not change it. */
  poolSize(): number;
  clearPool(): void;
  standings(): StandingRow[];
  transaction<T>(fn: () => T): T;
}
