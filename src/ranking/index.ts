/**
 * Pairwise ranking with Elo ratings.
 *
 * Features:
 * - Zero-sum Elo updates with win/loss/tie bookkeeping
 * - Rating redistribution when an entrant is removed
 * - Weighted matchmaking favouring close, under-played bouts
 * - Knockout runs with curated pools and resumable state
 *
 * @module ranking
 */

export type {
  EntrantId,
  Entrant,
  BoutResult,
  GameRecord,
  EliminationMark,
  ResultCommand,
  KnockoutState,
  Bout,
  RecordColumn,
  RatingUpdate,
  BoutOutcome,
  StandingRow,
  EntrantRepository,
} from './types';

export {
  RankingError,
  ConfigurationConflictError,
  InsufficientEntrantsError,
  UnknownEntrantError,
  EmptyCandidateSetError,
  InvalidCommandError,
  isFatalRankingError,
} from './errors';

// Elo calculations
export {
  winProbability,
  applyResult,
  recordResult,
  redistribute,
  removeEntrant,
  gamesPlayed,
  K_FACTOR,
  DEFAULT_ELO,
  REDISTRIBUTION_EPSILON,
} from './elo';

// Matchmaking
export {
  selectionWeight,
  closenessWeight,
  weightedIndex,
  sampleWithoutReplacement,
  pickFirst,
  pickSecond,
  pickBout,
  defaultRandom,
} from './matchmaking';
export type { RandomSource } from './matchmaking';

// Knockout
export {
  parseResultCommand,
  resolveCommand,
  isKnockoutOnly,
  loadKnockoutState,
  entrantState,
  scopeEntrants,
  findWinner,
  applyCommand,
  curatePool,
  startKnockout,
  resetKnockout,
  knockoutStandings,
  TOP_SKEW_POWER,
} from './knockout';
export type {
  CommandResolution,
  KnockoutSnapshot,
  AppliedCommand,
  ApplyCommandOptions,
  CurationPhase,
  PoolSelection,
  StartKnockoutOptions,
  KnockoutStart,
} from './knockout';
