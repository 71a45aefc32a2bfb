/**
 * Knockout mode: sudden-death elimination down to a single winner.
 *
 * Every entrant in scope is either ACTIVE or ELIMINATED. Scope is the
 * curated pool when one exists, otherwise every eligible entrant. The run
 * is over when exactly one ACTIVE entrant remains.
 *
 * All state lives in the store; `loadKnockoutState` rebuilds the in-memory
 * view on demand.
 */

import type {
  Bout,
  BoutOutcome,
  BoutResult,
  Entrant,
  EntrantId,
  EntrantRepository,
  KnockoutState,
  ResultCommand,
  StandingRow,
} from './types';
import { recordResult } from './elo';
import { defaultRandom, sampleWithoutReplacement, selectionWeight } from './matchmaking';
import type { RandomSource } from './matchmaking';
import {
  ConfigurationConflictError,
  InsufficientEntrantsError,
  InvalidCommandError,
} from './errors';
import type { SessionLogger } from '../logging/session-logger';

/**
 * Exponent for the top-skew phase of pool curation. Fixed and steeper than
 * any sensible user power, so the phase always brings in strong,
 * rarely-played entrants.
 */
export const TOP_SKEW_POWER = 3;

/**
 * What a judged command does: the rating result and who leaves the run.
 */
export interface CommandResolution {
  base: BoutResult;
  eliminateA: boolean;
  eliminateB: boolean;
}

const COMMAND_TABLE: Record<ResultCommand, CommandResolution> = {
  A: { base: 'A', eliminateA: false, eliminateB: true },
  B: { base: 'B', eliminateA: true, eliminateB: false },
  tie: { base: 'tie', eliminateA: false, eliminateB: false },
  'A-': { base: 'A', eliminateA: true, eliminateB: false },
  'B-': { base: 'B', eliminateA: false, eliminateB: true },
  'A+': { base: 'A', eliminateA: false, eliminateB: false },
  'B+': { base: 'B', eliminateA: false, eliminateB: false },
  'TA-': { base: 'tie', eliminateA: true, eliminateB: false },
  'TB-': { base: 'tie', eliminateA: false, eliminateB: true },
  'T-': { base: 'tie', eliminateA: true, eliminateB: true },
};

const UPPERCASE_COMMANDS: ReadonlyMap<string, ResultCommand> = new Map([
  ['A', 'A'],
  ['B', 'B'],
  ['T', 'tie'],
  ['TIE', 'tie'],
  ['A-', 'A-'],
  ['B-', 'B-'],
  ['A+', 'A+'],
  ['B+', 'B+'],
  ['TA-', 'TA-'],
  ['TB-', 'TB-'],
  ['T-', 'T-'],
]);

/**
 * Parse judge input such as `a`, `T`, `tb-`. Returns null for anything that
 * is not a result command.
 */
export function parseResultCommand(input: string): ResultCommand | null {
  return UPPERCASE_COMMANDS.get(input.trim().toUpperCase()) ?? null;
}

export function resolveCommand(command: ResultCommand): CommandResolution {
  return COMMAND_TABLE[command];
}

/**
 * Commands other than a plain A/B/tie only make sense in knockout mode.
 */
export function isKnockoutOnly(command: ResultCommand): boolean {
  return command !== 'A' && command !== 'B' && command !== 'tie';
}

/**
 * Read-through snapshot of knockout bookkeeping.
 */
export interface KnockoutSnapshot {
  pool: Set<EntrantId>;
  eliminated: Set<EntrantId>;
}

export function loadKnockoutState(store: EntrantRepository): KnockoutSnapshot {
  return {
    pool: new Set(store.loadPool()),
    eliminated: new Set(store.listEliminations().map((mark) => mark.entrantId)),
  };
}

export function entrantState(id: EntrantId, snapshot: KnockoutSnapshot): KnockoutState {
  return snapshot.eliminated.has(id) ? 'ELIMINATED' : 'ACTIVE';
}

/**
 * Narrow eligible entrants to those still competing: pool members (when a
 * pool exists) that carry no elimination mark.
 */
export function scopeEntrants(entrants: readonly Entrant[], snapshot: KnockoutSnapshot): Entrant[] {
  return entrants.filter(
    (e) => (snapshot.pool.size === 0 || snapshot.pool.has(e.id)) && !snapshot.eliminated.has(e.id)
  );
}

/**
 * The winner, once exactly one entrant is left in scope.
 */
export function findWinner(scoped: readonly Entrant[]): Entrant | null {
  return scoped.length === 1 ? scoped[0] : null;
}

export interface AppliedCommand {
  command: ResultCommand;
  resolution: CommandResolution;
  outcome: BoutOutcome;
  /** Entrants eliminated by this command, A before B */
  eliminated: EntrantId[];
}

export interface ApplyCommandOptions {
  knockout: boolean;
  logger?: SessionLogger;
}

/**
 * Apply a judged command to a bout: record the base result and, in knockout
 * mode, write the elimination marks. Both happen in one transaction.
 */
export function applyCommand(
  store: EntrantRepository,
  bout: Bout,
  command: ResultCommand,
  options: ApplyCommandOptions
): AppliedCommand {
  if (!options.knockout && isKnockoutOnly(command)) {
    throw new InvalidCommandError(command, `${command} is only available in knockout mode`);
  }

  const resolution = resolveCommand(command);

  const applied = store.transaction(() => {
    const outcome = recordResult(store, bout.a.id, bout.b.id, resolution.base);
    const eliminated: EntrantId[] = [];
    if (options.knockout) {
      if (resolution.eliminateA) eliminated.push(bout.a.id);
      if (resolution.eliminateB) eliminated.push(bout.b.id);
      if (eliminated.length > 0) {
        store.markEliminated(eliminated);
      }
    }
    return { command, resolution, outcome, eliminated };
  });

  options.logger?.boutRecorded(
    command,
    resolution.base,
    bout.a.id,
    bout.b.id,
    applied.outcome.a.newElo,
    applied.outcome.b.newElo
  );
  for (const id of applied.eliminated) {
    options.logger?.entrantEliminated(id, id === bout.a.id ? bout.a.path : bout.b.path);
  }

  return applied;
}

export type CurationPhase = 'custom' | 'top-skew';

export interface PoolSelection {
  entrant: Entrant;
  phase: CurationPhase;
}

/**
 * Curate a knockout pool of `totalSize` distinct entrants.
 *
 * `totalSize - topSkewSize` are drawn with the caller's `power`, then
 * `topSkewSize` more from those left using `TOP_SKEW_POWER`.
 */
export function curatePool(
  entrants: readonly Entrant[],
  totalSize: number,
  topSkewSize: number,
  power: number,
  random: RandomSource = defaultRandom
): PoolSelection[] {
  if (!Number.isInteger(totalSize) || totalSize < 2) {
    throw new RangeError(`Pool size must be an integer of at least 2, got ${totalSize}`);
  }
  if (!Number.isInteger(topSkewSize) || topSkewSize < 0 || topSkewSize > totalSize) {
    throw new RangeError(`Top-skew size must be between 0 and ${totalSize}, got ${topSkewSize}`);
  }
  if (entrants.length < totalSize) {
    throw new InsufficientEntrantsError(entrants.length, totalSize);
  }

  const customCount = totalSize - topSkewSize;
  const custom = sampleWithoutReplacement(
    entrants,
    entrants.map((e) => selectionWeight(e, power)),
    customCount,
    random
  );

  const taken = new Set(custom.map((e) => e.id));
  const rest = entrants.filter((e) => !taken.has(e.id));
  const topSkew = sampleWithoutReplacement(
    rest,
    rest.map((e) => selectionWeight(e, TOP_SKEW_POWER)),
    topSkewSize,
    random
  );

  return [
    ...custom.map((entrant): PoolSelection => ({ entrant, phase: 'custom' })),
    ...topSkew.map((entrant): PoolSelection => ({ entrant, phase: 'top-skew' })),
  ];
}

export interface StartKnockoutOptions {
  /** Requested pool size; omit to let every eligible entrant compete */
  poolSize?: number;
  /** How many of the pool come from the top-skew phase */
  topSkew?: number;
  power: number;
  random?: RandomSource;
  logger?: SessionLogger;
}

export interface KnockoutStart {
  resumed: boolean;
  /** 0 when there is no pool */
  poolSize: number;
  eliminatedCount: number;
  competingCount: number;
  selection: PoolSelection[];
}

/**
 * Resume the persisted knockout run, or start one, curating a pool when a
 * size is requested.
 *
 * @throws ConfigurationConflictError if a pool exists with a different size
 */
export function startKnockout(
  store: EntrantRepository,
  eligible: readonly Entrant[],
  options: StartKnockoutOptions
): KnockoutStart {
  const snapshot = loadKnockoutState(store);
  const savedSize = store.poolSize();

  if (snapshot.eliminated.size > 0 || savedSize > 0) {
    if (options.poolSize !== undefined && savedSize > 0 && savedSize !== options.poolSize) {
      throw new ConfigurationConflictError(savedSize, options.poolSize);
    }
    options.logger?.knockoutResumed(savedSize, snapshot.eliminated.size);
    return {
      resumed: true,
      poolSize: savedSize,
      eliminatedCount: snapshot.eliminated.size,
      competingCount: scopeEntrants(eligible, snapshot).length,
      selection: [],
    };
  }

  if (options.poolSize === undefined) {
    return {
      resumed: false,
      poolSize: 0,
      eliminatedCount: 0,
      competingCount: eligible.length,
      selection: [],
    };
  }

  const topSkew = options.topSkew ?? 0;
  const selection = curatePool(eligible, options.poolSize, topSkew, options.power, options.random);
  store.savePool(selection.map((s) => s.entrant.id));
  options.logger?.poolCreated(options.poolSize, topSkew, options.power);

  return {
    resumed: false,
    poolSize: selection.length,
    eliminatedCount: 0,
    competingCount: selection.length,
    selection,
  };
}

/**
 * Clear every elimination mark and the pool, putting all entrants back in.
 */
export function resetKnockout(store: EntrantRepository, logger?: SessionLogger, exportedTo?: string): void {
  store.transaction(() => {
    store.clearEliminations();
    store.clearPool();
  });
  logger?.knockoutReset(exportedTo);
}

/**
 * Final ordering of a knockout run: winner, then most recently eliminated,
 * equal times broken by Elo.
 */
export function knockoutStandings(store: EntrantRepository): StandingRow[] {
  return store.standings();
}
