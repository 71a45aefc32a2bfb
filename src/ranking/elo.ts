/**
 * Elo rating calculations for pairwise bouts.
 *
 * Each bout is zero-sum: whatever side A gains, side B loses. Removing an
 * entrant spreads its deviation from the starting rating over everyone left,
 * which keeps every pairwise gap (and so every win probability) intact.
 */

import type {
  BoutOutcome,
  BoutResult,
  Entrant,
  EntrantId,
  EntrantRepository,
  RecordColumn,
} from './types';
import { UnknownEntrantError } from './errors';
import type { SessionLogger } from '../logging/session-logger';

/**
 * K-factor: the largest rating change a single bout can produce.
 */
export const K_FACTOR = 32;

/**
 * Starting Elo rating, and the baseline for redistribution on removal.
 */
export const DEFAULT_ELO = 1000;

/**
 * Redistribution deltas smaller than this are not worth spreading.
 */
export const REDISTRIBUTION_EPSILON = 0.01;

/**
 * Probability of A beating B under the standard Elo model.
 *
 * @returns Probability in (0, 1); `winProbability(a, b) + winProbability(b, a) === 1`
 */
export function winProbability(eloA: number, eloB: number): number {
  return 1 / (1 + Math.pow(10, (eloB - eloA) / 400));
}

const ACTUAL_SCORE: Record<BoutResult, number> = {
  A: 1,
  B: 0,
  tie: 0.5,
};

/**
 * New ratings for both sides after a bout.
 *
 * B's change is taken as the exact negation of A's so the pair always sums
 * to zero.
 */
export function applyResult(
  eloA: number,
  eloB: number,
  result: BoutResult,
  kFactor: number = K_FACTOR
): { eloA: number; eloB: number } {
  const expectedA = winProbability(eloA, eloB);
  const deltaA = kFactor * (ACTUAL_SCORE[result] - expectedA);
  return { eloA: eloA + deltaA, eloB: eloB - deltaA };
}

function recordColumns(result: BoutResult): [RecordColumn, RecordColumn] {
  switch (result) {
    case 'A':
      return ['wins', 'losses'];
    case 'B':
      return ['losses', 'wins'];
    case 'tie':
      return ['ties', 'ties'];
  }
}

export function gamesPlayed(entrant: Entrant): number {
  return entrant.wins + entrant.losses + entrant.ties;
}

/**
 * Record a bout: update both ratings, bump the win/loss/tie counters and
 * append the game, all in one transaction. Unknown ids abort before any
 * write.
 */
export function recordResult(
  store: EntrantRepository,
  idA: EntrantId,
  idB: EntrantId,
  result: BoutResult
): BoutOutcome {
  return store.transaction(() => {
    const a = store.getEntrant(idA);
    if (!a) throw new UnknownEntrantError(idA);
    const b = store.getEntrant(idB);
    if (!b) throw new UnknownEntrantError(idB);

    const updated = applyResult(a.elo, b.elo, result);
    const [recordA, recordB] = recordColumns(result);

    store.updateRatings(
      { id: a.id, elo: updated.eloA, record: recordA },
      { id: b.id, elo: updated.eloB, record: recordB }
    );
    const game = store.appendGame(a.id, b.id, result);

    return {
      game,
      a: { id: a.id, oldElo: a.elo, newElo: updated.eloA },
      b: { id: b.id, oldElo: b.elo, newElo: updated.eloB },
    };
  });
}

/**
 * Spread `delta` evenly over every entrant except `excludedId`.
 *
 * @returns The amount added to each entrant (0 when skipped)
 */
export function redistribute(
  store: EntrantRepository,
  delta: number,
  excludedId: EntrantId,
  logger?: SessionLogger
): number {
  if (Math.abs(delta) < REDISTRIBUTION_EPSILON) {
    logger?.redistributionSkipped(delta, 'negligible delta');
    return 0;
  }

  const remaining = store.countEntrants(excludedId);
  if (remaining === 0) {
    logger?.redistributionSkipped(delta, 'no remaining entrants');
    console.warn('Warning: No remaining entrants to redistribute Elo to');
    return 0;
  }

  const adjustment = delta / remaining;
  store.adjustRatings(adjustment, excludedId);
  return adjustment;
}

/**
 * Remove an entrant with its games, elimination mark and pool membership,
 * then redistribute its rating deviation across the survivors.
 */
export function removeEntrant(
  store: EntrantRepository,
  id: EntrantId,
  logger?: SessionLogger
): { removed: Entrant; adjustment: number } {
  return store.transaction(() => {
    const removed = store.getEntrant(id);
    if (!removed) throw new UnknownEntrantError(id);

    store.deleteEntrant(id);
    const adjustment = redistribute(store, removed.elo - DEFAULT_ELO, id, logger);
    logger?.entrantRemoved(removed.id, removed.path, removed.elo, adjustment);

    return { removed, adjustment };
  });
}
