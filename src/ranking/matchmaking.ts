/**
 * Weighted matchmaking for bouts.
 *
 * The first entrant is drawn in favour of strong and under-played entrants;
 * the second in favour of opponents close to the first in rating, so bouts
 * stay competitive.
 */

import type { Bout, Entrant } from './types';
import { DEFAULT_ELO, gamesPlayed, winProbability } from './elo';
import { EmptyCandidateSetError, InsufficientEntrantsError } from './errors';

/**
 * Source of uniform random numbers in [0, 1).
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * First-pick weight: chance of beating a default-rated entrant, damped by
 * how often the entrant has already played.
 *
 * `power` 0 ignores play count; larger values favour the least-played.
 */
export function selectionWeight(entrant: Entrant, power: number): number {
  const eloWeight = winProbability(entrant.elo, DEFAULT_ELO);
  const gamesWeight = 1 / Math.pow(gamesPlayed(entrant) + 1, power);
  return eloWeight * gamesWeight;
}

/**
 * Second-pick weight: the underdog's chance in the pair, highest (0.5) for
 * equal ratings.
 */
export function closenessWeight(first: Entrant, candidate: Entrant): number {
  const low = Math.min(first.elo, candidate.elo);
  const high = Math.max(first.elo, candidate.elo);
  return winProbability(low, high);
}

function usableWeight(weight: number): number {
  return Number.isFinite(weight) && weight > 0 ? weight : 0;
}

/**
 * Draw an index with probability proportional to its weight. Falls back to
 * a uniform draw when no weight is usable.
 */
export function weightedIndex(weights: number[], random: RandomSource = defaultRandom): number {
  if (weights.length === 0) {
    throw new InsufficientEntrantsError(0, 1);
  }

  const total = weights.reduce((sum, w) => sum + usableWeight(w), 0);
  if (!(total > 0) || !Number.isFinite(total)) {
    return Math.min(Math.floor(random() * weights.length), weights.length - 1);
  }

  let threshold = random() * total;
  let lastUsable = 0;
  for (let i = 0; i < weights.length; i++) {
    const weight = usableWeight(weights[i]);
    if (weight === 0) continue;
    lastUsable = i;
    if (threshold < weight) {
      return i;
    }
    threshold -= weight;
  }
  // Rounding can leave a sliver past the final bucket
  return lastUsable;
}

/**
 * Draw `count` distinct items. Each draw removes the chosen item and its
 * weight (swap-removal by index) before the next.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  weights: readonly number[],
  count: number,
  random: RandomSource = defaultRandom
): T[] {
  if (items.length !== weights.length) {
    throw new Error(`Expected ${items.length} weights, got ${weights.length}`);
  }
  if (count > items.length) {
    throw new InsufficientEntrantsError(items.length, count);
  }

  const remainingItems = [...items];
  const remainingWeights = [...weights];
  const selected: T[] = [];

  for (let n = 0; n < count; n++) {
    const index = weightedIndex(remainingWeights, random);
    selected.push(remainingItems[index]);

    const last = remainingItems.length - 1;
    remainingItems[index] = remainingItems[last];
    remainingWeights[index] = remainingWeights[last];
    remainingItems.pop();
    remainingWeights.pop();
  }

  return selected;
}

/**
 * Pick the first entrant of a bout.
 */
export function pickFirst(
  entrants: readonly Entrant[],
  power: number,
  random: RandomSource = defaultRandom
): Entrant {
  if (entrants.length === 0) {
    throw new InsufficientEntrantsError(0, 1);
  }
  const weights = entrants.map((e) => selectionWeight(e, power));
  return entrants[weightedIndex(weights, random)];
}

/**
 * Pick an opponent for `first`, or null when nobody else is eligible.
 */
export function pickSecond(
  entrants: readonly Entrant[],
  first: Entrant,
  random: RandomSource = defaultRandom
): Entrant | null {
  const candidates = entrants.filter((e) => e.id !== first.id);
  if (candidates.length === 0) {
    return null;
  }
  const weights = candidates.map((c) => closenessWeight(first, c));
  return candidates[weightedIndex(weights, random)];
}

/**
 * Select both sides of the next bout.
 */
export function pickBout(
  entrants: readonly Entrant[],
  power: number,
  random: RandomSource = defaultRandom
): Bout {
  if (entrants.length < 2) {
    throw new InsufficientEntrantsError(entrants.length, 2);
  }
  const a = pickFirst(entrants, power, random);
  const b = pickSecond(entrants, a, random);
  if (!b) {
    throw new EmptyCandidateSetError();
  }
  return { a, b };
}
