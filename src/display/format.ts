/**
 * Text rendering for the judging prompt: matchups, leaderboards, knockout
 * standings and rank movement.
 *
 * Every function returns a string; printing is left to the caller.
 */

import path from 'path';
import type { Bout, BoutOutcome, Entrant, EntrantId, ResultCommand, StandingRow } from '../ranking/types';
import { winProbability } from '../ranking/elo';
import { COLORS, fileLink, histogramColor, paint, probabilityColor } from './colors';
import type { DisplayOptions } from './colors';

export const DEFAULT_LEADERBOARD_SIZE = 10;

export const HISTOGRAM_WIDTH = 40;

export function formatRecord(entrant: Pick<Entrant, 'wins' | 'losses' | 'ties'>): string {
  return `${entrant.wins}W-${entrant.losses}L-${entrant.ties}T`;
}

/**
 * The favourite's chance, always shown as at least 50%: "76% A".
 */
export function formatProbability(probabilityA: number): string {
  if (probabilityA >= 0.5) {
    return `${(probabilityA * 100).toFixed(0)}% A`;
  }
  return `${((1 - probabilityA) * 100).toFixed(0)}% B`;
}

/**
 * Parse `top` or `top N`. Returns null for anything else.
 */
export function parseTopCommand(input: string): number | null {
  const match = /^top(?:\s+(\d+))?$/i.exec(input.trim());
  if (!match) return null;
  if (match[1] === undefined) return DEFAULT_LEADERBOARD_SIZE;
  const n = Number.parseInt(match[1], 10);
  return n > 0 ? n : null;
}

export function histogramBar(elo: number, maxElo: number, width: number = HISTOGRAM_WIDTH): string {
  if (maxElo <= 0) return ' '.repeat(width);
  const ratio = Math.max(0, Math.min(elo / maxElo, 1));
  return '█'.repeat(Math.floor(ratio * width)).padEnd(width);
}

function entrantLabel(entrant: Entrant, targetDir: string, options: DisplayOptions): string {
  return fileLink(options, entrant.path, path.resolve(targetDir, entrant.path));
}

function leaderboardLine(
  rank: number,
  entrant: Entrant,
  maxElo: number,
  targetDir: string,
  options: DisplayOptions
): string {
  const bar = histogramBar(entrant.elo, maxElo);
  const ratio = maxElo > 0 ? entrant.elo / maxElo : 0;
  const elo = String(Math.trunc(entrant.elo)).padStart(4);
  const record = formatRecord(entrant).padEnd(12);
  return (
    `${paint(options, bar, histogramColor(ratio))} ${String(rank).padStart(2)}. ` +
    `${elo} (${record}) ${entrantLabel(entrant, targetDir, options)}`
  );
}

/**
 * Top `limit` entrants by Elo, with histogram bars scaled to the leader.
 * `entrants` must already be sorted by rating.
 */
export function formatLeaderboard(
  entrants: readonly Entrant[],
  limit: number,
  targetDir: string,
  options: DisplayOptions
): string {
  const title = paint(options, `Top ${limit} Entrants:`, COLORS.bold, COLORS.cyan);
  const shown = entrants.slice(0, limit);
  if (shown.length === 0) {
    return `${title}\nNo entrants found.`;
  }
  const maxElo = shown[0].elo;
  const lines = shown.map((e, i) => leaderboardLine(i + 1, e, maxElo, targetDir, options));
  return [title, ...lines].join('\n');
}

/**
 * Knockout standings, winner first.
 */
export function formatStandings(
  rows: readonly StandingRow[],
  targetDir: string,
  options: DisplayOptions
): string {
  const title = paint(options, 'Knockout Tournament Results:', COLORS.bold, COLORS.cyan);
  if (rows.length === 0) {
    return `${title}\nNo entrants found.`;
  }
  const maxElo = Math.max(...rows.map((r) => r.entrant.elo));
  const lines = rows.map((row, i) => {
    const line = leaderboardLine(i + 1, row.entrant, maxElo, targetDir, options);
    return row.eliminatedAt === null ? `${line} ${paint(options, '(winner)', COLORS.bold, COLORS.green)}` : line;
  });
  return [title, ...lines].join('\n');
}

/**
 * The bout as shown to the judge.
 */
export function formatMatchup(
  bout: Bout,
  ranks: ReadonlyMap<EntrantId, number>,
  targetDir: string,
  options: DisplayOptions,
  displayName: (filePath: string) => string = (p) => p
): string {
  const probabilityA = winProbability(bout.a.elo, bout.b.elo);
  const side = (label: string, entrant: Entrant) => {
    const rank = ranks.get(entrant.id);
    const name = fileLink(options, displayName(entrant.path), path.resolve(targetDir, entrant.path));
    return (
      `  ${paint(options, label, COLORS.bold)}: ${name} ` +
      `(Elo ${Math.trunc(entrant.elo)}, rank ${rank === undefined ? '?' : `#${rank}`}, ${formatRecord(entrant)})`
    );
  };
  const favourite = formatProbability(probabilityA);
  const favouriteChance = Math.max(probabilityA, 1 - probabilityA);
  return [
    '',
    side('A', bout.a),
    side('B', bout.b),
    `  Favourite: ${paint(options, favourite, probabilityColor(favouriteChance))}`,
    '',
  ].join('\n');
}

/**
 * Describe how a rank moved: "#3 (up from #5)".
 */
export function describeRankMovement(oldRank: number | undefined, newRank: number | undefined): string {
  if (newRank === undefined) {
    return oldRank === undefined ? 'unranked' : `unranked (was #${oldRank})`;
  }
  if (oldRank === undefined) return `#${newRank} (new)`;
  if (oldRank === newRank) return `#${newRank} (no change)`;
  if (oldRank > newRank) return `#${newRank} (up from #${oldRank})`;
  return `#${newRank} (down from #${oldRank})`;
}

function movementColor(oldRank: number | undefined, newRank: number | undefined) {
  if (oldRank === undefined || newRank === undefined || oldRank === newRank) return COLORS.dim;
  return oldRank > newRank ? COLORS.green : COLORS.red;
}

/**
 * Rank and rating movement for both sides of a recorded bout.
 */
export function formatRankChanges(
  bout: Bout,
  outcome: BoutOutcome,
  oldRanks: ReadonlyMap<EntrantId, number>,
  newRanks: ReadonlyMap<EntrantId, number>,
  targetDir: string,
  options: DisplayOptions
): string {
  const lines = ['Rankings:'];
  for (const [entrant, change] of [
    [bout.a, outcome.a],
    [bout.b, outcome.b],
  ] as const) {
    const oldRank = oldRanks.get(entrant.id);
    const newRank = newRanks.get(entrant.id);
    const movement = paint(options, describeRankMovement(oldRank, newRank), movementColor(oldRank, newRank));
    lines.push(
      `  ${entrantLabel(entrant, targetDir, options)}: ${movement} | New Elo: ${Math.trunc(change.newElo)}`
    );
  }
  return lines.join('\n');
}

/**
 * Entrants by Elo, highest first; equal ratings by id.
 */
export function sortByRating(entrants: readonly Entrant[]): Entrant[] {
  return [...entrants].sort((x, y) => y.elo - x.elo || x.id - y.id);
}

/**
 * What a knockout command did to the two sides, in the judge's words.
 */
export function describeKnockoutOutcome(command: ResultCommand, bout: Bout, options: DisplayOptions): string {
  const a = bout.a.path;
  const b = bout.b.path;
  const removed = (text: string) => paint(options, text, COLORS.bold, COLORS.red);

  switch (command) {
    case 'A':
      return `${removed(b)} has been ELIMINATED!`;
    case 'B':
      return `${removed(a)} has been ELIMINATED!`;
    case 'A-':
      return `${a} wins but is ${removed('REMOVED')} from tournament!`;
    case 'B-':
      return `${b} wins but is ${removed('REMOVED')} from tournament!`;
    case 'A+':
      return `${a} wins, but both entrants stay in tournament!`;
    case 'B+':
      return `${b} wins, but both entrants stay in tournament!`;
    case 'TA-':
      return `Tie, but ${a} is ${removed('REMOVED')} from tournament!`;
    case 'TB-':
      return `Tie, but ${b} is ${removed('REMOVED')} from tournament!`;
    case 'T-':
      return `Tie, but BOTH entrants are ${removed('REMOVED')} from tournament!`;
    case 'tie':
      return 'Tie - no one eliminated.';
  }
}
