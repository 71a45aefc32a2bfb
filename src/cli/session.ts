/**
 * JudgingSession - the interactive bout loop.
 *
 * Each iteration re-reads the store: discovers new files, drops entrants
 * whose files have gone, rebuilds knockout scope, picks a bout and waits
 * for the judge. Nothing is cached between iterations.
 */

import type { Bout, Entrant, RandomSource, ResultCommand } from '../ranking';
import type { EntrantStore } from '../db';
import type { SessionLogger } from '../logging';
import type { DisplayOptions } from '../display';
import type { Prompt } from './prompt';
import type { JudgeInput, RemovalTarget } from './input';
import {
  COLORS,
  paint,
  describeKnockoutOutcome,
  exportStandings,
  formatLeaderboard,
  formatMatchup,
  formatRankChanges,
  formatStandings,
  sortByRating,
} from '../display';
import {
  applyCommand,
  defaultRandom,
  findWinner,
  knockoutStandings,
  loadKnockoutState,
  pickBout,
  removeEntrant,
  resetKnockout,
  scopeEntrants,
  EmptyCandidateSetError,
  InvalidCommandError,
} from '../ranking';
import {
  discoverFiles,
  displayName,
  filterExisting,
  openFiles,
  planWildcardRename,
  renameEntrantFile,
  syncEntrants,
  trashFile,
  MATCH_ALL,
} from '../files';
import { invalidInputMessage, parseJudgeInput, promptText } from './input';

export interface SessionConfig {
  store: EntrantStore;
  targetDir: string;
  pattern: RegExp;
  knockout: boolean;
  power: number;
  prompt: Prompt;
  display: DisplayOptions;
  logger?: SessionLogger;
  random?: RandomSource;
  /** Output sink, one call per block of text */
  write?: (text: string) => void;
  /** File opener; replaced in tests */
  open?: (targetDir: string, paths: readonly string[]) => void;
}

export type SessionEndReason = 'quit' | 'input-closed' | 'no-entrants' | 'insufficient-entrants';

export class JudgingSession {
  private config: SessionConfig;
  private random: RandomSource;
  private write: (text: string) => void;
  private open: (targetDir: string, paths: readonly string[]) => void;

  constructor(config: SessionConfig) {
    this.config = config;
    this.random = config.random ?? defaultRandom;
    this.write = config.write ?? ((text) => console.log(text));
    this.open = config.open ?? openFiles;
  }

  /**
   * Run bouts until the judge quits, input ends, or no bout is possible.
   * Integrity errors propagate to the caller.
   */
  async run(): Promise<SessionEndReason> {
    const { knockout } = this.config;

    for (;;) {
      const existing = this.existingEntrants();

      if (existing.length === 0) {
        this.write(paint(this.config.display, 'No files found matching the pattern.', COLORS.yellow));
        return 'no-entrants';
      }

      const eligible = knockout ? scopeEntrants(existing, loadKnockoutState(this.config.store)) : existing;

      // T- on the last two leaves nobody standing
      if (knockout && eligible.length <= 1) {
        const choice = await this.finalScreen(findWinner(eligible));
        if (choice !== 'reset') return choice;
        continue;
      }

      if (eligible.length === 1) {
        this.write(
          paint(this.config.display, 'Only one file found. Need at least two files for comparison.', COLORS.yellow)
        );
        return 'insufficient-entrants';
      }

      let bout: Bout;
      try {
        bout = pickBout(eligible, this.config.power, this.random);
      } catch (error) {
        if (error instanceof EmptyCandidateSetError) {
          this.write(paint(this.config.display, error.message, COLORS.red));
          continue;
        }
        throw error;
      }

      const action = await this.judgeBout(bout);
      if (action !== 'next') return action;
    }
  }

  /**
   * Entrants that can be drawn right now: on disk, matching, and in knockout
   * scope when relevant.
   */
  eligibleEntrants(): Entrant[] {
    const existing = this.existingEntrants();
    return this.config.knockout ? scopeEntrants(existing, loadKnockoutState(this.config.store)) : existing;
  }

  private existingEntrants(): Entrant[] {
    const { store, targetDir, pattern } = this.config;
    syncEntrants(store, discoverFiles(targetDir, pattern));
    return filterExisting(store.listEntrants(), targetDir, pattern);
  }

  private async judgeBout(initial: Bout): Promise<'next' | SessionEndReason> {
    const { store, targetDir, display, knockout, prompt } = this.config;
    let bout = initial;
    const ranks = store.rankings();
    const showMatchup = () => this.write(formatMatchup(bout, ranks, targetDir, display, displayName));

    showMatchup();

    for (;;) {
      const line = await prompt.ask(promptText(knockout));
      if (line === null) return 'input-closed';

      const input: JudgeInput = parseJudgeInput(line);
      switch (input.kind) {
        case 'result': {
          try {
            this.recordBout(bout, input.command);
          } catch (error) {
            if (error instanceof InvalidCommandError) {
              this.write(paint(display, `Error: ${error.message}`, COLORS.red));
              continue;
            }
            throw error;
          }
          return 'next';
        }

        case 'top':
          this.write(formatLeaderboard(sortByRating(this.leaderboardEntrants()), input.limit, targetDir, display));
          showMatchup();
          continue;

        case 'open':
          this.open(targetDir, [bout.a.path, bout.b.path]);
          continue;

        case 'rename':
          this.rename(input.from, input.to);
          bout = {
            a: store.getEntrant(bout.a.id) ?? bout.a,
            b: store.getEntrant(bout.b.id) ?? bout.b,
          };
          showMatchup();
          continue;

        case 'reset':
          if (!knockout) {
            this.write(paint(display, 'Error: reset is only available in knockout mode', COLORS.red));
            continue;
          }
          if (await this.confirmReset()) return 'next';
          showMatchup();
          continue;

        case 'remove':
          this.remove(bout, input.target);
          return 'next';

        case 'quit':
          return 'quit';

        case 'invalid':
          this.write(paint(display, input.reason ?? invalidInputMessage(knockout), COLORS.yellow));
          continue;
      }
    }
  }

  private recordBout(bout: Bout, command: ResultCommand): void {
    const { store, targetDir, display, knockout, logger } = this.config;

    const oldRanks = store.rankings();
    const applied = applyCommand(store, bout, command, { knockout, logger });
    const newRanks = store.rankings();

    this.write(formatRankChanges(bout, applied.outcome, oldRanks, newRanks, targetDir, display));

    if (knockout) {
      this.write(describeKnockoutOutcome(command, bout, display));
      this.write(`Entrants remaining: ${this.eligibleEntrants().length}`);
    }
  }

  /** Knockout runs with a pool only list the pool. */
  private leaderboardEntrants(): Entrant[] {
    const { store, knockout } = this.config;
    const entrants = store.listEntrants();
    if (!knockout) return entrants;
    const { pool } = loadKnockoutState(store);
    return pool.size > 0 ? entrants.filter((e) => pool.has(e.id)) : entrants;
  }

  private rename(from: string, to: string): void {
    const { store, targetDir, display } = this.config;
    try {
      const plan: Array<[string, string]> = from.includes('*')
        ? planWildcardRename(discoverFiles(targetDir, MATCH_ALL), from, to)
        : [[from, to]];
      for (const [oldName, newName] of plan) {
        renameEntrantFile(store, targetDir, oldName, newName);
        this.write(paint(display, `Renamed ${oldName} -> ${newName}`, COLORS.green));
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.config.logger?.warning(message, 'rename');
      this.write(paint(display, `Rename failed: ${message}`, COLORS.red));
    }
  }

  private remove(bout: Bout, target: RemovalTarget): void {
    const { store, targetDir, display, logger } = this.config;
    const entrants = target === 'ab' ? [bout.a, bout.b] : [target === 'a' ? bout.a : bout.b];

    for (const entrant of entrants) {
      const { adjustment } = removeEntrant(store, entrant.id, logger);
      let where: string;
      try {
        const trashed = trashFile(targetDir, entrant.path);
        where = trashed ? `moved to ${trashed}` : 'file already gone';
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger?.warning(`Could not trash ${entrant.path}: ${message}`, 'remove');
        where = `could not trash file: ${message}`;
      }
      this.write(
        paint(display, `Removed ${entrant.path} (${where}); others adjusted by ${adjustment.toFixed(2)} Elo`, COLORS.yellow)
      );
    }
  }

  private async confirmReset(): Promise<boolean> {
    const { store, display, prompt, logger } = this.config;
    const answer = await prompt.ask(
      'Are you sure you want to reset the knockout tournament? All eliminations will be cleared. (y/N): '
    );
    const confirmed = answer !== null && ['y', 'yes'].includes(answer.trim().toLowerCase());
    if (!confirmed) {
      this.write('Reset cancelled.');
      return false;
    }
    resetKnockout(store, logger);
    this.write(paint(display, 'Knockout tournament has been reset! All entrants are back in.', COLORS.green));
    return true;
  }

  /**
   * Show the final standings; `reset` exports them and starts over.
   * `winner` is null when the last entrants were eliminated together.
   */
  private async finalScreen(winner: Entrant | null): Promise<'reset' | 'quit' | 'input-closed'> {
    const { store, targetDir, display, prompt, logger } = this.config;
    const rule = '='.repeat(60);
    this.write(`\n${rule}\n${paint(display, 'KNOCKOUT TOURNAMENT COMPLETE!', COLORS.bold, COLORS.green)}\n${rule}`);
    this.write(winner ? `Winner: ${winner.path}` : 'No winner: every remaining entrant was eliminated.');
    this.write(formatStandings(knockoutStandings(store), targetDir, display));
    this.write("Type 'reset' to start a new tournament and export results to CSV, or 'q' to quit.");

    for (;;) {
      const line = await prompt.ask('> ');
      if (line === null) return 'input-closed';
      const answer = line.trim().toLowerCase();

      if (answer === 'reset') {
        const csvPath = exportStandings(targetDir, knockoutStandings(store));
        this.write(`Results exported to: ${csvPath}`);
        resetKnockout(store, logger, csvPath);
        this.write(paint(display, 'Knockout tournament reset! All entrants are back in.', COLORS.green));
        return 'reset';
      }
      if (answer === 'q' || answer === 'quit') {
        return 'quit';
      }
      this.write("Invalid input. Please type 'reset' or 'q'.");
    }
  }
}
