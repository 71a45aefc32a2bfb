/**
 * Tests for the judging loop, driven by a scripted prompt over a temporary
 * directory and an in-memory store.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { JudgingSession } from '../session';
import type { SessionConfig } from '../session';
import type { Prompt } from '../prompt';
import { closeDb, openStore, MEMORY_DB } from '../../db';
import type { EntrantStore } from '../../db/store';
import { PLAIN } from '../../display/colors';
import { extensionsToPattern } from '../../files/discovery';

class ScriptedPrompt implements Prompt {
  readonly questions: string[] = [];
  private answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return Promise.resolve(this.answers.shift() ?? null);
  }

  close(): void {
    this.answers = [];
  }
}

function steppingClock(start = Date.UTC(2024, 0, 1, 12, 0, 0)): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

let targetDir: string;
let store: EntrantStore;
let output: string[];

function touch(...names: string[]): void {
  for (const name of names) {
    writeFileSync(path.join(targetDir, name), name);
  }
}

function session(answers: string[], overrides: Partial<SessionConfig> = {}): JudgingSession {
  return new JudgingSession({
    store,
    targetDir,
    pattern: extensionsToPattern('txt'),
    knockout: false,
    power: 1,
    prompt: new ScriptedPrompt(answers),
    display: PLAIN,
    random: () => 0,
    write: (text) => output.push(text),
    open: () => undefined,
    ...overrides,
  });
}

beforeEach(() => {
  targetDir = mkdtempSync(path.join(os.tmpdir(), 'pairwise-elo-session-'));
  store = openStore(MEMORY_DB, { now: steppingClock() }).store;
  output = [];
});

afterEach(() => {
  closeDb();
  rmSync(targetDir, { recursive: true, force: true });
});

describe('JudgingSession', () => {
  describe('ending the loop', () => {
    it('stops when no files match', async () => {
      touch('notes.md');
      expect(await session([]).run()).toBe('no-entrants');
      expect(output).toEqual(['No files found matching the pattern.']);
    });

    it('stops with a single file in ladder mode', async () => {
      touch('a.txt');
      expect(await session([]).run()).toBe('insufficient-entrants');
      expect(output).toEqual(['Only one file found. Need at least two files for comparison.']);
    });

    it('stops when input ends', async () => {
      touch('a.txt', 'b.txt');
      expect(await session([]).run()).toBe('input-closed');
    });

    it('stops on quit', async () => {
      touch('a.txt', 'b.txt');
      expect(await session(['q']).run()).toBe('quit');
    });
  });

  describe('ladder mode', () => {
    it('records a result and shows rank movement', async () => {
      touch('a.txt', 'b.txt', 'c.txt');

      expect(await session(['b', 'q']).run()).toBe('quit');

      expect(store.getEntrantByPath('b.txt')).toMatchObject({ elo: 1016, wins: 1 });
      expect(store.getEntrantByPath('a.txt')).toMatchObject({ elo: 984, losses: 1 });
      expect(output).toContain(
        ['Rankings:', '  a.txt: #3 (down from #1) | New Elo: 984', '  b.txt: #1 (up from #2) | New Elo: 1016'].join(
          '\n'
        )
      );
    });

    it('refuses knockout commands and asks again', async () => {
      touch('a.txt', 'b.txt');

      expect(await session(['a-', 'q']).run()).toBe('quit');

      expect(output).toContain('Error: A- is only available in knockout mode');
      expect(store.listGames()).toEqual([]);
    });

    it('explains invalid input', async () => {
      touch('a.txt', 'b.txt');
      await session(['maybe', 'rem x', 'q']).run();

      expect(output).toContain(
        'Invalid input. Please enter A, B, t, o, top [N], ren <old> <new>, rem a/b/ab, or q'
      );
      expect(output).toContain('Usage: rem a|b|ab');
    });

    it('shows the leaderboard and the bout again', async () => {
      touch('a.txt', 'b.txt', 'c.txt');
      await session(['top 2', 'q']).run();

      const board = output.find((text) => text.startsWith('Top 2 Entrants:'));
      expect(board?.split('\n')).toHaveLength(3);
      expect(output.filter((text) => text.includes('  A: a (Elo 1000, rank #1, 0W-0L-0T)'))).toHaveLength(2);
    });

    it('opens both files of the bout', async () => {
      touch('a.txt', 'b.txt');
      const open = vi.fn();

      await session(['o', 'q'], { open }).run();

      expect(open).toHaveBeenCalledWith(targetDir, ['a.txt', 'b.txt']);
    });

    it('renames a file and keeps its record', async () => {
      touch('a.txt', 'b.txt');

      await session(['ren a.txt z.txt', 'q']).run();

      expect(existsSync(path.join(targetDir, 'z.txt'))).toBe(true);
      expect(store.getEntrantByPath('z.txt')?.id).toBe(1);
      expect(output).toContain('Renamed a.txt -> z.txt');
      expect(output.some((text) => text.includes('  A: z (Elo 1000, rank #1, 0W-0L-0T)'))).toBe(true);
    });

    it('reports a failed rename and carries on', async () => {
      touch('a.txt', 'b.txt');

      expect(await session(['ren a.txt b.txt', 'q']).run()).toBe('quit');

      expect(output).toContain('Rename failed: File already exists: b.txt');
    });

    it('removes an entrant to the trash', async () => {
      touch('a.txt', 'b.txt', 'c.txt');

      expect(await session(['rem b', 'q']).run()).toBe('quit');

      expect(existsSync(path.join(targetDir, 'b.txt'))).toBe(false);
      expect(store.getEntrantByPath('b.txt')).toBeUndefined();
      expect(output.some((text) => text.startsWith('Removed b.txt (moved to '))).toBe(true);
      expect(store.listEntrants().map((e) => e.path)).toEqual(['a.txt', 'c.txt']);
    });

    it('keeps going when the file cannot be trashed', async () => {
      touch('a.txt', 'b.txt', 'c.txt');
      writeFileSync(path.join(targetDir, '.trash'), 'not a directory');

      expect(await session(['rem b', 'q']).run()).toBe('quit');

      expect(existsSync(path.join(targetDir, 'b.txt'))).toBe(true);
      expect(output.some((text) => text.startsWith('Removed b.txt (could not trash file: '))).toBe(true);
      // Still on disk, so the next sync brings it back as a new entrant
      expect(store.getEntrantByPath('b.txt')).toMatchObject({ id: 4, elo: 1000, wins: 0 });
    });

    it('rejects reset outside knockout mode', async () => {
      touch('a.txt', 'b.txt');
      await session(['reset', 'q']).run();
      expect(output).toContain('Error: reset is only available in knockout mode');
    });
  });

  describe('knockout mode', () => {
    it('runs to a winner, exports the standings and starts over', async () => {
      touch('a.txt', 'b.txt', 'c.txt');
      const prompt = new ScriptedPrompt(['A', 'B', 'reset', 'q']);

      const reason = await session([], { knockout: true, prompt }).run();

      expect(reason).toBe('quit');
      expect(output).toContain('b.txt has been ELIMINATED!');
      expect(output).toContain('a.txt has been ELIMINATED!');
      expect(output).toContain('Entrants remaining: 1');
      expect(output).toContain('Winner: c.txt');
      expect(prompt.questions[2]).toBe('> ');

      const exported = output.find((text) => text.startsWith('Results exported to: '));
      const csvPath = exported?.slice('Results exported to: '.length) ?? '';
      expect(path.dirname(csvPath)).toBe(targetDir);
      expect(readFileSync(csvPath, 'utf-8')).toBe(
        'Position,Path,Elo,Record,Eliminated At\r\n' +
          '1,c.txt,1016,1W-0L-0T,Winner\r\n' +
          '2,a.txt,999,1W-1L-0T,2024-01-01T12:00:03.000Z\r\n' +
          '3,b.txt,984,0W-1L-0T,2024-01-01T12:00:01.000Z\r\n'
      );

      expect(store.listEliminations()).toEqual([]);
    });

    it('applies elimination modifiers', async () => {
      touch('a.txt', 'b.txt', 'c.txt');

      await session(['a+', 't-', 'q'], { knockout: true }).run();

      expect(output).toContain('a.txt wins, but both entrants stay in tournament!');
      expect(output).toContain('Tie, but BOTH entrants are REMOVED from tournament!');
      expect(store.listEliminations()).toHaveLength(2);
    });

    it('resets mid-run after confirmation', async () => {
      touch('a.txt', 'b.txt', 'c.txt');

      await session(['A', 'reset', 'y', 'q'], { knockout: true }).run();

      expect(output).toContain('Knockout tournament has been reset! All entrants are back in.');
      expect(store.listEliminations()).toEqual([]);
    });

    it('lists only the pool on the leaderboard', async () => {
      touch('a.txt', 'b.txt', 'c.txt');
      const ids = ['a.txt', 'b.txt', 'c.txt'].map((name) => store.upsertEntrant(name).entrant.id);
      store.savePool([ids[0], ids[2]]);

      await session(['top 5', 'q'], { knockout: true }).run();

      const board = output.find((text) => text.startsWith('Top 5 Entrants:'));
      const listed = board
        ?.split('\n')
        .slice(1)
        .map((line) => line.slice(line.lastIndexOf(' ') + 1))
        .sort();
      expect(listed).toEqual(['a.txt', 'c.txt']);
    });

    it('offers the results screen when the last two go out together', async () => {
      touch('a.txt', 'b.txt');
      const prompt = new ScriptedPrompt(['t-', 'reset', 'q']);

      expect(await session([], { knockout: true, prompt }).run()).toBe('quit');

      expect(output).toContain('Entrants remaining: 0');
      expect(output).toContain('No winner: every remaining entrant was eliminated.');
      expect(output.some((text) => text.startsWith('Results exported to: '))).toBe(true);
      expect(prompt.questions[1]).toBe('> ');
      expect(store.listEliminations()).toEqual([]);
    });

    it('keeps the run when reset is not confirmed', async () => {
      touch('a.txt', 'b.txt', 'c.txt');

      await session(['A', 'reset', 'n', 'q'], { knockout: true }).run();

      expect(output).toContain('Reset cancelled.');
      expect(store.listEliminations()).toHaveLength(1);
    });
  });
});
