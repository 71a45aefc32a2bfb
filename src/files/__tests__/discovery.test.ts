/**
 * Tests for entrant discovery.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  discoverFiles,
  displayName,
  extensionsToPattern,
  filterExisting,
  syncEntrants,
  MATCH_ALL,
} from '../discovery';
import { closeDb, openStore, MEMORY_DB, DB_NAME } from '../../db';

let targetDir: string;

function touch(...names: string[]): void {
  for (const name of names) {
    writeFileSync(path.join(targetDir, name), name);
  }
}

beforeEach(() => {
  targetDir = mkdtempSync(path.join(os.tmpdir(), 'pairwise-elo-files-'));
});

afterEach(() => {
  closeDb();
  rmSync(targetDir, { recursive: true, force: true });
});

describe('extensionsToPattern', () => {
  it('matches a single extension', () => {
    const pattern = extensionsToPattern('py');
    expect(pattern.source).toBe('.*\\.py$');
    expect(pattern.test('main.py')).toBe(true);
    expect(pattern.test('main.pyc')).toBe(false);
  });

  it('matches any of several extensions, ignoring dots and spaces', () => {
    const pattern = extensionsToPattern('.py, js');
    expect(pattern.source).toBe('.*\\.(py|js)$');
    expect(pattern.test('a.js')).toBe(true);
    expect(pattern.test('a.ts')).toBe(false);
  });

  it('escapes regular expression characters', () => {
    const pattern = extensionsToPattern('c++');
    expect(pattern.test('x.c++')).toBe(true);
    expect(pattern.test('x.cc')).toBe(false);
  });

  it('matches everything for an empty list', () => {
    expect(extensionsToPattern(' , ')).toBe(MATCH_ALL);
  });
});

describe('discoverFiles', () => {
  it('lists regular, visible files sorted by name', () => {
    touch('b.txt', 'a.txt', '.hidden');
    mkdirSync(path.join(targetDir, 'folder'));

    expect(discoverFiles(targetDir)).toEqual(['a.txt', 'b.txt']);
  });

  it('skips the database and startup scripts', () => {
    touch('a.txt', 'elo_start.sh', 'elo_start.bat');
    openStore(path.join(targetDir, DB_NAME));

    expect(discoverFiles(targetDir)).toEqual(['a.txt']);
  });

  it('applies the pattern', () => {
    touch('a.py', 'b.js', 'c.md');
    expect(discoverFiles(targetDir, extensionsToPattern('py,js'))).toEqual(['a.py', 'b.js']);
  });
});

describe('syncEntrants', () => {
  it('adds new files once', () => {
    const { store } = openStore(MEMORY_DB);

    expect(syncEntrants(store, ['a.txt', 'b.txt'])).toBe(2);
    expect(syncEntrants(store, ['a.txt', 'b.txt', 'c.txt'])).toBe(1);
    expect(store.listEntrants().map((e) => e.path)).toEqual(['a.txt', 'b.txt', 'c.txt']);
  });
});

describe('filterExisting', () => {
  it('drops entrants whose file is gone or no longer matches', () => {
    const { store } = openStore(MEMORY_DB);
    touch('a.py', 'c.md');
    syncEntrants(store, ['a.py', 'b.py', 'c.md']);

    const kept = filterExisting(store.listEntrants(), targetDir, extensionsToPattern('py'));

    expect(kept.map((e) => e.path)).toEqual(['a.py']);
    expect(store.countEntrants()).toBe(3);
  });
});

describe('displayName', () => {
  it('strips the directory and final extension', () => {
    expect(displayName('dir/clip.tar.gz')).toBe('clip.tar');
    expect(displayName('README')).toBe('README');
  });
});
