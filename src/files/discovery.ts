/**
 * Entrant discovery: which files in the target directory take part.
 */

import fs from 'fs';
import path from 'path';
import type { Entrant } from '../ranking/types';
import type { EntrantStore } from '../db/store';
import { DB_NAME } from '../db/connection';

/**
 * Startup scripts and database files never become entrants.
 */
export const EXCLUDED_FILES: ReadonlySet<string> = new Set([
  DB_NAME,
  `${DB_NAME}-wal`,
  `${DB_NAME}-shm`,
  `${DB_NAME}-journal`,
  'elo_start.sh',
  'elo_start.bat',
]);

export const MATCH_ALL = /.*/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a filename pattern from a comma-separated extension list.
 *
 * "py,js" and ".py, .js" both give /.*\.(py|js)$/; an empty list matches
 * everything.
 */
export function extensionsToPattern(extensions: string): RegExp {
  const list = extensions
    .split(',')
    .map((e) => e.trim().replace(/^\.+/, ''))
    .filter((e) => e.length > 0)
    .map(escapeRegExp);

  if (list.length === 0) return MATCH_ALL;
  if (list.length === 1) return new RegExp(`.*\\.${list[0]}$`);
  return new RegExp(`.*\\.(${list.join('|')})$`);
}

/**
 * Regular, non-hidden files in `targetDir` whose name matches `pattern`,
 * sorted by name.
 */
export function discoverFiles(targetDir: string, pattern: RegExp = MATCH_ALL): string[] {
  return fs
    .readdirSync(targetDir, { withFileTypes: true })
    .filter((dirent) => dirent.isFile())
    .map((dirent) => dirent.name)
    .filter((name) => !name.startsWith('.') && !EXCLUDED_FILES.has(name) && pattern.test(name))
    .sort();
}

/**
 * Add newly discovered files to the store at the default rating.
 *
 * @returns Number of entrants created
 */
export function syncEntrants(store: EntrantStore, files: readonly string[]): number {
  return store.transaction(() => {
    let created = 0;
    for (const file of files) {
      if (store.upsertEntrant(file).created) created++;
    }
    return created;
  });
}

/**
 * Entrants whose file is still on disk and matches the pattern. Missing
 * files are skipped, not removed.
 */
export function filterExisting(
  entrants: readonly Entrant[],
  targetDir: string,
  pattern: RegExp = MATCH_ALL
): Entrant[] {
  return entrants.filter(
    (e) => pattern.test(e.path) && fs.existsSync(path.join(targetDir, e.path))
  );
}

/**
 * File name without directory or final extension: "dir/clip.tar.gz" -> "clip.tar".
 */
export function displayName(filePath: string): string {
  return path.parse(filePath).name;
}
