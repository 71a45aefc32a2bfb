/**
 * File operations driven from the judging prompt: open, rename, trash.
 */

import fs from 'fs';
import path from 'path';
import { spawn } from 'child_process';
import type { EntrantStore } from '../db/store';

/**
 * Local-time stamp used in trash and export file names: YYYYMMDD_HHMMSS.
 */
export function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export const TRASH_DIR = '.trash';

/**
 * Move a file into `<targetDir>/.trash`, suffixing the name with a
 * timestamp.
 *
 * @returns The new location, or null if the file was already gone
 */
export function trashFile(targetDir: string, relativePath: string, now: Date = new Date()): string | null {
  const source = path.join(targetDir, relativePath);
  if (!fs.existsSync(source)) {
    return null;
  }

  const trashDir = path.join(targetDir, TRASH_DIR);
  fs.mkdirSync(trashDir, { recursive: true });

  const { name, ext } = path.parse(relativePath);
  const destination = path.join(trashDir, `${name}_${fileTimestamp(now)}${ext}`);
  fs.renameSync(source, destination);
  return destination;
}

/**
 * Rename a file on disk and carry its entrant record (rating, history,
 * knockout state) over to the new name.
 */
export function renameEntrantFile(
  store: EntrantStore,
  targetDir: string,
  oldName: string,
  newName: string
): void {
  const source = path.join(targetDir, oldName);
  const destination = path.join(targetDir, newName);

  if (!fs.existsSync(source)) {
    throw new Error(`File not found: ${oldName}`);
  }
  if (fs.existsSync(destination)) {
    throw new Error(`File already exists: ${newName}`);
  }
  if (store.getEntrantByPath(newName)) {
    throw new Error(`An entrant named ${newName} is already recorded`);
  }

  fs.renameSync(source, destination);
  const entrant = store.getEntrantByPath(oldName);
  if (entrant) {
    store.renameEntrant(entrant.id, newName);
  }
}

/**
 * Map a single-wildcard rename (`clip_*` -> `take_*`) over file names.
 *
 * @returns [old, new] pairs for every matching file
 */
export function planWildcardRename(
  files: readonly string[],
  oldPattern: string,
  newPattern: string
): Array<[string, string]> {
  if (oldPattern.split('*').length !== 2) {
    throw new Error('Pattern must contain exactly one * wildcard');
  }
  if (newPattern.split('*').length !== 2) {
    throw new Error('Replacement pattern must contain exactly one * wildcard');
  }

  const [prefix, suffix] = oldPattern.split('*');
  const plan: Array<[string, string]> = [];

  for (const file of files) {
    if (
      file.length >= prefix.length + suffix.length &&
      file.startsWith(prefix) &&
      file.endsWith(suffix)
    ) {
      const matched = file.slice(prefix.length, file.length - suffix.length);
      plan.push([file, newPattern.replace('*', matched)]);
    }
  }

  if (plan.length === 0) {
    throw new Error(`No files found matching pattern '${oldPattern}'`);
  }
  return plan;
}

export interface OpenerCommand {
  command: string;
  args: string[];
}

/**
 * How to open a file: a startup script in the target directory wins,
 * otherwise the platform's default opener.
 */
export function resolveOpener(
  targetDir: string,
  filePath: string,
  platform: NodeJS.Platform = process.platform,
  exists: (p: string) => boolean = fs.existsSync
): OpenerCommand {
  const absolute = path.resolve(targetDir, filePath);
  const script = path.resolve(targetDir, platform === 'win32' ? 'elo_start.bat' : 'elo_start.sh');

  if (exists(script)) {
    return platform === 'win32'
      ? { command: 'cmd', args: ['/c', script, absolute] }
      : { command: 'sh', args: [script, absolute] };
  }

  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [absolute] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', absolute] };
    default:
      return { command: 'xdg-open', args: [absolute] };
  }
}

/**
 * Launch each file with its opener, detached from the session.
 */
export function openFiles(targetDir: string, filePaths: readonly string[]): void {
  for (const filePath of filePaths) {
    const { command, args } = resolveOpener(targetDir, filePath);
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', (error) => {
      console.error(`Could not open ${filePath}: ${error.message}`);
    });
    child.unref();
  }
}
