/**
 * CSV export of finished knockout runs.
 */

import fs from 'fs';
import path from 'path';
import type { StandingRow } from '../ranking/types';
import { fileTimestamp } from '../files/operations';
import { formatRecord } from './format';

export const CSV_HEADER = ['Position', 'Path', 'Elo', 'Record', 'Eliminated At'] as const;

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Standings as CSV text (CRLF line endings, RFC 4180 quoting).
 */
export function formatStandingsCsv(rows: readonly StandingRow[]): string {
  const lines = [CSV_HEADER.map(csvField).join(',')];
  rows.forEach((row, index) => {
    lines.push(
      [
        index + 1,
        row.entrant.path,
        Math.trunc(row.entrant.elo),
        formatRecord(row.entrant),
        row.eliminatedAt ?? 'Winner',
      ]
        .map(csvField)
        .join(',')
    );
  });
  return lines.join('\r\n') + '\r\n';
}

/**
 * Write `knockout_results_<timestamp>.csv` into the target directory.
 *
 * @returns Path of the written file
 */
export function exportStandings(
  targetDir: string,
  rows: readonly StandingRow[],
  now: Date = new Date()
): string {
  const csvPath = path.join(targetDir, `knockout_results_${fileTimestamp(now)}.csv`);
  fs.writeFileSync(csvPath, formatStandingsCsv(rows), 'utf-8');
  return csvPath;
}
