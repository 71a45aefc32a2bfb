/**
 * Session Logger - Structured logging for judging sessions.
 *
 * Writes JSONL logs to <target>/.pairwise-elo/logs/{sessionId}.jsonl.
 * Captures: recorded bouts, eliminations, pool creation, removals, resets
 * and errors.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync, readdirSync, statSync } from 'fs';
import { join, dirname, basename } from 'path';
import type { BoutResult, EntrantId, ResultCommand } from '../ranking/types';

/**
 * Log event types for a judging session.
 */
export type SessionLogEvent =
  | { type: 'session_started'; sessionId: string; mode: 'ladder' | 'knockout'; targetDir: string }
  | { type: 'session_ended'; sessionId: string; reason?: string }
  | {
      type: 'bout_recorded';
      command: ResultCommand;
      result: BoutResult;
      entrantA: EntrantId;
      entrantB: EntrantId;
      eloA: number;
      eloB: number;
    }
  | { type: 'entrant_eliminated'; entrantId: EntrantId; path: string }
  | { type: 'pool_created'; size: number; topSkew: number; power: number }
  | { type: 'knockout_resumed'; poolSize: number; eliminated: number }
  | { type: 'knockout_reset'; exportedTo?: string }
  | { type: 'entrant_removed'; entrantId: EntrantId; path: string; elo: number; adjustment: number }
  | { type: 'redistribution_skipped'; delta: number; reason: string }
  | { type: 'error'; error: string; context?: string; stack?: string }
  | { type: 'warning'; message: string; context?: string }
  | { type: 'debug'; message: string; data?: unknown };

/**
 * Full log entry with metadata.
 */
export interface SessionLogEntry {
  timestamp: string;
  sessionId: string;
  event: SessionLogEvent;
}

export function defaultLogsDir(targetDir: string): string {
  return process.env.PAIRWISE_ELO_LOG_DIR || join(targetDir, '.pairwise-elo', 'logs');
}

/**
 * Logger for a single judging session.
 */
export class SessionLogger {
  private sessionId: string;
  private logPath: string;
  private enabled: boolean;

  constructor(sessionId: string, logsDir: string) {
    this.sessionId = sessionId;
    this.logPath = join(logsDir, `${sessionId}.jsonl`);
    this.enabled = true;

    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Logs an event to the session log file.
   */
  log(event: SessionLogEvent): void {
    if (!this.enabled) return;

    const entry: SessionLogEntry = {
      timestamp: new Date().toISOString(),
      sessionId: this.sessionId,
      event,
    };

    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`[SessionLogger] Failed to write log: ${error}`);
    }
  }

  sessionStarted(mode: 'ladder' | 'knockout', targetDir: string): void {
    this.log({ type: 'session_started', sessionId: this.sessionId, mode, targetDir });
  }

  sessionEnded(reason?: string): void {
    this.log({ type: 'session_ended', sessionId: this.sessionId, reason });
  }

  boutRecorded(
    command: ResultCommand,
    result: BoutResult,
    entrantA: EntrantId,
    entrantB: EntrantId,
    eloA: number,
    eloB: number
  ): void {
    this.log({ type: 'bout_recorded', command, result, entrantA, entrantB, eloA, eloB });
  }

  entrantEliminated(entrantId: EntrantId, path: string): void {
    this.log({ type: 'entrant_eliminated', entrantId, path });
  }

  poolCreated(size: number, topSkew: number, power: number): void {
    this.log({ type: 'pool_created', size, topSkew, power });
  }

  knockoutResumed(poolSize: number, eliminated: number): void {
    this.log({ type: 'knockout_resumed', poolSize, eliminated });
  }

  knockoutReset(exportedTo?: string): void {
    this.log({ type: 'knockout_reset', exportedTo });
  }

  entrantRemoved(entrantId: EntrantId, path: string, elo: number, adjustment: number): void {
    this.log({ type: 'entrant_removed', entrantId, path, elo, adjustment });
  }

  redistributionSkipped(delta: number, reason: string): void {
    this.log({ type: 'redistribution_skipped', delta, reason });
  }

  error(error: string, context?: string, stack?: string): void {
    this.log({ type: 'error', error, context, stack });
  }

  warning(message: string, context?: string): void {
    this.log({ type: 'warning', message, context });
  }

  debug(message: string, data?: unknown): void {
    this.log({ type: 'debug', message, data });
  }

  getLogPath(): string {
    return this.logPath;
  }

  /**
   * Disables logging (for tests).
   */
  disable(): void {
    this.enabled = false;
  }

  enable(): void {
    this.enabled = true;
  }
}

function isLogEntry(value: unknown): value is SessionLogEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    'sessionId' in value &&
    'event' in value
  );
}

/**
 * Reads all log entries from a session log file. Malformed lines are skipped.
 */
export function readSessionLogs(sessionId: string, logsDir: string): SessionLogEntry[] {
  const logPath = join(logsDir, `${sessionId}.jsonl`);

  if (!existsSync(logPath)) {
    return [];
  }

  const content = readFileSync(logPath, 'utf-8');
  const lines = content.trim().split('\n').filter(line => line.length > 0);

  const entries: SessionLogEntry[] = [];
  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }
    if (isLogEntry(parsed)) {
      entries.push(parsed);
    }
  }
  return entries;
}

/**
 * Lists all available session log files.
 */
export function listSessionLogs(logsDir: string): { sessionId: string; path: string; size: number }[] {
  if (!existsSync(logsDir)) {
    return [];
  }

  return readdirSync(logsDir)
    .filter(f => f.endsWith('.jsonl'))
    .map(f => {
      const fullPath = join(logsDir, f);
      return {
        sessionId: basename(f, '.jsonl'),
        path: fullPath,
        size: statSync(fullPath).size,
      };
    });
}

/**
 * Filters log entries by type.
 */
export function filterLogsByType(
  logs: SessionLogEntry[],
  types: SessionLogEvent['type'][]
): SessionLogEntry[] {
  return logs.filter(entry => types.includes(entry.event.type));
}

/**
 * Generate a session identifier that sorts by start time.
 */
export function createSessionId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\..*$/, '');
  return `session_${stamp}_${Math.random().toString(36).slice(2, 8)}`;
}
