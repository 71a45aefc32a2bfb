/**
 * Logging module - JSONL session logs.
 */

export {
  SessionLogger,
  readSessionLogs,
  listSessionLogs,
  filterLogsByType,
  createSessionId,
  defaultLogsDir,
} from './session-logger';
export type { SessionLogEvent, SessionLogEntry } from './session-logger';
