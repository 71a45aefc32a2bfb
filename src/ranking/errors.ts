/**
 * Error types raised by the ranking engine.
 *
 * Callers decide severity by class: configuration conflicts and integrity
 * failures end the process, the rest are reported and the loop carries on
 * (or winds down) on its own.
 */

import type { EntrantId } from './types';

export class RankingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RankingError';
  }
}

/**
 * A persisted knockout pool exists and the requested pool size differs.
 */
export class ConfigurationConflictError extends RankingError {
  readonly existingSize: number;
  readonly requestedSize: number;

  constructor(existingSize: number, requestedSize: number) {
    super(
      `Existing knockout tournament has pool size ${existingSize}, but pool size ${requestedSize} was requested`
    );
    this.name = 'ConfigurationConflictError';
    this.existingSize = existingSize;
    this.requestedSize = requestedSize;
  }
}

export class InsufficientEntrantsError extends RankingError {
  readonly available: number;
  readonly required: number;

  constructor(available: number, required: number) {
    super(`Only ${available} entrants available, but ${required} are required`);
    this.name = 'InsufficientEntrantsError';
    this.available = available;
    this.required = required;
  }
}

/**
 * A rating update referenced an entrant the store does not know.
 */
export class UnknownEntrantError extends RankingError {
  readonly entrantId: EntrantId;

  constructor(entrantId: EntrantId) {
    super(`Unknown entrant: ${entrantId}`);
    this.name = 'UnknownEntrantError';
    this.entrantId = entrantId;
  }
}

export class EmptyCandidateSetError extends RankingError {
  constructor() {
    super('Could not find a second entrant for the bout');
    this.name = 'EmptyCandidateSetError';
  }
}

export class InvalidCommandError extends RankingError {
  readonly command: string;

  constructor(command: string, reason: string) {
    super(reason);
    this.name = 'InvalidCommandError';
    this.command = command;
  }
}

/**
 * Whether an error should stop the process rather than just the current bout.
 */
export function isFatalRankingError(error: unknown): boolean {
  return error instanceof ConfigurationConflictError || error instanceof UnknownEntrantError;
}
