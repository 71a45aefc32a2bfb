/**
 * Parsing of the judge's reply at the bout prompt.
 */

import type { ResultCommand } from '../ranking/types';
import { parseResultCommand } from '../ranking/knockout';
import { parseTopCommand } from '../display/format';

export type RemovalTarget = 'a' | 'b' | 'ab';

export type JudgeInput =
  | { kind: 'result'; command: ResultCommand }
  | { kind: 'top'; limit: number }
  | { kind: 'open' }
  | { kind: 'rename'; from: string; to: string }
  | { kind: 'remove'; target: RemovalTarget }
  | { kind: 'reset' }
  | { kind: 'quit' }
  | { kind: 'invalid'; input: string; reason?: string };

const REMOVAL_TARGETS: ReadonlyMap<string, RemovalTarget> = new Map([
  ['a', 'a'],
  ['b', 'b'],
  ['ab', 'ab'],
  ['ba', 'ab'],
]);

export function parseJudgeInput(raw: string): JudgeInput {
  const input = raw.trim();
  const lower = input.toLowerCase();

  const command = parseResultCommand(input);
  if (command) return { kind: 'result', command };

  const top = parseTopCommand(input);
  if (top !== null) return { kind: 'top', limit: top };

  if (lower === 'o') return { kind: 'open' };
  if (lower === 'reset') return { kind: 'reset' };
  if (lower === 'q' || lower === 'quit') return { kind: 'quit' };

  if (lower.startsWith('ren ')) {
    const parts = input.slice(4).trim().split(/\s+/);
    if (parts.length !== 2) {
      return { kind: 'invalid', input, reason: 'Usage: ren <old> <new>' };
    }
    return { kind: 'rename', from: parts[0], to: parts[1] };
  }

  if (lower.startsWith('rem ')) {
    const target = REMOVAL_TARGETS.get(lower.slice(4).trim());
    if (!target) {
      return { kind: 'invalid', input, reason: 'Usage: rem a|b|ab' };
    }
    return { kind: 'remove', target };
  }

  return { kind: 'invalid', input };
}

export function promptText(knockout: boolean): string {
  return knockout
    ? 'Your choice (A/B/t/a-/b-/a+/b+/ta-/tb-/t-/o/top [N]/ren <old> <new>/rem a/b/ab/reset/q): '
    : 'Your choice (A/B/t/o/top [N]/ren <old> <new>/rem a/b/ab/q): ';
}

export function invalidInputMessage(knockout: boolean): string {
  return knockout
    ? 'Invalid input. Please enter A, B, t, a-, b-, a+, b+, ta-, tb-, t-, o, top [N], ren <old> <new>, rem a/b/ab, reset, or q'
    : 'Invalid input. Please enter A, B, t, o, top [N], ren <old> <new>, rem a/b/ab, or q';
}
