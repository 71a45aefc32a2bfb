import { describe, it, expect } from 'vitest';
import {
  COLORS,
  PLAIN,
  fileLink,
  histogramColor,
  paint,
  probabilityColor,
  resolveDisplayOptions,
  supportsColor,
  supportsHyperlinks,
} from '../colors';

const RICH = { color: true, hyperlinks: true };

describe('paint', () => {
  it('wraps text in the given codes and a reset', () => {
    expect(paint(RICH, 'x', COLORS.bold, COLORS.red)).toBe('\x1b[1m\x1b[31mx\x1b[0m');
  });

  it('returns plain text when colour is off', () => {
    expect(paint(PLAIN, 'x', COLORS.red)).toBe('x');
  });
});

describe('environment detection', () => {
  it('honours NO_COLOR over FORCE_COLOR', () => {
    expect(supportsColor({ NO_COLOR: '1', FORCE_COLOR: '1' }, true)).toBe(false);
    expect(supportsColor({ FORCE_COLOR: '1' }, false)).toBe(true);
    expect(supportsColor({}, true)).toBe(true);
    expect(supportsColor({}, false)).toBe(false);
  });

  it('turns links off with PAIRWISE_ELO_NO_LINKS', () => {
    expect(supportsHyperlinks({ PAIRWISE_ELO_NO_LINKS: '1' }, true)).toBe(false);
    expect(supportsHyperlinks({}, true)).toBe(true);
  });

  it('lets explicit flags win', () => {
    expect(resolveDisplayOptions({}, true, { color: false })).toEqual({ color: false, hyperlinks: true });
    expect(resolveDisplayOptions({ NO_COLOR: '1' }, false, { color: true, hyperlinks: true })).toEqual(RICH);
  });
});

describe('fileLink', () => {
  it('emits an OSC 8 link with an encoded file URL', () => {
    expect(fileLink(RICH, 'a b', '/d/a b')).toBe('\x1b]8;;file:///d/a%20b\x1b\\a b\x1b]8;;\x1b\\');
  });

  it('returns the text alone when links are off', () => {
    expect(fileLink(PLAIN, 'a', '/d/a')).toBe('a');
  });
});

describe('colour scales', () => {
  it('grades probabilities', () => {
    expect(probabilityColor(0.8)).toBe(COLORS.green);
    expect(probabilityColor(0.6)).toBe(COLORS.yellow);
    expect(probabilityColor(0.5)).toBe(COLORS.dim);
  });

  it('grades histogram bars', () => {
    expect(histogramColor(1)).toBe(COLORS.brightGreen);
    expect(histogramColor(0.75)).toBe(COLORS.green);
    expect(histogramColor(0.5)).toBe(COLORS.cyan);
    expect(histogramColor(0.3)).toBe(COLORS.blue);
    expect(histogramColor(0.1)).toBe(COLORS.dim);
  });
});
