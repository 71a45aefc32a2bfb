import { describe, it, expect } from 'vitest';
import { parseCliArgs, DEFAULT_POWER } from '../options';
import { MATCH_ALL } from '../../files/discovery';

describe('parseCliArgs', () => {
  it('defaults to ladder mode over the current directory', () => {
    expect(parseCliArgs([])).toEqual({
      targetDir: '.',
      pattern: MATCH_ALL,
      knockout: false,
      power: DEFAULT_POWER,
      poolSize: undefined,
      topSkew: undefined,
      color: undefined,
      links: undefined,
    });
  });

  it('reads every option', () => {
    const options = parseCliArgs(['clips', '-e', 'mp4,mov', '-k', '-p', '2.5', '-n', '8', '-s', '2', '--no-color']);

    expect(options.targetDir).toBe('clips');
    expect(options.pattern.source).toBe('.*\\.(mp4|mov)$');
    expect(options.knockout).toBe(true);
    expect(options.power).toBe(2.5);
    expect(options.poolSize).toBe(8);
    expect(options.topSkew).toBe(2);
    expect(options.color).toBe(false);
  });

  it('accepts long option names', () => {
    const options = parseCliArgs(['--knockout', '--pool-size', '4', '--top-skew', '0', '--no-links']);
    expect(options.poolSize).toBe(4);
    expect(options.topSkew).toBe(0);
    expect(options.links).toBe(false);
  });

  it('rejects a non-positive power', () => {
    expect(() => parseCliArgs(['-p', '0'])).toThrow('Power parameter must be positive (e.g., 0.5, 1.0, 2.0)');
  });

  it('rejects a pool below two', () => {
    expect(() => parseCliArgs(['-k', '-n', '1'])).toThrow('Pool size must be an integer of at least 2');
  });

  it('requires a pool size for top-skew', () => {
    expect(() => parseCliArgs(['-k', '-s', '2'])).toThrow('--top-skew requires --pool-size');
  });

  it('keeps top-skew within the pool', () => {
    expect(() => parseCliArgs(['-k', '-n', '4', '-s', '5'])).toThrow('Top-skew size must be between 0 and 4');
  });

  it('takes the target directory alone or after flags', () => {
    expect(parseCliArgs(['clips']).targetDir).toBe('clips');
    expect(parseCliArgs(['-k', 'clips']).targetDir).toBe('clips');
    expect(parseCliArgs(['-k', 'clips']).knockout).toBe(true);
  });

  it('refuses more than one target directory', () => {
    expect(() => parseCliArgs(['one', 'two'])).toThrow('Only one target directory may be given');
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow('Unknown argument: bogus');
  });
});
