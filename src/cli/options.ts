/**
 * Command-line options.
 */

import yargs from 'yargs';
import { MATCH_ALL, extensionsToPattern } from '../files/discovery';

export interface CliOptions {
  targetDir: string;
  pattern: RegExp;
  knockout: boolean;
  power: number;
  poolSize?: number;
  topSkew?: number;
  /** undefined = decide from the environment */
  color?: boolean;
  links?: boolean;
}

export const DEFAULT_POWER = 1.0;

/**
 * Parse and validate arguments (without the node/script prefix).
 *
 * @throws Error with a usage message when validation fails
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const args = yargs(argv)
    .scriptName('pairwise-elo')
    .usage('$0 [target_dir] [options]\n\nRank files through pairwise comparisons with Elo ratings.')
    .option('extension', {
      alias: 'e',
      type: 'string',
      describe: 'File extensions to include (comma-separated, e.g. "py,js,ts")',
    })
    .option('knockout', {
      alias: 'k',
      type: 'boolean',
      default: false,
      describe: 'Knockout mode: eliminate entrants until one remains',
    })
    .option('power', {
      alias: 'p',
      type: 'number',
      default: DEFAULT_POWER,
      describe: 'Exponent for games-played balancing; higher favours under-played entrants',
    })
    .option('pool-size', {
      alias: 'n',
      type: 'number',
      describe: 'Knockout pool size (default: every eligible entrant)',
    })
    .option('top-skew', {
      alias: 's',
      type: 'number',
      describe: 'How many pool places go to strong, rarely-played entrants',
    })
    .option('color', {
      type: 'boolean',
      describe: 'Force colour output on or off (--no-color)',
    })
    .option('links', {
      type: 'boolean',
      describe: 'Force terminal hyperlinks on or off (--no-links)',
    })
    .check((parsed) => {
      if (parsed._.length > 1) {
        throw new Error('Only one target directory may be given');
      }
      if (!Number.isFinite(parsed.power) || parsed.power <= 0) {
        throw new Error('Power parameter must be positive (e.g., 0.5, 1.0, 2.0)');
      }
      const poolSize = parsed['pool-size'];
      if (poolSize !== undefined && (!Number.isInteger(poolSize) || poolSize < 2)) {
        throw new Error('Pool size must be an integer of at least 2');
      }
      const topSkew = parsed['top-skew'];
      if (topSkew !== undefined) {
        if (poolSize === undefined) {
          throw new Error('--top-skew requires --pool-size');
        }
        if (!Number.isInteger(topSkew) || topSkew < 0 || topSkew > poolSize) {
          throw new Error(`Top-skew size must be between 0 and ${poolSize}`);
        }
      }
      return true;
    })
    // Unknown flags are errors; positionals are checked above
    .strictOptions()
    .help()
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .parseSync();

  const positional = args._[0];

  return {
    targetDir: positional === undefined ? '.' : String(positional),
    pattern: args.extension ? extensionsToPattern(args.extension) : MATCH_ALL,
    knockout: args.knockout,
    power: args.power,
    poolSize: args['pool-size'],
    topSkew: args['top-skew'],
    color: args.color,
    links: args.links,
  };
}
