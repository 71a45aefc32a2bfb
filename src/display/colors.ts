/**
 * ANSI styling and terminal hyperlinks.
 *
 * Nothing here reads global state: callers pass a `DisplayOptions` value
 * built once at startup.
 */

export interface DisplayOptions {
  /** Emit ANSI colour codes */
  color: boolean;
  /** Emit OSC 8 hyperlinks to the files being ranked */
  hyperlinks: boolean;
}

export const PLAIN: DisplayOptions = { color: false, hyperlinks: false };

export const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  brightGreen: '\x1b[92m',
} as const;

export type ColorCode = (typeof COLORS)[keyof typeof COLORS];

export function paint(options: DisplayOptions, text: string, ...codes: ColorCode[]): string {
  if (!options.color || codes.length === 0) return text;
  return codes.join('') + text + COLORS.reset;
}

/**
 * Colour choice follows https://no-color.org: NO_COLOR disables,
 * FORCE_COLOR enables, otherwise only on a TTY.
 */
export function supportsColor(env: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  if (env.NO_COLOR) return false;
  if (env.FORCE_COLOR) return true;
  return isTTY;
}

export function supportsHyperlinks(env: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  if (env.PAIRWISE_ELO_NO_LINKS) return false;
  return isTTY;
}

export function resolveDisplayOptions(
  env: NodeJS.ProcessEnv,
  isTTY: boolean,
  overrides: Partial<DisplayOptions> = {}
): DisplayOptions {
  return {
    color: overrides.color ?? supportsColor(env, isTTY),
    hyperlinks: overrides.hyperlinks ?? supportsHyperlinks(env, isTTY),
  };
}

/**
 * Wrap `text` in an OSC 8 link to a local file.
 */
export function fileLink(options: DisplayOptions, text: string, absolutePath: string): string {
  if (!options.hyperlinks) return text;
  const url = 'file://' + encodeURI(absolutePath.replace(/\\/g, '/'));
  return `\x1b]8;;${url}\x1b\\${text}\x1b]8;;\x1b\\`;
}

/**
 * Colour for a win probability: confident green, leaning yellow, else dim.
 */
export function probabilityColor(probability: number): ColorCode {
  if (probability >= 0.7) return COLORS.green;
  if (probability >= 0.55) return COLORS.yellow;
  return COLORS.dim;
}

/**
 * Histogram colour by position relative to the leader.
 */
export function histogramColor(ratio: number): ColorCode {
  if (ratio >= 0.9) return COLORS.brightGreen;
  if (ratio >= 0.7) return COLORS.green;
  if (ratio >= 0.5) return COLORS.cyan;
  if (ratio >= 0.3) return COLORS.blue;
  return COLORS.dim;
}
