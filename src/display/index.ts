export {
  COLORS,
  PLAIN,
  paint,
  supportsColor,
  supportsHyperlinks,
  resolveDisplayOptions,
  fileLink,
  probabilityColor,
  histogramColor,
} from './colors';
export type { DisplayOptions, ColorCode } from './colors';
export {
  formatRecord,
  formatProbability,
  parseTopCommand,
  histogramBar,
  formatLeaderboard,
  formatStandings,
  formatMatchup,
  describeRankMovement,
  formatRankChanges,
  sortByRating,
  describeKnockoutOutcome,
  DEFAULT_LEADERBOARD_SIZE,
  HISTOGRAM_WIDTH,
} from './format';
export { formatStandingsCsv, exportStandings, CSV_HEADER } from './export';
