#!/usr/bin/env npx tsx
/**
 * pairwise-elo: rank files through judged pairwise comparisons.
 *
 * Usage:
 *   npx tsx src/cli/index.ts [target_dir]            # Ladder mode over every file
 *   npx tsx src/cli/index.ts clips -e mp4,mov        # Only some extensions
 *   npx tsx src/cli/index.ts clips -k                # Knockout until one remains
 *   npx tsx src/cli/index.ts clips -k -n 16 -s 4     # Knockout over a curated pool of 16
 *   npx tsx src/cli/index.ts clips -p 2              # Favour under-played entrants harder
 */

import { existsSync, statSync } from 'fs';
import { openStore, dbPathFor, closeDb } from '../db';
import { SessionLogger, createSessionId, defaultLogsDir } from '../logging';
import { resolveDisplayOptions, COLORS, paint } from '../display';
import type { DisplayOptions } from '../display';
import { discoverFiles, filterExisting, syncEntrants } from '../files';
import { startKnockout, RankingError, isFatalRankingError } from '../ranking';
import type { KnockoutStart } from '../ranking';
import { parseCliArgs, type CliOptions } from './options';
import { ReadlinePrompt } from './prompt';
import { JudgingSession } from './session';

function describeKnockoutStart(start: KnockoutStart, display: DisplayOptions): string {
  if (start.resumed) {
    const lines = [paint(display, 'Resuming knockout tournament...', COLORS.cyan)];
    if (start.poolSize > 0) lines.push(`  Tournament pool size: ${start.poolSize}`);
    lines.push(`  Already eliminated: ${start.eliminatedCount}`);
    lines.push(`  Still competing: ${start.competingCount}`);
    return lines.join('\n');
  }
  if (start.poolSize > 0) {
    const topSkew = start.selection.filter((s) => s.phase === 'top-skew').length;
    const suffix = topSkew > 0 ? ` (${topSkew} from the top-skew draw)` : '';
    return paint(display, `Selected ${start.poolSize} competitors for knockout tournament${suffix}`, COLORS.cyan);
  }
  return paint(display, `Knockout tournament with all ${start.competingCount} entrants`, COLORS.cyan);
}

function welcome(knockout: boolean, display: DisplayOptions): string {
  const title = paint(display, knockout ? 'pairwise-elo: knockout mode' : 'pairwise-elo: ladder mode', COLORS.bold);
  const help = knockout
    ? 'Judge each bout: A/B wins, t ties. Suffix - removes that side, + spares the loser. q quits.'
    : 'Judge each bout: A or B wins, t ties. q quits.';
  return `${title}\n${help}`;
}

async function run(options: CliOptions): Promise<number> {
  if (!existsSync(options.targetDir) || !statSync(options.targetDir).isDirectory()) {
    console.error(`Error: ${options.targetDir} is not a directory`);
    return 1;
  }

  const display = resolveDisplayOptions(process.env, Boolean(process.stdout.isTTY), {
    color: options.color,
    hyperlinks: options.links,
  });
  const logger = new SessionLogger(createSessionId(), defaultLogsDir(options.targetDir));
  const { store } = openStore(dbPathFor(options.targetDir));
  const prompt = new ReadlinePrompt();

  logger.sessionStarted(options.knockout ? 'knockout' : 'ladder', options.targetDir);

  try {
    if (options.knockout) {
      syncEntrants(store, discoverFiles(options.targetDir, options.pattern));
      const eligible = filterExisting(store.listEntrants(), options.targetDir, options.pattern);
      const start = startKnockout(store, eligible, {
        poolSize: options.poolSize,
        topSkew: options.topSkew,
        power: options.power,
        logger,
      });
      console.log(describeKnockoutStart(start, display));
    }

    console.log(welcome(options.knockout, display));

    const session = new JudgingSession({
      store,
      targetDir: options.targetDir,
      pattern: options.pattern,
      knockout: options.knockout,
      power: options.power,
      prompt,
      display,
      logger,
    });
    const reason = await session.run();
    logger.sessionEnded(reason);
    console.log(paint(display, '\nGoodbye!', COLORS.dim));
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message, 'session', error instanceof Error ? error.stack : undefined);
    console.error(paint(display, `Error: ${message}`, COLORS.red));

    if (error instanceof RankingError && !isFatalRankingError(error)) {
      return 0;
    }
    if (isFatalRankingError(error) && options.poolSize !== undefined) {
      console.error('Options:');
      console.error('  1. Run again without --pool-size to resume the existing tournament');
      console.error("  2. Type 'reset' during a knockout run to start over with a new pool size");
    }
    return 1;
  } finally {
    prompt.close();
    closeDb();
  }
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  process.on('SIGINT', () => {
    closeDb();
    console.log('\n\nGoodbye!');
    process.exit(130);
  });

  process.exitCode = await run(options);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
