import chalk from 'chalk';
import { runDailyPost } from '../agent/dailyPoster';
import { paintingTitle } from '../metadata/paintings';
import { AppServices, postingDeps } from './services';
import { say } from './ui';

export async function dailyPost(s: AppServices) {
  s.activity.record('daily-post');
  const report = await runDailyPost({ ...postingDeps(s), rounds: s.rounds, analyzer: s.analyzer });

  for (const w of report.warnings) say.warning(w);
  if (!report.painting) return;

  say.header(`${paintingTitle(report.painting.record)} ${chalk.dim(`(round ${report.round})`)}`);
  if (report.succeeded.length) say.success(`posted: ${report.succeeded.join(', ')}`);
  if (report.failed.length) say.error(`failed: ${report.failed.join(', ')}`);
  if (report.skipped.length) say.dim(`skipped: ${report.skipped.join(', ')}`);
}
