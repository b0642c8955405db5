import chalk from 'chalk';
import type { Painting, ScheduledPost } from '../models';
import { paintingTitle } from '../metadata/paintings';
import { postCount } from '../metadata/tracking';
import { executeDuePosts } from '../agent/executor';
import { parseLocalDateTime, startScheduler, toLocalIso } from '../scheduler';
import { loggers } from '../logger';
import { errorMessage } from '../errors';
import { AppServices, postingDeps } from './services';
import { pickReadyPlatform } from './social';
import { say, ask, choose, confirm, table } from './ui';

export async function schedulePost(s: AppServices) {
  s.activity.record('schedule-post');
  say.header('Schedule a post');

  const poster = await pickReadyPlatform(s);
  if (!poster) return;

  const paintings = s.paintings.findAll().sort((a, b) => paintingTitle(a.record).localeCompare(paintingTitle(b.record)));
  if (paintings.length === 0) {
    say.warning('No paintings found in the metadata directory');
    return;
  }
  const painting = await choose<Painting>(
    'Painting:',
    paintings.map((p) => ({
      name: `${paintingTitle(p.record)} ${chalk.dim(`(posted ${postCount(p.record, poster.name)}x)`)}`,
      value: p,
    }))
  );

  const when = await ask('When? (YYYY-MM-DD HH:MM)', {
    validate: (input) => {
      const d = parseLocalDateTime(input);
      if (!d) return 'Use the format YYYY-MM-DD HH:MM';
      return d.getTime() > Date.now() ? true : 'That time is in the past';
    },
  });
  const at = parseLocalDateTime(when);
  if (!at) return;

  const post = s.scheduler.schedule(painting.record.filename_base, painting.path, poster.name, toLocalIso(at));
  say.success(`Scheduled '${paintingTitle(painting.record)}' on ${poster.displayName} for ${when} (id ${post.id})`);
}

const STATUS_COLOUR = {
  pending: chalk.cyan,
  posted: chalk.green,
  failed: chalk.red,
  cancelled: chalk.dim,
} as const;

function rows(posts: ScheduledPost[]): string[][] {
  return posts.map((p) => [
    p.id,
    p.scheduled_time.replace('T', ' ').slice(0, 16),
    p.platform,
    STATUS_COLOUR[p.status](p.status),
    p.content_id,
    p.post_url ?? p.error ?? '',
  ]);
}

export async function viewSchedule(s: AppServices) {
  s.activity.record('view-schedule');
  const widths = [10, 17, 10, 9, 28];

  const upcoming = s.scheduler.upcoming();
  say.header(`Upcoming (${upcoming.length})`);
  if (upcoming.length === 0) say.dim('nothing scheduled');
  else table(rows(upcoming), widths);

  const history = s.scheduler.history(10);
  console.log();
  say.header('Recent');
  if (history.length === 0) say.dim('no history yet');
  else table(rows(history), widths);

  if (upcoming.length === 0 || !(await confirm('Cancel a scheduled post?', false))) return;
  const id = await ask('Id to cancel:');
  try {
    const cancelled = s.scheduler.cancel(id);
    say.success(`Cancelled ${cancelled.id} (${cancelled.content_id} on ${cancelled.platform})`);
  } catch (err) {
    say.error(errorMessage(err));
  }
}

// Never throws; a broken schedule file is logged.
export async function checkSchedule(s: AppServices) {
  const log = loggers.scheduler;
  s.activity.record('check-schedule');
  try {
    const { posted, failed } = await executeDuePosts({ ...postingDeps(s), scheduler: s.scheduler });
    log.info(`check finished: ${posted} posted, ${failed} failed`);
  } catch (err) {
    log.error(`schedule check aborted: ${errorMessage(err)}`);
  }
}

export function watch(s: AppServices) {
  s.activity.record('watch');
  startScheduler(() => checkSchedule(s), { runNow: true });
  say.info('Watching the schedule. Press Ctrl+C to stop.');
}
