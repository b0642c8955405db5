import { CronJob } from 'cron';
import { nanoid } from 'nanoid';
import type winston from 'winston';
import type { LowSync } from 'lowdb';
import { openJsonStore } from './db';
import { loggers } from './logger';
import { ScheduleDocument, ScheduledPost, PostStatus, scheduleDocumentSchema, scheduledPostSchema } from './models';
import { InvalidTransitionError, ScheduleStoreError, ScheduledPostNotFoundError, errorMessage } from './errors';

// Epoch ms, or null when the string is not a date. No offset means local time.
export function parseScheduledTime(value: string): number | null {
  const t = Date.parse(value);
  return Number.isNaN(t) ? null : t;
}

// "YYYY-MM-DD HH:MM" in local time; null when malformed or not a real date.
export function parseLocalDateTime(input: string): Date | null {
  const m = input.trim().match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/);
  if (!m) return null;
  const [y, mo, d, h, mi] = m.slice(1).map(Number);
  const date = new Date(y, mo - 1, d, h, mi);
  const valid =
    date.getFullYear() === y && date.getMonth() === mo - 1 && date.getDate() === d && date.getHours() === h && date.getMinutes() === mi;
  return valid ? date : null;
}

const pad = (n: number) => String(n).padStart(2, '0');

// ISO form without an offset, read back as local time
export function toLocalIso(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}T${pad(d.getHours())}:${pad(d.getMinutes())}:00`;
}

export class Scheduler {
  private db: LowSync<ScheduleDocument>;
  // entries that failed validation on the last load; written back untouched
  private unreadable: unknown[] = [];

  constructor(readonly scheduleFile: string, private log: winston.Logger = loggers.scheduler) {
    this.db = openJsonStore<ScheduleDocument>(scheduleFile, { scheduled_posts: [] });
  }

  schedule(contentId: string, metadataPath: string, platform: string, scheduledTime: string | Date): ScheduledPost {
    const time = typeof scheduledTime === 'string' ? scheduledTime : scheduledTime.toISOString();
    const posts = this.load();
    const post: ScheduledPost = {
      id: nanoid(8),
      content_type: 'painting',
      content_id: contentId,
      metadata_path: metadataPath,
      platform,
      scheduled_time: time,
      status: 'pending',
      post_url: null,
      error: null,
      created_at: new Date().toISOString(),
    };
    posts.push(post);
    this.save(posts);
    this.log.info(`scheduled ${contentId} on ${platform} for ${time}`, { id: post.id });
    return post;
  }

  all(): ScheduledPost[] {
    return this.load();
  }

  get(id: string): ScheduledPost | undefined {
    return this.load().find((p) => p.id === id);
  }

  due(now: Date = new Date()): ScheduledPost[] {
    const cutoff = now.getTime();
    return this.load().filter((p) => {
      if (p.status !== 'pending') return false;
      const t = parseScheduledTime(p.scheduled_time);
      return t === null || t <= cutoff;
    });
  }

  upcoming(now: Date = new Date()): ScheduledPost[] {
    const cutoff = now.getTime();
    return this.load()
      .flatMap((p) => {
        const t = parseScheduledTime(p.scheduled_time);
        return p.status === 'pending' && t !== null && t > cutoff ? [{ p, t }] : [];
      })
      .sort((a, b) => a.t - b.t)
      .map(({ p }) => p);
  }

  history(limit = 50): ScheduledPost[] {
    const time = (p: ScheduledPost) => parseScheduledTime(p.scheduled_time) ?? 0;
    return this.load()
      .filter((p) => p.status === 'posted' || p.status === 'failed')
      .sort((a, b) => time(b) - time(a))
      .slice(0, limit);
  }

  markPosted(id: string, postUrl: string | null): ScheduledPost {
    return this.transition(id, 'posted', { post_url: postUrl, error: null });
  }

  markFailed(id: string, error: string): ScheduledPost {
    return this.transition(id, 'failed', { post_url: null, error });
  }

  cancel(id: string): ScheduledPost {
    return this.transition(id, 'cancelled', { post_url: null, error: null });
  }

  // Points pending entries at a record's new location. Finished entries keep their history.
  relocate(fromPath: string, toPath: string): number {
    const posts = this.load();
    const moved = posts.filter((p) => p.status === 'pending' && p.metadata_path === fromPath);
    if (moved.length === 0) return 0;
    for (const p of moved) p.metadata_path = toPath;
    this.save(posts);
    this.log.info(`moved ${moved.length} pending post(s) to ${toPath}`);
    return moved.length;
  }

  private transition(id: string, to: PostStatus, patch: Pick<ScheduledPost, 'post_url' | 'error'>): ScheduledPost {
    const posts = this.load();
    const post = posts.find((p) => p.id === id);
    if (!post) throw new ScheduledPostNotFoundError(id);
    if (post.status !== 'pending') throw new InvalidTransitionError(id, post.status, to);
    post.status = to;
    post.post_url = patch.post_url;
    post.error = patch.error;
    this.save(posts);
    return post;
  }

  private load(): ScheduledPost[] {
    try {
      this.db.read();
    } catch (err) {
      throw new ScheduleStoreError(`Cannot read schedule ${this.scheduleFile}: ${errorMessage(err)}`);
    }
    const doc = scheduleDocumentSchema.safeParse(this.db.data);
    if (!doc.success) {
      throw new ScheduleStoreError(`Malformed schedule ${this.scheduleFile}: expected {"scheduled_posts": [...]}`);
    }

    const posts: ScheduledPost[] = [];
    this.unreadable = [];
    doc.data.scheduled_posts.forEach((raw, i) => {
      const parsed = scheduledPostSchema.safeParse(raw);
      if (parsed.success) {
        posts.push(parsed.data);
      } else {
        this.unreadable.push(raw);
        this.log.warn(`skipping malformed schedule entry #${i}`, { issues: parsed.error.issues.map((x) => x.path.join('.')) });
      }
    });
    return posts;
  }

  private save(posts: ScheduledPost[]) {
    this.db.data = { scheduled_posts: [...posts, ...this.unreadable] };
    this.db.write();
  }
}

// Tick function for watch mode; a tick that starts while another runs is skipped.
export function createWatchTick(runCheck: () => Promise<void>, log: winston.Logger = loggers.scheduler) {
  let running = false;
  return async (): Promise<boolean> => {
    if (running) {
      log.warn('previous check still running, skipping this tick');
      return false;
    }
    running = true;
    try {
      await runCheck();
    } catch (err) {
      log.error(`scheduled check failed: ${errorMessage(err)}`);
    } finally {
      running = false;
    }
    return true;
  };
}

// runs every 5 minutes
export function startScheduler(
  runCheck: () => Promise<void>,
  opts: { runNow?: boolean } = {},
  log: winston.Logger = loggers.scheduler
): CronJob {
  const tick = createWatchTick(runCheck, log);
  const fire = () => {
    tick().catch((err) => log.error(`watch tick error: ${errorMessage(err)}`));
  };
  const job = new CronJob('*/5 * * * *', fire);
  job.start();
  if (opts.runNow) fire();
  log.info('Scheduler started (checks every 5 minutes)');
  return job;
}
