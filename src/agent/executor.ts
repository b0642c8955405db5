import type winston from 'winston';
import { loggers } from '../logger';
import { errorMessage } from '../errors';
import type { Painting, PostResult, ScheduledPost } from '../models';
import { PaintingStore, paintingTitle } from '../metadata/paintings';
import { recordPostResult } from '../metadata/tracking';
import { formatPostText } from '../social/formatter';
import { SocialPoster, fail } from '../social/platform';
import type { PosterRegistry } from '../social/providers';
import type { PostLogger } from '../social/postLog';
import { Scheduler, parseScheduledTime } from '../scheduler';

export interface PostingDeps {
  registry: PosterRegistry;
  paintings: PaintingStore;
  postLog: PostLogger;
  websiteUrl: string;
  log?: winston.Logger;
}

export interface PostOutcome {
  result: PostResult;
  painting: Painting;
  imagePath: string | null;
}

export interface PostOptions {
  caption?: string;
  now?: Date;
  // false when the caller saves the record itself
  save?: boolean;
}

/**
 * Posts one painting to one platform: resolve the small image, build the
 * caption, post with the description as alt text, then record tracking and
 * the social-log entry.
 */
export async function postPainting(deps: PostingDeps, painting: Painting, poster: SocialPoster, opts: PostOptions = {}): Promise<PostOutcome> {
  const { record } = painting;
  const title = paintingTitle(record);
  const imagePath = deps.paintings.resolveImagePath(record);

  let result: PostResult;
  if (!imagePath) {
    result = fail('Image file not found');
  } else {
    const caption = opts.caption ?? formatPostText(record, { websiteUrl: deps.websiteUrl });
    try {
      result = await poster.postImage(imagePath, caption, record.description ?? '');
    } catch (err) {
      result = fail(errorMessage(err));
    }
  }

  if (!result.success) {
    deps.postLog.failure(poster.name, title, imagePath, result.error);
    return { result, painting, imagePath };
  }

  // The post is live from here on; a bookkeeping error must not turn it into a failure.
  const log = deps.log ?? loggers.social;
  const postUrl = result.postUrl;
  const updated = { path: painting.path, record: recordPostResult(record, poster.name, result, opts.now) };
  const note = (step: string, fn: () => void) => {
    try {
      fn();
    } catch (err) {
      log.error(`posted ${title} to ${poster.name} but ${step} failed: ${errorMessage(err)}`, { url: postUrl });
    }
  };
  if (opts.save !== false) note('saving the record', () => deps.paintings.save(updated));
  note('writing the social log', () => deps.postLog.success(poster.name, title, imagePath, postUrl));
  return { result, painting: updated, imagePath };
}

async function runEntry(deps: PostingDeps, entry: ScheduledPost, now: Date): Promise<PostResult> {
  if (parseScheduledTime(entry.scheduled_time) === null) {
    return fail(`Invalid scheduled_time: ${entry.scheduled_time}`);
  }
  try {
    const painting = deps.paintings.load(entry.metadata_path);
    const poster = deps.registry.getPoster(entry.platform);
    if (poster.kind === 'stub') return fail(`${poster.displayName} integration not yet implemented`);
    if (!poster.isConfigured()) return fail(`${poster.displayName} not configured`);
    const { result } = await postPainting(deps, painting, poster, { now });
    return result;
  } catch (err) {
    return fail(errorMessage(err));
  }
}

export interface CheckSummary {
  posted: number;
  failed: number;
}

// One pass over the due entries. A bad entry fails alone; the rest still run.
export async function executeDuePosts(deps: PostingDeps & { scheduler: Scheduler }, now: Date = new Date()): Promise<CheckSummary> {
  const log = deps.log ?? loggers.scheduler;
  const summary: CheckSummary = { posted: 0, failed: 0 };
  const due = deps.scheduler.due(now);
  log.info(`${due.length} scheduled post(s) due`);

  for (const entry of due) {
    const result = await runEntry(deps, entry, now);
    try {
      if (result.success) {
        deps.scheduler.markPosted(entry.id, result.postUrl);
        summary.posted++;
        log.info(`posted ${entry.content_id} to ${entry.platform}`, { id: entry.id, url: result.postUrl });
      } else {
        deps.scheduler.markFailed(entry.id, result.error);
        summary.failed++;
        log.warn(`failed ${entry.content_id} on ${entry.platform}: ${result.error}`, { id: entry.id });
      }
    } catch (err) {
      log.error(`could not update scheduled post ${entry.id}: ${errorMessage(err)}`);
    }
  }
  return summary;
}
