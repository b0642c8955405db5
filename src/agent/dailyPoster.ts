import { existsSync } from 'fs';
import type { LowSync } from 'lowdb';
import { openJsonStore } from '../db';
import { loggers } from '../logger';
import { errorMessage } from '../errors';
import type { Painting, RoundsDocument } from '../models';
import { paintingTitle } from '../metadata/paintings';
import { postCount } from '../metadata/tracking';
import { formatPostText } from '../social/formatter';
import { platformStatus } from '../social/providers';
import type { ImageAnalyzer } from './analyzer';
import { PostingDeps, postPainting } from './executor';

export const DAILY_PLATFORMS = ['mastodon', 'bluesky', 'instagram', 'threads', 'cara', 'pixelfed', 'tiktok', 'facebook', 'linkedin'];

// rounds.json: every painting goes out once per round before any repeats
export class RoundsStore {
  private db: LowSync<RoundsDocument>;

  constructor(readonly file: string) {
    this.db = openJsonStore<RoundsDocument>(file, { current_round: 1 });
  }

  current(): number {
    if (!existsSync(this.file)) {
      this.db.data = { current_round: 1 };
      this.db.write();
      return 1;
    }
    this.db.read();
    const round = this.db.data.current_round;
    return Number.isInteger(round) && round >= 1 ? round : 1;
  }

  increment(): number {
    const next = this.current() + 1;
    this.db.data = { current_round: next };
    this.db.write();
    return next;
  }
}

// Eligible: some listed platform has post_count below the round.
export function findEligible(paintings: Painting[], round: number, platforms: readonly string[]): Painting[] {
  return paintings.filter((p) => platforms.some((name) => postCount(p.record, name) < round));
}

export interface DailyReport {
  painting: Painting | null;
  round: number;
  succeeded: string[];
  failed: string[];
  skipped: string[];
  warnings: string[];
}

export interface DailyDeps extends PostingDeps {
  rounds: RoundsStore;
  // built on first use; may throw when no API key is configured
  analyzer: () => ImageAnalyzer;
  random?: () => number;
  platforms?: readonly string[];
  now?: Date;
}

async function shortDescription(deps: DailyDeps, painting: Painting, imagePath: string, warnings: string[]): Promise<string | null> {
  const { record } = painting;
  if (record.short_description) return record.short_description;
  try {
    if (record.description) return await deps.analyzer().summarizeToShortDescription(record.description, 200);
    return await deps.analyzer().generateSocialDescription(imagePath, paintingTitle(record), 200);
  } catch (err) {
    warnings.push(`Short description unavailable: ${errorMessage(err)}`);
    return null;
  }
}

export async function runDailyPost(deps: DailyDeps): Promise<DailyReport> {
  const log = deps.log ?? loggers.daily;
  const platforms = deps.platforms ?? DAILY_PLATFORMS;
  const random = deps.random ?? Math.random;
  const report: DailyReport = { painting: null, round: deps.rounds.current(), succeeded: [], failed: [], skipped: [], warnings: [] };

  const all = deps.paintings.findAll();
  if (all.length === 0) {
    report.warnings.push('No paintings found in metadata directory');
    return report;
  }

  const ready = platforms.filter((name) => deps.registry.has(name) && platformStatus(deps.registry.getPoster(name)) === 'ready');
  if (ready.length === 0) {
    report.warnings.push('No daily platform is configured');
    return report;
  }

  let eligible = findEligible(all, report.round, ready);
  if (eligible.length === 0) {
    report.round = deps.rounds.increment();
    log.info(`all paintings posted this round; now round ${report.round}`);
    eligible = findEligible(all, report.round, ready);
  }
  if (eligible.length === 0) {
    report.warnings.push('No eligible paintings');
    return report;
  }

  let painting = eligible[Math.floor(random() * eligible.length)];
  const title = paintingTitle(painting.record);
  log.info(`selected '${title}' from ${eligible.length} eligible painting(s), round ${report.round}`);

  const imagePath = deps.paintings.resolveImagePath(painting.record);
  if (!imagePath) {
    report.painting = painting;
    report.failed.push(...ready);
    report.warnings.push('No image file');
    return report;
  }

  const short = await shortDescription(deps, painting, imagePath, report.warnings);
  if (short && short !== painting.record.short_description) {
    painting = { ...painting, record: { ...painting.record, short_description: short } };
  }
  const caption = formatPostText(painting.record, {
    websiteUrl: deps.websiteUrl,
    description: short ?? painting.record.description,
  });

  for (const name of platforms) {
    try {
      if (!deps.registry.has(name) || platformStatus(deps.registry.getPoster(name)) !== 'ready') {
        report.skipped.push(name);
        continue;
      }
      const poster = deps.registry.getPoster(name);
      if (!(await poster.verifyCredentials())) {
        report.failed.push(name);
        report.warnings.push(`${poster.displayName} credentials invalid`);
        deps.postLog.credentialFailure(name);
        continue;
      }
      const outcome = await postPainting(deps, painting, poster, { caption, save: false, now: deps.now });
      if (outcome.result.success) {
        painting = outcome.painting;
        report.succeeded.push(name);
      } else {
        report.failed.push(name);
        report.warnings.push(`${poster.displayName}: ${outcome.result.error}`);
      }
    } catch (err) {
      report.failed.push(name);
      report.warnings.push(`${name}: ${errorMessage(err)}`);
      deps.postLog.failure(name, title, imagePath, errorMessage(err));
    }
  }

  deps.paintings.save(painting);
  report.painting = painting;
  log.info(`daily post done: ${report.succeeded.length} posted, ${report.failed.length} failed, ${report.skipped.length} skipped`);
  return report;
}
