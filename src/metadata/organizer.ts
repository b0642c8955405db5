import { existsSync, mkdirSync, renameSync } from 'fs';
import { basename, join } from 'path';
import type winston from 'winston';
import { NEW_PAINTINGS_FOLDER, SUPPORTED_IMAGE_FORMATS, PathsConfig } from '../config';
import { errorMessage } from '../errors';
import { loggers } from '../logger';
import type { Painting, PaintingRecord } from '../models';
import type { Scheduler } from '../scheduler';
import { PaintingStore, filePaths, paintingFolder } from './paintings';

// "Imaginary Places" -> "imaginary-places"
export function collectionFolderName(collection: string): string {
  return collection
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^\p{L}\p{N}_-]/gu, '')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

export type OrganizeResult =
  | { success: true; painting: Painting; folder: string; rescheduled: number }
  | { success: false; error: string };

export interface OrganizeSummary {
  processed: number;
  organized: number;
  errors: string[];
}

function moveInto(file: string, dir: string): string {
  const dest = join(dir, basename(file));
  if (existsSync(dest)) throw new Error(`${dest} already exists`);
  mkdirSync(dir, { recursive: true });
  renameSync(file, dest);
  return dest;
}

/**
 * Moves a processed painting out of `new-paintings` into the folder named
 * after its collection: the big files, the small copy and the metadata
 * record, which then carries `collection_folder`. Pending scheduled posts
 * follow the record to its new path.
 */
export class FileOrganizer {
  constructor(
    private paths: Pick<PathsConfig, 'paintingsBig' | 'paintingsInstagram'>,
    private paintings: PaintingStore,
    private scheduler: Pick<Scheduler, 'relocate'> | null = null,
    private log: winston.Logger = loggers.metadata
  ) {}

  // Listed big files that exist, else <big>/<folder>/<base>.<ext>.
  private bigSources(record: PaintingRecord): string[] {
    const listed = filePaths(record.files.big).filter((p) => existsSync(p));
    if (listed.length > 0) return listed;
    const dir = join(this.paths.paintingsBig, paintingFolder(record));
    const found = SUPPORTED_IMAGE_FORMATS.map((ext) => join(dir, `${record.filename_base}${ext}`)).find((p) => existsSync(p));
    return found ? [found] : [];
  }

  organize(painting: Painting, now: Date = new Date()): OrganizeResult {
    const { record } = painting;
    const base = record.filename_base;
    const folder = collectionFolderName(record.collection ?? '');
    if (!folder) return { success: false, error: `No collection set for ${base}` };
    if (paintingFolder(record) === folder) return { success: false, error: `Already in ${folder}/` };
    if (this.paintings.exists(folder, base)) {
      return { success: false, error: `Metadata already exists: ${this.paintings.metadataPath(folder, base)}` };
    }

    const sources = this.bigSources(record);
    if (sources.length === 0) return { success: false, error: `Source file not found: ${base}` };
    const bigDir = join(this.paths.paintingsBig, folder);
    const clash = sources.map((f) => join(bigDir, basename(f))).find((p) => existsSync(p));
    if (clash) return { success: false, error: `${clash} already exists` };

    try {
      const movedBig = sources.map((f) => moveInto(f, bigDir));

      let instagram = record.files.instagram;
      const small = this.paintings.resolveImagePath(record);
      if (small) {
        try {
          instagram = moveInto(small, join(this.paths.paintingsInstagram, folder));
        } catch (err) {
          this.log.warn(`could not move small copy ${small}: ${errorMessage(err)}`);
        }
      }

      const next: PaintingRecord = {
        ...record,
        files: { ...record.files, big: Array.isArray(record.files.big) ? movedBig : movedBig[0], instagram },
        collection_folder: folder,
        organized_date: now.toISOString(),
      };
      const moved = this.paintings.relocate(painting, next);
      const rescheduled = this.scheduler?.relocate(painting.path, moved.path) ?? 0;
      this.log.info(`organized ${base} into ${folder}/`);
      return { success: true, painting: moved, folder, rescheduled };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  // Every record still filed under `category`, by path.
  waiting(category = NEW_PAINTINGS_FOLDER): Painting[] {
    return this.paintings
      .findAll()
      .filter((p) => paintingFolder(p.record) === category)
      .sort((a, b) => a.path.localeCompare(b.path));
  }

  organizeAll(category = NEW_PAINTINGS_FOLDER, now: Date = new Date()): OrganizeSummary {
    const summary: OrganizeSummary = { processed: 0, organized: 0, errors: [] };
    for (const painting of this.waiting(category)) {
      summary.processed++;
      const result = this.organize(painting, now);
      if (result.success) summary.organized++;
      else summary.errors.push(`${painting.record.filename_base}: ${result.error}`);
    }
    return summary;
  }
}
