import { existsSync, readdirSync } from 'fs';
import { basename, extname, join } from 'path';
import type winston from 'winston';
import { NEW_PAINTINGS_FOLDER, SUPPORTED_IMAGE_FORMATS } from '../config';
import { errorMessage } from '../errors';
import { loggers } from '../logger';
import { GALLERIES, SOCIAL_PLATFORMS, PaintingRecord } from '../models';
import { PaintingStore, filePaths } from './paintings';
import { withTrackingDefaults } from './tracking';

// "Black-Palm-3" -> "Black-Palm"; only a purely numeric last segment is dropped.
export function extractBaseName(stem: string): string {
  const m = stem.match(/^(.+)-(\d+)$/);
  return m ? m[1] : stem;
}

export function filenameToTitle(base: string): string {
  return base
    .replace(/[-_]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .map((w) => w[0].toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

// Images in `dir` keyed by lower-cased base name, each group sorted by file name.
export function groupImages(dir: string): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isFile() || !SUPPORTED_IMAGE_FORMATS.includes(extname(entry.name).toLowerCase())) continue;
    const key = extractBaseName(basename(entry.name, extname(entry.name))).toLowerCase();
    groups.set(key, [...(groups.get(key) ?? []), join(dir, entry.name)]);
  }
  for (const files of groups.values()) files.sort((a, b) => basename(a).toLowerCase().localeCompare(basename(b).toLowerCase()));
  return groups;
}

export function skeletonRecord(filenameBase: string, category: string, title: string, bigFiles: string[], now: Date = new Date()): PaintingRecord {
  const record: PaintingRecord = {
    filename_base: filenameBase,
    category,
    is_skeleton: true,
    files: { big: bigFiles.length === 1 ? bigFiles[0] : bigFiles, instagram: null },
    title: { selected: title, all_options: [] },
    description: null,
    substrate: null,
    medium: null,
    subject: null,
    style: null,
    collection: null,
    price_eur: null,
    creation_date: null,
    processed_date: now.toISOString(),
    gallery_sites: {},
    social_media: {},
  };
  return withTrackingDefaults(record, SOCIAL_PLATFORMS, GALLERIES);
}

export interface FolderScan {
  folder: string;
  images: number;
  groups: number;
  created: number;
  skipped: number;
}

export interface SkeletonSummary {
  created: number;
  skipped: number;
  errors: string[];
  folders: FolderScan[];
}

/**
 * Writes a bare record, flagged `is_skeleton`, for every group of images in
 * the big-paintings folders that has no record yet. `new-paintings` is left
 * to `process`.
 */
export function generateSkeletons(paintingsBig: string, paintings: PaintingStore, now: Date = new Date(), log: winston.Logger = loggers.metadata): SkeletonSummary {
  const summary: SkeletonSummary = { created: 0, skipped: 0, errors: [], folders: [] };
  if (!existsSync(paintingsBig)) {
    summary.errors.push(`Paintings path does not exist: ${paintingsBig}`);
    return summary;
  }

  const known = new Set(paintings.findAll().flatMap((p) => filePaths(p.record.files.big)));
  const folders = readdirSync(paintingsBig, { withFileTypes: true })
    .filter((e) => e.isDirectory() && !e.name.startsWith('.') && e.name !== NEW_PAINTINGS_FOLDER)
    .map((e) => e.name)
    .sort();

  for (const folder of folders) {
    const groups = groupImages(join(paintingsBig, folder));
    if (groups.size === 0) continue;
    const scan: FolderScan = { folder, images: 0, groups: groups.size, created: 0, skipped: 0 };

    for (const [key, files] of [...groups].sort(([a], [b]) => a.localeCompare(b))) {
      scan.images += files.length;
      const filenameBase = key.replace(/[-\s]/g, '_');
      if (paintings.exists(folder, filenameBase) || files.some((f) => known.has(f))) {
        scan.skipped++;
        continue;
      }
      const title = filenameToTitle(extractBaseName(basename(files[0], extname(files[0]))));
      try {
        paintings.create(skeletonRecord(filenameBase, folder, title, files, now));
        scan.created++;
      } catch (err) {
        summary.errors.push(`${title}: ${errorMessage(err)}`);
      }
    }

    summary.created += scan.created;
    summary.skipped += scan.skipped;
    summary.folders.push(scan);
  }
  log.info(`skeleton metadata: ${summary.created} created, ${summary.skipped} skipped`);
  return summary;
}
