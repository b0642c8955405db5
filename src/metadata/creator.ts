import { existsSync, readdirSync, renameSync } from 'fs';
import { basename, dirname, extname, join } from 'path';
import { NEW_PAINTINGS_FOLDER, SUPPORTED_IMAGE_FORMATS, DimensionUnit, PathsConfig } from '../config';
import { GALLERIES, SOCIAL_PLATFORMS, Painting, PaintingRecord } from '../models';
import { withTrackingDefaults } from './tracking';
import { filePaths, paintingFolder, uniqueFilenameBase } from './paintings';

export interface ImagePair {
  bigPath: string;
  instagramPath: string | null;
}

function hasRecord(bigPath: string, category: string, processed: readonly Painting[]): boolean {
  const stem = basename(bigPath, extname(bigPath));
  return processed.some(
    ({ record }) =>
      filePaths(record.files.big).includes(bigPath) || (paintingFolder(record) === category && record.filename_base === stem)
  );
}

/**
 * Images waiting in <big>/new-paintings, each with its same-named small copy
 * when there is one. Images that already have a painting record in
 * `processed` are left out.
 */
export function findNewPaintings(
  paths: Pick<PathsConfig, 'paintingsBig' | 'paintingsInstagram'>,
  processed: readonly Painting[] = [],
  category = NEW_PAINTINGS_FOLDER
): ImagePair[] {
  const bigDir = join(paths.paintingsBig, category);
  if (!existsSync(bigDir)) return [];
  return readdirSync(bigDir)
    .filter((f) => SUPPORTED_IMAGE_FORMATS.includes(extname(f).toLowerCase()))
    .filter((f) => !hasRecord(join(bigDir, f), category, processed))
    .sort()
    .map((f) => {
      const small = join(paths.paintingsInstagram, category, f);
      return { bigPath: join(bigDir, f), instagramPath: existsSync(small) ? small : null };
    });
}

export function formatDimensions(width: number, height: number, depth: number | null, unit: DimensionUnit): string {
  const parts = [width, height, ...(depth ? [depth] : [])];
  return parts.map((n) => `${n}${unit}`).join(' x ');
}

// Renames both files to `base`, numbering it _01, _02, ... if the big folder
// already has that name or `alsoTaken` rejects it.
export function renamePaintingPair(
  pair: ImagePair,
  base: string,
  alsoTaken: (candidate: string) => boolean = () => false
): ImagePair & { filenameBase: string } {
  const ext = extname(pair.bigPath);
  const dir = dirname(pair.bigPath);
  const filenameBase = uniqueFilenameBase(base, (candidate) => {
    const target = join(dir, `${candidate}${ext}`);
    return (target !== pair.bigPath && existsSync(target)) || alsoTaken(candidate);
  });

  const bigPath = join(dir, `${filenameBase}${ext}`);
  renameSync(pair.bigPath, bigPath);

  let instagramPath: string | null = null;
  if (pair.instagramPath && existsSync(pair.instagramPath)) {
    instagramPath = join(dirname(pair.instagramPath), `${filenameBase}${extname(pair.instagramPath)}`);
    renameSync(pair.instagramPath, instagramPath);
  }
  return { bigPath, instagramPath, filenameBase };
}

export interface PaintingDetails {
  title: string;
  allTitles: string[];
  description: string;
  width: number;
  height: number;
  depth: number | null;
  unit: DimensionUnit;
  substrate: string;
  medium: string;
  subject: string;
  style: string;
  collection: string;
  priceEur: number;
  creationDate: string;
}

export function buildPaintingRecord(
  filenameBase: string,
  category: string,
  files: ImagePair,
  details: PaintingDetails,
  analyzedFrom: 'instagram' | 'big',
  now: Date = new Date()
): PaintingRecord {
  const record: PaintingRecord = {
    filename_base: filenameBase,
    category,
    files: { big: files.bigPath, instagram: files.instagramPath },
    title: { selected: details.title, all_options: details.allTitles },
    description: details.description,
    dimensions: {
      width: details.width,
      height: details.height,
      depth: details.depth,
      unit: details.unit,
      formatted: formatDimensions(details.width, details.height, details.depth, details.unit),
    },
    substrate: details.substrate,
    medium: details.medium,
    subject: details.subject,
    style: details.style,
    collection: details.collection,
    price_eur: details.priceEur,
    creation_date: details.creationDate,
    processed_date: now.toISOString(),
    analyzed_from: analyzedFrom,
    gallery_sites: {},
    social_media: {},
  };
  return withTrackingDefaults(record, SOCIAL_PLATFORMS, GALLERIES);
}
