import { dirname, relative } from 'path';
import type { DimensionUnit } from '../config';
import type { Painting, PaintingRecord } from '../models';
import { formatDimensions } from './creator';
import { paintingTitle } from './paintings';

// A skeleton record stops being one once all of these are filled in.
export const SKELETON_FIELDS = ['substrate', 'medium', 'subject', 'style', 'collection'] as const;

export interface DimensionsInput {
  width: number;
  height: number;
  depth: number | null;
  unit: DimensionUnit;
}

export interface MetadataEdits {
  title?: string;
  description?: string | null;
  substrate?: string | null;
  medium?: string | null;
  subject?: string | null;
  style?: string | null;
  collection?: string | null;
  dimensions?: DimensionsInput;
  priceEur?: number | null;
  creationDate?: string | null;
}

export function missingSkeletonFields(record: PaintingRecord): string[] {
  return SKELETON_FIELDS.filter((f) => !record[f]);
}

export function isSkeleton(record: PaintingRecord): boolean {
  return record.is_skeleton === true;
}

// Fields left out of `edits` keep their value. Tracking is never touched.
export function applyEdits(record: PaintingRecord, edits: MetadataEdits): PaintingRecord {
  const next: PaintingRecord = { ...record };
  if (edits.title !== undefined) next.title = { all_options: [], ...record.title, selected: edits.title };
  if (edits.description !== undefined) next.description = edits.description;
  for (const field of SKELETON_FIELDS) {
    const value = edits[field];
    if (value !== undefined) next[field] = value;
  }
  if (edits.dimensions) {
    const { width, height, depth, unit } = edits.dimensions;
    next.dimensions = { ...record.dimensions, width, height, depth, unit, formatted: formatDimensions(width, height, depth, unit) };
  }
  if (edits.priceEur !== undefined) next.price_eur = edits.priceEur;
  if (edits.creationDate !== undefined) next.creation_date = edits.creationDate;

  if (isSkeleton(next) && missingSkeletonFields(next).length === 0) delete next.is_skeleton;
  return next;
}

export interface MetadataFolder {
  folder: string;
  paintings: Painting[];
}

// Records grouped by their folder under the metadata root, each group by title.
export function groupByFolder(paintings: Painting[], metadataRoot: string): MetadataFolder[] {
  const byFolder = new Map<string, Painting[]>();
  for (const p of paintings) {
    const folder = relative(metadataRoot, dirname(p.path)) || '.';
    byFolder.set(folder, [...(byFolder.get(folder) ?? []), p]);
  }
  return [...byFolder]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([folder, list]) => ({
      folder,
      paintings: list.sort((a, b) => paintingTitle(a.record).localeCompare(paintingTitle(b.record))),
    }));
}
