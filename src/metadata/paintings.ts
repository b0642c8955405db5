import { existsSync, readdirSync, rmSync } from 'fs';
import { basename, join } from 'path';
import type winston from 'winston';
import { openJsonStore } from '../db';
import { loggers } from '../logger';
import { Painting, PaintingRecord, paintingSchema } from '../models';
import { InvalidPaintingRecordError, PaintingExistsError, PaintingNotFoundError, errorMessage } from '../errors';
import type { PathsConfig } from '../config';

export function paintingTitle(record: PaintingRecord): string {
  return record.title?.selected || 'Untitled';
}

export function paintingFolder(record: PaintingRecord): string {
  return record.collection_folder || record.category;
}

function firstPath(ref: string | string[] | null): string | null {
  if (ref === null) return null;
  if (typeof ref === 'string') return ref;
  return ref[0] ?? null;
}

export function filePaths(ref: string | string[] | null): string[] {
  if (ref === null) return [];
  return typeof ref === 'string' ? [ref] : ref;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function listJsonFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];
  const out: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) out.push(...listJsonFiles(full));
    else if (entry.isFile() && entry.name.endsWith('.json')) out.push(full);
  }
  return out.sort();
}

export class PaintingStore {
  constructor(
    private paths: Pick<PathsConfig, 'metadataOutput' | 'paintingsInstagram'>,
    private log: winston.Logger = loggers.metadata
  ) {}

  load(path: string): Painting {
    if (!existsSync(path)) throw new PaintingNotFoundError(path);
    const raw = this.readRaw(path);
    const parsed = paintingSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((i) => i.path.join('.') || '(root)');
      throw new InvalidPaintingRecordError(path, `invalid fields: ${fields.join(', ')}`);
    }
    return { path, record: parsed.data };
  }

  // Every painting record under the metadata root. Other JSON documents are ignored.
  findAll(): Painting[] {
    const found: Painting[] = [];
    for (const file of listJsonFiles(this.paths.metadataOutput)) {
      try {
        const raw = this.readRaw(file);
        if (!isObject(raw) || !('filename_base' in raw)) continue;
        found.push(this.load(file));
      } catch (err) {
        this.log.warn(`skipping ${file}: ${errorMessage(err)}`);
      }
    }
    return found;
  }

  // Paintings never posted to the platform, by title.
  findUnposted(platform: string): Painting[] {
    return this.findAll()
      .filter((p) => (p.record.social_media[platform]?.post_count ?? 0) === 0)
      .sort((a, b) => paintingTitle(a.record).localeCompare(paintingTitle(b.record)));
  }

  save(painting: Painting): void {
    const db = openJsonStore<PaintingRecord>(painting.path, painting.record);
    db.data = painting.record;
    db.write();
  }

  metadataPath(folder: string, filenameBase: string): string {
    return join(this.paths.metadataOutput, folder, `${filenameBase}.json`);
  }

  exists(folder: string, filenameBase: string): boolean {
    return existsSync(this.metadataPath(folder, filenameBase));
  }

  // Never replaces a record that is already on disk; its tracking would be lost.
  create(record: PaintingRecord): Painting {
    const path = this.metadataPath(paintingFolder(record), record.filename_base);
    if (existsSync(path)) throw new PaintingExistsError(path);
    const painting = { path, record };
    this.save(painting);
    this.log.info(`created metadata ${path}`);
    return painting;
  }

  // Writes the record into the folder it now belongs to and removes the old file.
  relocate(painting: Painting, record: PaintingRecord): Painting {
    const path = this.metadataPath(paintingFolder(record), record.filename_base);
    if (path === painting.path) {
      this.save({ path, record });
      return { path, record };
    }
    if (existsSync(path)) throw new PaintingExistsError(path);
    this.save({ path, record });
    rmSync(painting.path, { force: true });
    this.log.info(`moved metadata ${painting.path} -> ${path}`);
    return { path, record };
  }

  // Small image only; the big file is never posted.
  resolveImagePath(record: PaintingRecord): string | null {
    const instagram = record.files.instagram;
    if (typeof instagram === 'string') {
      if (existsSync(instagram)) return instagram;
    } else if (Array.isArray(instagram)) {
      const hit = instagram.find((p) => existsSync(p));
      if (hit) return hit;
    }

    const folder = paintingFolder(record);
    if (!folder) return null;
    const dir = join(this.paths.paintingsInstagram, folder);

    const big = firstPath(record.files.big);
    if (big) {
      const candidate = join(dir, basename(big));
      if (existsSync(candidate)) return candidate;
    }

    const byBase = join(dir, `${record.filename_base}.jpg`);
    if (existsSync(byBase)) return byBase;
    return null;
  }

  private readRaw(path: string): unknown {
    const db = openJsonStore<unknown>(path, null);
    try {
      db.read();
    } catch (err) {
      throw new InvalidPaintingRecordError(path, errorMessage(err));
    }
    return db.data;
  }
}

const REMOVED_CHARS = /[:;?!*"'<>|]/g;

export function sanitizeFilename(title: string): string {
  return title
    .toLowerCase()
    .replace(/[\s/\\]/g, '_')
    .replace(REMOVED_CHARS, '')
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[_\s]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

// First free "<base>", "<base>_01", "<base>_02", ... for which no candidate exists.
export function uniqueFilenameBase(base: string, taken: (candidate: string) => boolean): string {
  if (!taken(base)) return base;
  for (let n = 1; ; n++) {
    const candidate = `${base}_${String(n).padStart(2, '0')}`;
    if (!taken(candidate)) return candidate;
  }
}
