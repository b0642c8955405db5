import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { vi } from 'vitest';
import { PaintingRecord, paintingSchema } from '../src/models';
import type { PostLogger } from '../src/social/postLog';

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'courier-'));
}

export function writeJson(path: string, data: unknown) {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(data, null, 2));
}

export function touch(path: string, contents = 'fake image bytes') {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, contents);
}

export function makeRecord(fields: Record<string, unknown> = {}): PaintingRecord {
  return paintingSchema.parse({ filename_base: 'sunset_lake', category: 'landscapes', ...fields });
}

export function fakeHttp() {
  return { get: vi.fn(), post: vi.fn() };
}

export interface LoggedPost {
  kind: 'success' | 'failure' | 'credential';
  platform: string;
  title?: string;
  detail?: string | null;
}

export class MemoryPostLog implements PostLogger {
  entries: LoggedPost[] = [];

  success(platform: string, title: string, _imagePath: string | null, postUrl: string | null) {
    this.entries.push({ kind: 'success', platform, title, detail: postUrl });
  }

  failure(platform: string, title: string, _imagePath: string | null, error: string) {
    this.entries.push({ kind: 'failure', platform, title, detail: error });
  }

  credentialFailure(platform: string) {
    this.entries.push({ kind: 'credential', platform });
  }
}
