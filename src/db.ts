import { LowSync } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

// One JSON document on disk, read and rewritten whole. Written with two-space indentation.
export function openJsonStore<T>(file: string, defaultData: T): LowSync<T> {
  mkdirSync(dirname(file), { recursive: true });
  const adapter = new JSONFileSync<T>(file);
  return new LowSync<T>(adapter, defaultData);
}
