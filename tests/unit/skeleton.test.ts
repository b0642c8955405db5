import { mkdirSync } from 'fs';
import { join } from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import winston from 'winston';
import { extractBaseName, filenameToTitle, generateSkeletons } from '../../src/metadata/skeleton';
import { PaintingStore } from '../../src/metadata/paintings';
import { makeRecord, tempDir, touch } from '../helpers';

const quiet = winston.createLogger({ silent: true });
const NOW = new Date(Date.UTC(2025, 3, 2, 10, 0, 0));

describe('extractBaseName', () => {
  it('drops only a numeric last segment', () => {
    expect(extractBaseName('Black-Palm-3')).toBe('Black-Palm');
    expect(extractBaseName('QBits-5-A17')).toBe('QBits-5-A17');
    expect(extractBaseName('fire_star')).toBe('fire_star');
  });
});

describe('filenameToTitle', () => {
  it('turns separators into spaces and capitalises words', () => {
    expect(filenameToTitle('mountain-sunset')).toBe('Mountain Sunset');
    expect(filenameToTitle('fractured__NETWORKS')).toBe('Fractured Networks');
  });
});

describe('generateSkeletons', () => {
  let big: string;
  let meta: string;
  let store: PaintingStore;

  beforeEach(() => {
    const root = tempDir();
    big = join(root, 'big');
    meta = join(root, 'meta');
    store = new PaintingStore({ metadataOutput: meta, paintingsInstagram: join(root, 'instagram') }, quiet);

    touch(join(big, 'landscapes', 'Black-Palm-1.jpg'));
    touch(join(big, 'landscapes', 'black-palm-2.png'));
    touch(join(big, 'landscapes', 'fog.jpg'));
    touch(join(big, 'landscapes', 'notes.txt'));
    touch(join(big, 'new-paintings', 'fresh.jpg'));
    touch(join(big, '.trash', 'old.jpg'));
    mkdirSync(join(big, 'empty'), { recursive: true });
    store.create(makeRecord({ filename_base: 'fog', category: 'landscapes' }));
  });

  it('writes one skeleton per image group without a record', () => {
    expect(generateSkeletons(big, store, NOW, quiet)).toEqual({
      created: 1,
      skipped: 1,
      errors: [],
      folders: [{ folder: 'landscapes', images: 3, groups: 2, created: 1, skipped: 1 }],
    });

    const record = store.load(join(meta, 'landscapes', 'black_palm.json')).record;
    expect(record).toMatchObject({
      filename_base: 'black_palm',
      category: 'landscapes',
      is_skeleton: true,
      title: { selected: 'Black Palm', all_options: [] },
      files: { big: [join(big, 'landscapes', 'Black-Palm-1.jpg'), join(big, 'landscapes', 'black-palm-2.png')], instagram: null },
      processed_date: '2025-04-02T10:00:00.000Z',
    });
    expect(record.social_media.mastodon).toEqual({ last_posted: null, post_url: null, post_count: 0 });
  });

  it('skips what it created on a second run', () => {
    generateSkeletons(big, store, NOW, quiet);
    const again = generateSkeletons(big, store, NOW, quiet);
    expect(again.created).toBe(0);
    expect(again.skipped).toBe(2);
  });

  it('reports a missing paintings folder', () => {
    const missing = join(tempDir(), 'nowhere');
    expect(generateSkeletons(missing, store, NOW, quiet).errors).toEqual([`Paintings path does not exist: ${missing}`]);
  });
});
