import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import winston from 'winston';
import { PaintingStore, sanitizeFilename, uniqueFilenameBase } from '../../src/metadata/paintings';
import { InvalidPaintingRecordError, PaintingNotFoundError } from '../../src/errors';
import { makeRecord, tempDir, touch, writeJson } from '../helpers';

const quiet = winston.createLogger({ silent: true });

describe('PaintingStore', () => {
  let root: string;
  let store: PaintingStore;
  let metadataOutput: string;
  let paintingsInstagram: string;

  beforeEach(() => {
    root = tempDir();
    metadataOutput = join(root, 'meta');
    paintingsInstagram = join(root, 'instagram');
    store = new PaintingStore({ metadataOutput, paintingsInstagram }, quiet);
  });

  it('finds records recursively and ignores other JSON documents', () => {
    writeJson(join(metadataOutput, 'landscapes', 'sunset_lake.json'), { filename_base: 'sunset_lake', title: { selected: 'Sunset Lake' } });
    writeJson(join(metadataOutput, 'abstracts', 'deep', 'blue.json'), { filename_base: 'blue' });
    writeJson(join(metadataOutput, 'schedule.json'), { scheduled_posts: [] });
    writeJson(join(metadataOutput, 'rounds.json'), { current_round: 2 });
    writeJson(join(metadataOutput, 'broken.json'), { filename_base: 42 });

    expect(store.findAll().map((p) => p.record.filename_base).sort()).toEqual(['blue', 'sunset_lake']);
  });

  it('lists never-posted paintings sorted by title', () => {
    writeJson(join(metadataOutput, 'a', 'z.json'), { filename_base: 'z', title: { selected: 'Zinnias' } });
    writeJson(join(metadataOutput, 'a', 'b.json'), { filename_base: 'b', title: { selected: 'Birches' } });
    writeJson(join(metadataOutput, 'a', 'm.json'), {
      filename_base: 'm',
      title: { selected: 'Meadow' },
      social_media: { mastodon: { last_posted: '2024-01-01T00:00:00.000Z', post_url: null, post_count: 1 } },
    });

    expect(store.findUnposted('mastodon').map((p) => p.record.filename_base)).toEqual(['b', 'z']);
    expect(store.findUnposted('bluesky').map((p) => p.record.filename_base)).toEqual(['b', 'm', 'z']);
  });

  it('raises typed errors for missing and invalid files', () => {
    expect(() => store.load(join(metadataOutput, 'nope.json'))).toThrow(PaintingNotFoundError);

    const bad = join(metadataOutput, 'bad.json');
    writeJson(bad, { title: 'no base' });
    expect(() => store.load(bad)).toThrow(InvalidPaintingRecordError);

    writeFileSync(bad, '{');
    expect(() => store.load(bad)).toThrow(InvalidPaintingRecordError);
  });

  it('saves the record with unknown keys intact', () => {
    const path = join(metadataOutput, 'landscapes', 'sunset_lake.json');
    writeJson(path, { filename_base: 'sunset_lake', framing: 'oak' });
    const painting = store.load(path);
    store.save({ path, record: { ...painting.record, description: 'Calm.' } });

    const saved = JSON.parse(readFileSync(path, 'utf8'));
    expect(saved.framing).toBe('oak');
    expect(saved.description).toBe('Calm.');
    expect(saved.social_media).toEqual({});
  });

  it('creates new records under their category folder', () => {
    const painting = store.create(makeRecord({ filename_base: 'fog', category: 'new-paintings' }));
    expect(painting.path).toBe(join(metadataOutput, 'new-paintings', 'fog.json'));
    expect(store.load(painting.path).record.filename_base).toBe('fog');
  });

  describe('resolveImagePath', () => {
    it('uses the recorded instagram path when it exists', () => {
      const file = join(root, 'elsewhere', 'lake.jpg');
      touch(file);
      expect(store.resolveImagePath(makeRecord({ files: { big: null, instagram: file } }))).toBe(file);
    });

    it('takes the first existing entry of an instagram list', () => {
      const second = join(root, 'x', 'two.jpg');
      touch(second);
      const record = makeRecord({ files: { big: null, instagram: [join(root, 'x', 'one.jpg'), second] } });
      expect(store.resolveImagePath(record)).toBe(second);
    });

    it('falls back to the big file name in the instagram folder', () => {
      const candidate = join(paintingsInstagram, 'landscapes', 'IMG_0042.jpg');
      touch(candidate);
      const record = makeRecord({ files: { big: '/big/landscapes/IMG_0042.jpg', instagram: '/gone.jpg' } });
      expect(store.resolveImagePath(record)).toBe(candidate);
    });

    it('prefers collection_folder over category', () => {
      const candidate = join(paintingsInstagram, 'oils', 'sunset_lake.jpg');
      touch(candidate);
      expect(store.resolveImagePath(makeRecord({ collection_folder: 'oils' }))).toBe(candidate);
    });

    it('falls back to <filename_base>.jpg, then gives up', () => {
      const record = makeRecord();
      expect(store.resolveImagePath(record)).toBeNull();
      const candidate = join(paintingsInstagram, 'landscapes', 'sunset_lake.jpg');
      touch(candidate);
      expect(store.resolveImagePath(record)).toBe(candidate);
    });
  });
});

describe('sanitizeFilename', () => {
  it('lower-cases and replaces separators', () => {
    expect(sanitizeFilename('Sunset Lake')).toBe('sunset_lake');
    expect(sanitizeFilename('Night / Day\\Dream')).toBe('night_day_dream');
  });

  it('drops punctuation and trims underscores', () => {
    expect(sanitizeFilename('  "What?!" she said: *no*  ')).toBe('what_she_said_no');
    expect(sanitizeFilename('Café — au lait')).toBe('café_au_lait');
  });
});

describe('uniqueFilenameBase', () => {
  it('numbers the name until it is free', () => {
    const taken = new Set(['fog', 'fog_01']);
    expect(uniqueFilenameBase('fog', (c) => taken.has(c))).toBe('fog_02');
    expect(uniqueFilenameBase('mist', (c) => taken.has(c))).toBe('mist');
  });
});
