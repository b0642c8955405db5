import { existsSync } from 'fs';
import { join } from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import winston from 'winston';
import { PaintingDetails, buildPaintingRecord, findNewPaintings, formatDimensions, renamePaintingPair } from '../../src/metadata/creator';
import { PaintingStore } from '../../src/metadata/paintings';
import { recordPostResult } from '../../src/metadata/tracking';
import { ok } from '../../src/social/platform';
import { PaintingExistsError } from '../../src/errors';
import { SOCIAL_PLATFORMS } from '../../src/models';
import { makeRecord, tempDir, touch } from '../helpers';

const quiet = winston.createLogger({ silent: true });

const DETAILS: PaintingDetails = {
  title: 'Fog',
  allTitles: ['Fog', 'Mist'],
  description: 'Grey on grey.',
  width: 30,
  height: 40,
  depth: null,
  unit: 'cm',
  substrate: 'canvas',
  medium: 'oil',
  subject: 'landscape',
  style: 'impressionism',
  collection: 'oils',
  priceEur: 450,
  creationDate: '2025-02-14',
};

describe('findNewPaintings', () => {
  let paintingsBig: string;
  let paintingsInstagram: string;

  beforeEach(() => {
    const root = tempDir();
    paintingsBig = join(root, 'big');
    paintingsInstagram = join(root, 'instagram');
  });

  it('pairs each big image with its instagram copy when present', () => {
    touch(join(paintingsBig, 'new-paintings', 'b.png'));
    touch(join(paintingsBig, 'new-paintings', 'a.JPG'));
    touch(join(paintingsBig, 'new-paintings', 'notes.txt'));
    touch(join(paintingsInstagram, 'new-paintings', 'a.JPG'));

    expect(findNewPaintings({ paintingsBig, paintingsInstagram })).toEqual([
      { bigPath: join(paintingsBig, 'new-paintings', 'a.JPG'), instagramPath: join(paintingsInstagram, 'new-paintings', 'a.JPG') },
      { bigPath: join(paintingsBig, 'new-paintings', 'b.png'), instagramPath: null },
    ]);
  });

  it('returns nothing when the folder is missing', () => {
    expect(findNewPaintings({ paintingsBig, paintingsInstagram })).toEqual([]);
  });

  it('leaves out images that already have a record', () => {
    const dir = join(paintingsBig, 'new-paintings');
    touch(join(dir, 'fog.png'));
    touch(join(dir, 'moved.jpg'));
    touch(join(dir, 'other.jpg'));
    const byName = { path: 'a.json', record: makeRecord({ filename_base: 'fog', category: 'new-paintings', files: { big: '/elsewhere/fog.png', instagram: null } }) };
    const byPath = { path: 'b.json', record: makeRecord({ filename_base: 'moved', files: { big: [join(dir, 'moved.jpg')], instagram: null } }) };

    expect(findNewPaintings({ paintingsBig, paintingsInstagram }, [byName, byPath])).toEqual([
      { bigPath: join(dir, 'other.jpg'), instagramPath: null },
    ]);
  });
});

describe('processing an image twice', () => {
  it('keeps the first record and its post history', () => {
    const root = tempDir();
    const paths = { paintingsBig: join(root, 'big'), paintingsInstagram: join(root, 'instagram'), metadataOutput: join(root, 'meta') };
    touch(join(paths.paintingsBig, 'new-paintings', 'IMG_7.jpg'));
    const store = new PaintingStore(paths, quiet);

    const [pair] = findNewPaintings(paths, store.findAll());
    const renamed = renamePaintingPair(pair, 'sunset_lake', (base) => store.exists('new-paintings', base));
    const created = store.create(buildPaintingRecord(renamed.filenameBase, 'new-paintings', renamed, DETAILS, 'big'));
    store.save({ path: created.path, record: recordPostResult(created.record, 'mastodon', ok('https://mastodon.example/@me/1')) });

    expect(findNewPaintings(paths, store.findAll())).toEqual([]);
    expect(() => store.create(buildPaintingRecord('sunset_lake', 'new-paintings', renamed, DETAILS, 'big'))).toThrow(PaintingExistsError);
    expect(store.load(created.path).record.social_media.mastodon.post_count).toBe(1);
  });
});

describe('formatDimensions', () => {
  it('adds depth only when there is one', () => {
    expect(formatDimensions(30, 40, null, 'cm')).toBe('30cm x 40cm');
    expect(formatDimensions(12, 16, 1.5, 'in')).toBe('12in x 16in x 1.5in');
  });
});

describe('renamePaintingPair', () => {
  it('renames both files and numbers a taken name', () => {
    const root = tempDir();
    const big = join(root, 'big', 'new-paintings');
    const small = join(root, 'instagram', 'new-paintings');
    touch(join(big, 'fog.jpg'));
    touch(join(big, 'IMG_1.jpg'));
    touch(join(small, 'IMG_1.jpg'));

    const renamed = renamePaintingPair({ bigPath: join(big, 'IMG_1.jpg'), instagramPath: join(small, 'IMG_1.jpg') }, 'fog');
    expect(renamed).toEqual({ bigPath: join(big, 'fog_01.jpg'), instagramPath: join(small, 'fog_01.jpg'), filenameBase: 'fog_01' });
    expect(existsSync(join(big, 'IMG_1.jpg'))).toBe(false);
    expect(existsSync(join(small, 'fog_01.jpg'))).toBe(true);
  });

  it('numbers past a name the metadata folder already holds', () => {
    const big = join(tempDir(), 'IMG_2.jpg');
    touch(big);
    const renamed = renamePaintingPair({ bigPath: big, instagramPath: null }, 'fog', (base) => base === 'fog');
    expect(renamed.filenameBase).toBe('fog_01');
  });

  it('keeps the name when the file already has it', () => {
    const big = join(tempDir(), 'fog.jpg');
    touch(big);
    expect(renamePaintingPair({ bigPath: big, instagramPath: null }, 'fog')).toEqual({ bigPath: big, instagramPath: null, filenameBase: 'fog' });
  });
});

describe('buildPaintingRecord', () => {
  it('fills every field and a tracking entry per platform', () => {
    const record = buildPaintingRecord(
      'fog',
      'new-paintings',
      { bigPath: '/big/fog.jpg', instagramPath: '/ig/fog.jpg' },
      DETAILS,
      'instagram',
      new Date(Date.UTC(2025, 2, 1))
    );

    expect(record).toMatchObject({
      filename_base: 'fog',
      category: 'new-paintings',
      files: { big: '/big/fog.jpg', instagram: '/ig/fog.jpg' },
      title: { selected: 'Fog', all_options: ['Fog', 'Mist'] },
      dimensions: { width: 30, height: 40, depth: null, unit: 'cm', formatted: '30cm x 40cm' },
      price_eur: 450,
      processed_date: '2025-03-01T00:00:00.000Z',
      analyzed_from: 'instagram',
      gallery_sites: { faso: { last_uploaded: null, url: null } },
    });
    expect(Object.keys(record.social_media).sort()).toEqual([...SOCIAL_PLATFORMS].sort());
    expect(record.social_media.bluesky).toEqual({ last_posted: null, post_url: null, post_count: 0 });
  });
});
