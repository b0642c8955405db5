import chalk from 'chalk';
import { COLLECTIONS, MEDIUMS, STYLES, SUBJECTS, SUBSTRATES } from '../config';
import type { Painting, PaintingRecord } from '../models';
import { paintingTitle } from '../metadata/paintings';
import { FileOrganizer } from '../metadata/organizer';
import { generateSkeletons } from '../metadata/skeleton';
import { DimensionsInput, MetadataEdits, applyEdits, groupByFolder, isSkeleton } from '../metadata/editor';
import { errorMessage } from '../errors';
import type { AppServices } from './services';
import { say, ask, askNumber, choose, confirm, table } from './ui';

export async function organizePaintings(s: AppServices) {
  s.activity.record('organize');
  const organizer = new FileOrganizer(s.config.paths, s.paintings, s.scheduler);
  const waiting = organizer.waiting();
  if (waiting.length === 0) {
    say.info('Nothing waiting in new-paintings');
    return;
  }

  say.header(`${waiting.length} painting(s) in new-paintings`);
  table(
    waiting.map((p) => [paintingTitle(p.record), p.record.collection ?? chalk.red('no collection')]),
    [32]
  );
  if (!(await confirm('Move them into their collection folders?'))) return;

  let moved = 0;
  for (const painting of waiting) {
    const result = organizer.organize(painting);
    const title = paintingTitle(painting.record);
    if (!result.success) {
      say.error(`${title}: ${result.error}`);
      continue;
    }
    moved++;
    say.success(`${title} -> ${result.folder}/`);
    if (result.rescheduled > 0) say.dim(`  ${result.rescheduled} scheduled post(s) updated`);
  }
  say.info(`${moved} of ${waiting.length} organized`);
}

export function generateSkeletonMetadata(s: AppServices) {
  s.activity.record('generate-skeletons');
  say.header('Skeleton metadata');
  say.dim(`Scanning ${s.config.paths.paintingsBig}`);

  const summary = generateSkeletons(s.config.paths.paintingsBig, s.paintings);
  if (summary.folders.length === 0) {
    say.warning('No folders with images found');
  } else {
    table(
      [
        ['Folder', 'Images', 'Groups', 'Created', 'Skipped'].map((h) => chalk.bold(h)),
        ...summary.folders.map((f) => [f.folder, String(f.images), String(f.groups), chalk.green(String(f.created)), chalk.yellow(String(f.skipped))]),
      ],
      [24, 8, 8, 8]
    );
  }
  say.info(`${summary.created} created, ${summary.skipped} skipped`);
  for (const err of summary.errors) say.error(err);
}

const KEEP = Symbol('keep');

async function pickField(label: string, options: readonly string[], current: string | null | undefined): Promise<string | null | undefined> {
  const picked = await choose<string | typeof KEEP>(`${label}:`, [
    { name: chalk.italic(`Keep current: ${current || 'not set'}`), value: KEEP },
    ...options.map((o) => ({ name: o === current ? `${o} ${chalk.green('(current)')}` : o, value: o })),
  ]);
  return picked === KEEP ? undefined : picked;
}

function showRecord(record: PaintingRecord) {
  const notSet = chalk.red('not set');
  say.header(`${paintingTitle(record)}${isSkeleton(record) ? chalk.yellow(' [skeleton]') : ''}`);
  const description = record.description ?? '';
  table(
    [
      ['Category', record.category],
      ['Substrate', record.substrate || notSet],
      ['Medium', record.medium || notSet],
      ['Subject', record.subject || notSet],
      ['Style', record.style || notSet],
      ['Collection', record.collection || notSet],
      ['Dimensions', record.dimensions?.formatted || notSet],
      ['Price', record.price_eur != null ? `${record.price_eur} EUR` : notSet],
      ['Date', record.creation_date || notSet],
      ['Description', description ? (description.length > 120 ? `${description.slice(0, 120)}...` : description) : notSet],
    ],
    [12]
  );
}

async function promptDimensions(record: PaintingRecord, s: AppServices): Promise<DimensionsInput | undefined> {
  const dims = record.dimensions;
  if (!(await confirm('Edit dimensions?', !dims?.width))) return undefined;
  const unit = dims?.unit ?? s.config.dimensionUnit;
  const width = (await askNumber(`Width (${unit}):`, { default: String(dims?.width ?? 0) })) ?? 0;
  const height = (await askNumber(`Height (${unit}):`, { default: String(dims?.height ?? 0) })) ?? 0;
  const depth = await askNumber(`Depth (${unit}, 0 for flat work):`, { default: String(dims?.depth ?? 0) });
  return { width, height, depth: depth ? depth : null, unit };
}

async function promptEdits(record: PaintingRecord, s: AppServices): Promise<MetadataEdits> {
  const edits: MetadataEdits = {};
  edits.title = await ask('Title:', { default: record.title?.selected ?? record.filename_base });

  if (!record.description || !(await confirm('Keep the current description?'))) {
    const text = await ask('Description (blank to leave as is):');
    if (text) edits.description = text;
  }

  edits.substrate = await pickField('Substrate', SUBSTRATES, record.substrate);
  edits.medium = await pickField('Medium', MEDIUMS, record.medium);
  edits.subject = await pickField('Subject', SUBJECTS, record.subject);
  edits.style = await pickField('Style', STYLES, record.style);
  edits.collection = await pickField('Collection', COLLECTIONS, record.collection);
  edits.dimensions = await promptDimensions(record, s);
  edits.priceEur = await askNumber('Price (EUR):', { default: String(record.price_eur ?? 0) });

  const date = await ask('Creation date (YYYY-MM-DD):', {
    default: record.creation_date ?? '',
    validate: (v) => (v.trim() === '' || /^\d{4}-\d{2}-\d{2}$/.test(v.trim()) ? true : 'Use YYYY-MM-DD'),
  });
  if (date) edits.creationDate = date;
  return edits;
}

async function editOne(s: AppServices, painting: Painting): Promise<boolean> {
  showRecord(painting.record);
  if (!(await confirm('Edit this painting?'))) return false;
  const record = applyEdits(painting.record, await promptEdits(painting.record, s));
  s.paintings.save({ path: painting.path, record });
  say.success(`Saved ${painting.path}`);
  return true;
}

export async function editMetadata(s: AppServices) {
  s.activity.record('edit-metadata');
  const folders = groupByFolder(s.paintings.findAll(), s.config.paths.metadataOutput);
  if (folders.length === 0) {
    say.warning('No metadata found');
    return;
  }

  const folder = await choose(
    'Folder:',
    folders.map((f) => ({ name: `${f.folder} (${f.paintings.length})`, value: f }))
  );
  const mode = await choose<'all' | 'one'>('Edit:', [
    { name: 'Every painting in the folder', value: 'all' },
    { name: 'One painting', value: 'one' },
  ]);

  const queue =
    mode === 'all'
      ? folder.paintings
      : [
          await choose(
            'Painting:',
            folder.paintings.map((p) => ({
              name: `${paintingTitle(p.record)} ${isSkeleton(p.record) ? chalk.yellow('skeleton') : chalk.green('complete')}`,
              value: p,
            }))
          ),
        ];

  let edited = 0;
  for (const [i, painting] of queue.entries()) {
    say.rule();
    if (queue.length > 1) say.dim(`${i + 1}/${queue.length}`);
    try {
      if (await editOne(s, painting)) edited++;
    } catch (err) {
      say.error(`${paintingTitle(painting.record)}: ${errorMessage(err)}`);
    }
    if (i < queue.length - 1 && !(await confirm('Continue to the next painting?'))) break;
  }
  say.info(`${edited} edited, ${queue.length - edited} skipped`);
}
