import { basename } from 'path';
import chalk from 'chalk';
import { COLLECTIONS, MEDIUMS, NEW_PAINTINGS_FOLDER, STYLES, SUBJECTS, SUBSTRATES } from '../config';
import { ImagePair, buildPaintingRecord, findNewPaintings, formatDimensions, renamePaintingPair } from '../metadata/creator';
import { sanitizeFilename } from '../metadata/paintings';
import type { ImageAnalyzer } from '../agent/analyzer';
import { errorMessage } from '../errors';
import { loggers } from '../logger';
import type { AppServices } from './services';
import { say, ask, askNumber, choose, confirm } from './ui';

const CUSTOM_TITLE = Symbol('custom');

const today = () => new Date().toISOString().slice(0, 10);

function listChoices(values: readonly string[]) {
  return values.map((v) => ({ name: v, value: v }));
}

async function describePainting(s: AppServices, analyzer: ImageAnalyzer, pair: ImagePair) {
  const analysisImage = pair.instagramPath ?? pair.bigPath;
  const analyzedFrom = pair.instagramPath ? 'instagram' : 'big';

  say.info('Generating titles...');
  const titles = await analyzer.generateTitles(analysisImage);
  const picked = await choose<string | typeof CUSTOM_TITLE>('Title:', [
    ...titles.map((t) => ({ name: t, value: t })),
    { name: chalk.italic('Enter a custom title'), value: CUSTOM_TITLE },
  ]);
  const title = picked === CUSTOM_TITLE ? await ask('Title:', { validate: (v) => (v.trim() ? true : 'Title is required') }) : picked;

  const unit = s.config.dimensionUnit;
  const width = (await askNumber(`Width (${unit}):`)) ?? 0;
  const height = (await askNumber(`Height (${unit}):`)) ?? 0;
  const depth = await askNumber(`Depth (${unit}, blank for none):`, { optional: true });
  const substrate = await choose('Substrate:', listChoices(SUBSTRATES));
  const medium = await choose('Medium:', listChoices(MEDIUMS));
  const subject = await choose('Subject:', listChoices(SUBJECTS));
  const style = await choose('Style:', listChoices(STYLES));
  const collection = await choose('Collection:', listChoices(COLLECTIONS));
  const priceEur = (await askNumber('Price (EUR):')) ?? 0;
  const creationDate = await ask('Creation date (YYYY-MM-DD):', {
    default: today(),
    validate: (v) => (/^\d{4}-\d{2}-\d{2}$/.test(v.trim()) ? true : 'Use YYYY-MM-DD'),
  });
  const notes = await ask('Notes for the description (optional):');

  say.info('Writing description...');
  const description = await analyzer.generateDescription(analysisImage, {
    title,
    medium: `${medium} on ${substrate}`,
    dimensions: formatDimensions(width, height, depth, unit),
    category: NEW_PAINTINGS_FOLDER,
    notes: notes || undefined,
  });
  console.log(chalk.dim(description));

  return {
    analyzedFrom,
    details: { title, allTitles: titles, description, width, height, depth, unit, substrate, medium, subject, style, collection, priceEur, creationDate },
  } as const;
}

export async function processPaintings(s: AppServices) {
  s.activity.record('process');
  const log = loggers.metadata;

  let analyzer: ImageAnalyzer;
  try {
    analyzer = s.analyzer();
  } catch (err) {
    say.error(errorMessage(err));
    return;
  }

  const pairs = findNewPaintings(s.config.paths, s.paintings.findAll());
  if (pairs.length === 0) {
    say.info(`No new paintings in ${NEW_PAINTINGS_FOLDER}`);
    return;
  }
  say.header(`${pairs.length} new painting(s)`);

  let created = 0;
  for (const pair of pairs) {
    say.rule();
    say.header(basename(pair.bigPath));
    if (!pair.instagramPath) say.dim('no instagram copy; analysing the big file');
    if (!(await confirm('Process this painting?'))) continue;

    try {
      const { analyzedFrom, details } = await describePainting(s, analyzer, pair);
      const renamed = renamePaintingPair(pair, sanitizeFilename(details.title), (base) => s.paintings.exists(NEW_PAINTINGS_FOLDER, base));
      const record = buildPaintingRecord(renamed.filenameBase, NEW_PAINTINGS_FOLDER, renamed, details, analyzedFrom);
      const painting = s.paintings.create(record);
      created++;
      say.success(`Saved ${painting.path}`);
    } catch (err) {
      log.error(`processing ${pair.bigPath} failed: ${errorMessage(err)}`);
      say.error(errorMessage(err));
    }
  }
  say.info(`${created} of ${pairs.length} processed`);
}
