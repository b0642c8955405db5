import chalk from 'chalk';
import type { Painting } from '../models';
import { paintingTitle } from '../metadata/paintings';
import { recordGalleryUpload } from '../metadata/tracking';
import { pendingGalleryUploads } from '../galleries/base';
import { FASO_DASHBOARD_URL, FASO_LOGIN_URL, FasoUploader, fasoImagePath, isFasoSessionUrl, isUploadReady } from '../galleries/faso';
import { describeLoginStatus } from '../browser/loginTracker';
import { CARA_HOME, CARA_LOGIN_URL, isCaraSessionUrl } from '../social/cara';
import { errorMessage } from '../errors';
import type { AppServices } from './services';
import { say, choose, confirm, waitForEnter } from './ui';

export async function uploadGallery(s: AppServices) {
  s.activity.record('upload-gallery');
  const uploader = new FasoUploader(s.fasoProfile);
  if (!uploader.isConfigured()) {
    say.error('FASO is not logged in. Run: studio-courier faso-login');
    return;
  }

  const faso = s.logins.status('faso');
  if (faso.state === 'expired' || faso.state === 'warn') say.warning(`FASO: ${describeLoginStatus(faso)}`);

  const pending = pendingGalleryUploads(s.paintings.findAll(), uploader.name);
  const ready: Painting[] = [];
  for (const p of pending) {
    const missing = isUploadReady(p.record);
    if (missing.length === 0) ready.push(p);
    else say.dim(`${paintingTitle(p.record)}: missing ${missing.join(', ')}`);
  }
  if (ready.length === 0) {
    say.info(`Nothing ready to upload (${pending.length} pending)`);
    return;
  }

  const picked = await choose<Painting[]>('Upload:', [
    { name: chalk.bold(`All ready (${ready.length})`), value: ready },
    ...ready.map((p) => ({ name: paintingTitle(p.record), value: [p] })),
  ]);
  if (!(await confirm(`Upload ${picked.length} painting(s) to ${uploader.displayName}?`))) return;

  let done = 0;
  try {
    for (const painting of picked) {
      const title = paintingTitle(painting.record);
      const image = fasoImagePath(painting.record);
      if (!image) {
        say.error(`${title}: no image file`);
        continue;
      }
      const result = await uploader.uploadArtwork(painting.record, image);
      if (!result.success) {
        say.error(`${title}: ${result.error}`);
        continue;
      }
      s.paintings.save({ path: painting.path, record: recordGalleryUpload(painting.record, uploader.name, result) });
      done++;
      say.success(`${title} uploaded`);
    }
  } finally {
    await uploader.close();
  }
  say.info(`${done} of ${picked.length} uploaded`);
}

export async function fasoLogin(s: AppServices) {
  s.activity.record('faso-login');
  try {
    const finalUrl = await s.fasoProfile.manualLogin(FASO_LOGIN_URL, waitForEnter, FASO_DASHBOARD_URL);
    if (!isFasoSessionUrl(finalUrl)) {
      say.error(`Still on ${finalUrl}; login did not stick`);
      return;
    }
    s.fasoProfile.markLoggedIn();
    s.logins.recordLogin('faso');
    say.success('FASO session saved');
  } catch (err) {
    say.error(`FASO login failed: ${errorMessage(err)}`);
  }
}

export async function caraLogin(s: AppServices) {
  s.activity.record('cara-login');
  try {
    const finalUrl = await s.caraProfile.manualLogin(CARA_LOGIN_URL, waitForEnter, CARA_HOME);
    s.caraProfile.markLoggedIn();
    s.logins.recordLogin('cara');
    if (isCaraSessionUrl(finalUrl)) say.success('Cara session saved');
    else say.warning(`Session saved, but the browser ended on ${finalUrl}. Check the login if posting fails.`);
  } catch (err) {
    say.error(`Cara login failed: ${errorMessage(err)}`);
  }
}
