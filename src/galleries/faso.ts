import { existsSync } from 'fs';
import { basename } from 'path';
import type { BrowserContext, Page } from 'playwright-core';
import type winston from 'winston';
import { BrowserProfile, sleep } from '../browser/profile';
import { loggers } from '../logger';
import { errorMessage } from '../errors';
import type { PaintingRecord } from '../models';
import { paintingTitle } from '../metadata/paintings';
import { GalleryUploader, uploaded, uploadFailed } from './base';

export const FASO_LOGIN_URL = 'https://data.fineartstudioonline.com/login/';
export const FASO_DASHBOARD_URL = 'https://data.fineartstudioonline.com/cfgeditwebsite.asp?new_login=y&faso_com_auth=y';

function bigImage(record: PaintingRecord): string | null {
  const big = record.files.big;
  if (!big) return null;
  return typeof big === 'string' ? big : (big[0] ?? null);
}

// Names of the fields a FASO upload still lacks; empty when ready.
export function isUploadReady(record: PaintingRecord): string[] {
  const missing: string[] = [];
  if (!record.title?.selected) missing.push('title');

  const big = bigImage(record);
  if (!big) missing.push('image file path');
  else if (!existsSync(big)) missing.push(`image file missing: ${basename(big)}`);

  for (const field of ['medium', 'substrate', 'subject', 'style', 'collection'] as const) {
    if (!record[field]) missing.push(field);
  }
  if (!record.dimensions?.width || !record.dimensions?.height) missing.push('dimensions');
  if (!record.description) missing.push('description');
  return missing;
}

// Galleries get the full-size file.
export function fasoImagePath(record: PaintingRecord): string | null {
  return bigImage(record);
}

export function extractYear(date: string | null | undefined): string | null {
  return date?.match(/^(\d{4})/)?.[1] ?? null;
}

// Exact label first, then either string containing the other, case-insensitive.
export function pickOption(labels: string[], wanted: string): string | null {
  const w = wanted.trim().toLowerCase();
  if (!w) return null;
  const clean = labels.map((l) => l.trim()).filter(Boolean);
  const exact = clean.find((l) => l.toLowerCase() === w);
  if (exact) return exact;
  return clean.find((l) => l.toLowerCase().includes(w) || w.includes(l.toLowerCase())) ?? null;
}

export function isFasoSessionUrl(url: string): boolean {
  try {
    const u = new URL(url);
    return u.hostname === 'data.fineartstudioonline.com' && !u.pathname.toLowerCase().includes('/login');
  } catch {
    return false;
  }
}

export class FasoUploader implements GalleryUploader {
  readonly name = 'faso';
  readonly displayName = 'FASO';
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(readonly profile: BrowserProfile, private log: winston.Logger = loggers.gallery) {}

  isConfigured() {
    return this.profile.isLoggedIn();
  }

  private async openPage(): Promise<Page> {
    if (this.page) return this.page;
    this.context = await this.profile.launch();
    this.page = await this.profile.firstPage(this.context);
    return this.page;
  }

  async close() {
    if (this.context) await this.context.close();
    this.context = null;
    this.page = null;
  }

  async uploadArtwork(record: PaintingRecord, imagePath: string) {
    if (!this.isConfigured()) return uploadFailed('FASO not configured');
    if (!existsSync(imagePath)) return uploadFailed(`Image not found: ${imagePath}`);
    const title = paintingTitle(record);
    this.log.info(`starting FASO upload for '${title}'`);

    let step = 'navigate';
    const page = await this.openPage();
    try {
      await page.goto(FASO_DASHBOARD_URL, { waitUntil: 'networkidle', timeout: 60000 });
      if (!isFasoSessionUrl(page.url())) {
        this.profile.clearLogin();
        return uploadFailed('FASO session expired. Run: studio-courier faso-login');
      }
      await page.locator('a.tb_link:has(img[src*="upload_2"])').first().click({ timeout: 30000 });
      await page.waitForLoadState('networkidle');
      await sleep(2000);

      step = 'upload_image';
      const fileInput = page.locator('input[type="file"]');
      if ((await fileInput.count()) > 0) {
        await fileInput.first().setInputFiles(imagePath);
      } else {
        const [chooser] = await Promise.all([
          page.waitForEvent('filechooser', { timeout: 10000 }),
          page.locator('text=Select Files to Upload').first().click({ timeout: 5000 }),
        ]);
        await chooser.setFiles(imagePath);
      }
      await sleep(2000);
      await page.locator('span[data-e2e="upload"]').first().click({ timeout: 5000 });

      step = 'upload_wait';
      await page.locator('text=Upload succeeded').first().waitFor({ timeout: 60000 });
      await sleep(2000);

      step = 'continue';
      await page.locator('a:has-text("Continue"), button:has-text("Continue")').first().click({ timeout: 5000 });
      await page.waitForLoadState('networkidle');
      await sleep(2000);

      step = 'fill_form';
      await this.fillForm(page, record);

      step = 'save';
      await page.locator('input[value*="Save Changes"]').first().click({ timeout: 5000 });
      await page.waitForLoadState('networkidle');
      await sleep(2000);

      this.log.info(`FASO upload complete for '${title}'`);
      return uploaded(null);
    } catch (err) {
      await this.profile.screenshot(page, `error_${step}`);
      this.log.error(`FASO upload failed at ${step}: ${errorMessage(err)}`);
      return uploadFailed(`${step}: ${errorMessage(err)}`);
    }
  }

  private async fillForm(page: Page, record: PaintingRecord) {
    const fill = async (selector: string, value: string | number | null | undefined) => {
      if (value === null || value === undefined || value === '') return;
      await page.locator(selector).first().fill(String(value));
    };
    const select = async (selector: string, wanted: string | null | undefined) => {
      if (!wanted) return;
      const el = page.locator(selector).first();
      const label = pickOption(await el.locator('option').allTextContents(), wanted);
      if (label === null) {
        this.log.warn(`no option for '${wanted}' in ${selector}`);
        return;
      }
      await el.selectOption({ label });
    };

    await fill('input[name="Title"]', record.title?.selected);
    await select('select[name="Collection"]', record.collection);
    await select('select[name="Medium"]', record.medium);
    await select('select[name="Substrate"]', record.substrate);
    await fill('input[name="VerticalSize"]', record.dimensions?.height);
    await fill('input[name="HorizontalSize"]', record.dimensions?.width);
    await fill('input[name="Depth"]', record.dimensions?.depth);
    await select('select[name="YearCreated"]', extractYear(record.creation_date));
    await select('select[name="Subject"]', record.subject);
    await select('select[name="Style"]', record.style);
    if (record.price_eur !== null && record.price_eur !== undefined) {
      await fill('input[name="RetailPrice"]', Math.trunc(record.price_eur));
    }
    await select('select[name="Availability"]', 'Available');
    if (record.description) await this.fillDescription(page, record.description);
  }

  // The description editor is either a plain textarea or a rich-text iframe.
  private async fillDescription(page: Page, description: string) {
    const textarea = page.locator('textarea[name="Description"], textarea[name="description"]');
    if ((await textarea.count()) > 0) {
      await textarea.first().fill(description);
      return;
    }
    const body = page.frameLocator('iframe').first().locator('body[contenteditable="true"]');
    await body.fill(description);
  }
}
