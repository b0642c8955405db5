import { chromium, BrowserContext, Locator, Page } from 'playwright-core';
import { existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import type winston from 'winston';
import { loggers } from '../logger';
import { errorMessage } from '../errors';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Screenshots named "<prefix>_*.png", oldest first, last `limit` only.
export function recentScreenshots(dir: string, prefix: string, limit = 4): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .filter((f) => f.startsWith(`${prefix}_`) && f.endsWith('.png'))
    .sort()
    .slice(-limit);
}

/**
 * A persistent Chrome profile for a site without an API. `<dir>/.logged_in`
 * marks a profile a person has logged into by hand.
 */
export class BrowserProfile {
  readonly dir: string;
  private marker: string;

  constructor(
    readonly name: string,
    profilesDir: string,
    private screenshotsDir: string,
    private log: winston.Logger = loggers.browser
  ) {
    this.dir = join(profilesDir, name);
    this.marker = join(this.dir, '.logged_in');
  }

  isLoggedIn(): boolean {
    return existsSync(this.marker);
  }

  markLoggedIn() {
    mkdirSync(this.dir, { recursive: true });
    writeFileSync(this.marker, 'ok');
  }

  clearLogin() {
    rmSync(this.marker, { force: true });
  }

  async launch(): Promise<BrowserContext> {
    mkdirSync(this.dir, { recursive: true });
    const context = await chromium.launchPersistentContext(this.dir, {
      channel: 'chrome',
      headless: false,
      viewport: { width: 1920, height: 1080 },
      args: ['--disable-blink-features=AutomationControlled'],
      ignoreDefaultArgs: ['--enable-automation'],
    });
    await context.addInitScript("Object.defineProperty(navigator, 'webdriver', { get: () => undefined });");
    return context;
  }

  async firstPage(context: BrowserContext): Promise<Page> {
    return context.pages()[0] ?? (await context.newPage());
  }

  async screenshot(page: Page, step: string) {
    mkdirSync(this.screenshotsDir, { recursive: true });
    const path = join(this.screenshotsDir, `${this.name}_${step}.png`);
    try {
      await page.screenshot({ path });
    } catch (err) {
      this.log.warn(`screenshot ${path} failed: ${errorMessage(err)}`);
    }
  }

  /**
   * Opens a headed browser on `loginUrl` and waits while the user logs in by
   * hand. Resolves with the URL the browser ends on (after visiting
   * `verifyUrl`, when given). The caller decides whether to mark the profile.
   */
  async manualLogin(loginUrl: string, waitForUser: (prompt: string) => Promise<void>, verifyUrl?: string): Promise<string> {
    const context = await this.launch();
    try {
      const page = await this.firstPage(context);
      await page.goto(loginUrl, { waitUntil: 'domcontentloaded', timeout: 60000 });
      await waitForUser('Log in in the browser window, then press Enter here');
      if (verifyUrl) {
        await page.goto(verifyUrl, { waitUntil: 'domcontentloaded', timeout: 60000 });
        await sleep(2000);
      }
      const finalUrl = page.url();
      this.log.info(`${this.name} login finished at ${finalUrl}`);
      return finalUrl;
    } finally {
      await context.close();
    }
  }
}

export async function waitUntilEnabled(locator: Locator, timeout: number) {
  const deadline = Date.now() + timeout;
  while (Date.now() < deadline) {
    if (await locator.isEnabled()) return;
    await sleep(250);
  }
  throw new Error(`Timeout ${timeout}ms exceeded waiting for element to be enabled`);
}
