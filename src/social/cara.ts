import type winston from 'winston';
import { BrowserProfile, sleep, waitUntilEnabled } from '../browser/profile';
import { loggers } from '../logger';
import { BasePoster, fail, ok } from './platform';

export const CARA_HOME = 'https://cara.app/home';
export const CARA_LOGIN_URL = 'https://cara.app/login';

export function isCaraSessionUrl(url: string): boolean {
  try {
    const u = new URL(url);
    return u.hostname === 'cara.app' && !u.pathname.includes('/login');
  } catch {
    return false;
  }
}

// No public API: drives cara.app through a persistent browser profile.
export class CaraPoster extends BasePoster {
  readonly name = 'cara';
  readonly displayName = 'Cara';
  readonly maxTextLength = 2000;

  constructor(readonly profile: BrowserProfile, private log: winston.Logger = loggers.social) {
    super();
  }

  isConfigured() {
    return this.profile.isLoggedIn();
  }

  // The session itself is only checked when posting.
  async verifyCredentials() {
    return this.isConfigured();
  }

  protected async upload(imagePath: string, caption: string) {
    const context = await this.profile.launch();
    const page = await this.profile.firstPage(context);
    try {
      await page.goto(CARA_HOME, { waitUntil: 'domcontentloaded', timeout: 60000 });
      await sleep(2000);
      await this.profile.screenshot(page, '01_home');

      if (!isCaraSessionUrl(page.url())) {
        this.profile.clearLogin();
        return fail('Cara session expired. Run: studio-courier cara-login');
      }

      const postButton = page.locator('a, button').filter({ hasText: 'Post' }).first();
      await postButton.waitFor({ state: 'attached', timeout: 20000 });
      await postButton.click({ timeout: 10000 });
      await sleep(2000);
      await this.profile.screenshot(page, '02_after_post_click');

      const dialog = page.locator('[role="dialog"]');
      const [chooser] = await Promise.all([
        page.waitForEvent('filechooser', { timeout: 10000 }),
        dialog.locator("button[type='button']").first().click(),
      ]);
      await chooser.setFiles(imagePath);
      await sleep(3000);
      await this.profile.screenshot(page, '03_after_upload');

      const submit = dialog.locator("button[type='submit']").first();
      await waitUntilEnabled(submit, 15000);

      let textBox = dialog.locator('textarea').first();
      if ((await textBox.count()) === 0) textBox = dialog.locator("[contenteditable='true']").first();
      await textBox.waitFor({ state: 'attached', timeout: 8000 });
      await textBox.fill(caption);
      await this.profile.screenshot(page, '04_after_caption');

      // "add to portfolio" is optional
      const portfolio = dialog.locator("input[type='checkbox']").first();
      if ((await portfolio.count()) > 0 && !(await portfolio.isChecked())) {
        await portfolio.check({ force: true });
      }
      await this.profile.screenshot(page, '05_before_submit');

      await submit.click({ force: true, timeout: 10000 });
      await page.waitForLoadState('domcontentloaded');
      await sleep(3000);
      await this.profile.screenshot(page, '06_after_submit');

      const url = page.url();
      this.log.info('posted to Cara', { url });
      return ok(url.includes('cara.app') ? url : null);
    } catch (err) {
      await this.profile.screenshot(page, 'error');
      throw err;
    } finally {
      await context.close();
    }
  }
}
