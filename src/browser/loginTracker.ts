import type { LowSync } from 'lowdb';
import { z } from 'zod';
import type winston from 'winston';
import { openJsonStore } from '../db';
import { loggers } from '../logger';
import { errorMessage } from '../errors';

// Sites whose sessions only a person can renew, through a headed browser.
export const BROWSER_LOGIN_PLATFORMS = ['faso', 'cara'] as const;
export const DEFAULT_MAX_DAYS = 30;
export const WARN_DAYS_REMAINING = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

const loginDocumentSchema = z.record(
  z.object({
    last_login: z.string().nullable().default(null),
    max_days: z.number().int().positive().default(DEFAULT_MAX_DAYS),
  })
);

type LoginDocument = z.infer<typeof loginDocumentSchema>;

export type LoginState = 'never' | 'ok' | 'warn' | 'expired';

export interface LoginStatus {
  platform: string;
  lastLogin: string | null;
  daysSince: number | null;
  maxDays: number;
  daysRemaining: number | null;
  state: LoginState;
}

export class LoginTracker {
  private db: LowSync<LoginDocument>;

  constructor(readonly file: string, private log: winston.Logger = loggers.browser) {
    this.db = openJsonStore<LoginDocument>(file, {});
  }

  recordLogin(platform: string, now: Date = new Date()) {
    const doc = this.load();
    const entries: Partial<LoginDocument> = doc;
    doc[platform] = { max_days: DEFAULT_MAX_DAYS, ...entries[platform], last_login: now.toISOString() };
    this.db.data = doc;
    this.db.write();
  }

  status(platform: string, now: Date = new Date()): LoginStatus {
    const entry = this.load()[platform];
    const maxDays = entry?.max_days ?? DEFAULT_MAX_DAYS;
    const last = entry?.last_login ? Date.parse(entry.last_login) : NaN;
    if (!entry?.last_login || Number.isNaN(last)) {
      return { platform, lastLogin: null, daysSince: null, maxDays, daysRemaining: null, state: 'never' };
    }

    const daysSince = Math.floor((now.getTime() - last) / DAY_MS);
    const daysRemaining = maxDays - daysSince;
    let state: LoginState = 'ok';
    if (daysRemaining <= 0) state = 'expired';
    else if (daysRemaining <= WARN_DAYS_REMAINING) state = 'warn';
    return { platform, lastLogin: entry.last_login, daysSince, maxDays, daysRemaining, state };
  }

  // Browser platforms that were never logged into, or whose session is old.
  alerts(now: Date = new Date()): LoginStatus[] {
    return BROWSER_LOGIN_PLATFORMS.map((p) => this.status(p, now)).filter((s) => s.state !== 'ok');
  }

  private load(): LoginDocument {
    try {
      this.db.read();
    } catch (err) {
      this.log.warn(`unreadable login status ${this.file}, starting empty: ${errorMessage(err)}`);
      return {};
    }
    const parsed = loginDocumentSchema.safeParse(this.db.data);
    if (!parsed.success) {
      this.log.warn(`malformed login status ${this.file}, starting empty`);
      return {};
    }
    return parsed.data;
  }
}

export function describeLoginStatus(s: LoginStatus): string {
  switch (s.state) {
    case 'never':
      return 'never logged in';
    case 'expired':
      return `session likely expired (last login ${s.daysSince} days ago)`;
    case 'warn':
      return `renew within ${s.daysRemaining} day(s)`;
    case 'ok':
      return `ok, ${s.daysRemaining} day(s) left`;
  }
}
