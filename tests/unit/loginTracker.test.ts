import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import winston from 'winston';
import { LoginTracker, describeLoginStatus } from '../../src/browser/loginTracker';
import { tempDir, writeJson } from '../helpers';

const quiet = winston.createLogger({ silent: true });
const NOW = new Date(Date.UTC(2025, 5, 30, 12, 0, 0));

describe('LoginTracker', () => {
  let file: string;
  let tracker: LoginTracker;

  beforeEach(() => {
    file = join(tempDir(), 'login_status.json');
    tracker = new LoginTracker(file, quiet);
  });

  it('reports never for a platform without a login', () => {
    expect(tracker.status('faso', NOW)).toEqual({
      platform: 'faso',
      lastLogin: null,
      daysSince: null,
      maxDays: 30,
      daysRemaining: null,
      state: 'never',
    });
  });

  it('warns in the last week and expires after the limit', () => {
    tracker.recordLogin('faso', new Date(Date.UTC(2025, 5, 1, 12, 0, 0)));
    expect(tracker.status('faso', NOW)).toMatchObject({ daysSince: 29, daysRemaining: 1, state: 'warn' });

    tracker.recordLogin('faso', new Date(Date.UTC(2025, 4, 1, 12, 0, 0)));
    expect(tracker.status('faso', NOW)).toMatchObject({ daysSince: 60, daysRemaining: -30, state: 'expired' });

    tracker.recordLogin('cara', NOW);
    expect(tracker.status('cara', NOW)).toMatchObject({ daysSince: 0, daysRemaining: 30, state: 'ok' });
    expect(tracker.alerts(NOW).map((a) => `${a.platform}:${a.state}`)).toEqual(['faso:expired']);

    expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual({
      faso: { last_login: '2025-05-01T12:00:00.000Z', max_days: 30 },
      cara: { last_login: '2025-06-30T12:00:00.000Z', max_days: 30 },
    });
  });

  it('keeps a custom limit across logins', () => {
    writeJson(file, { faso: { last_login: '2025-06-20T12:00:00.000Z', max_days: 14 } });
    expect(tracker.status('faso', NOW)).toMatchObject({ daysSince: 10, daysRemaining: 4, state: 'warn' });
    tracker.recordLogin('faso', NOW);
    expect(tracker.status('faso', NOW)).toMatchObject({ maxDays: 14, daysRemaining: 14, state: 'ok' });
  });

  it('treats an unreadable file as no logins', () => {
    writeFileSync(file, '{not json');
    expect(tracker.status('cara', NOW).state).toBe('never');
    expect(tracker.alerts(NOW).map((a) => a.platform)).toEqual(['faso', 'cara']);
  });
});

describe('describeLoginStatus', () => {
  it('says what to do', () => {
    const base = { platform: 'faso', lastLogin: null, maxDays: 30 };
    expect(describeLoginStatus({ ...base, daysSince: null, daysRemaining: null, state: 'never' })).toBe('never logged in');
    expect(describeLoginStatus({ ...base, daysSince: 31, daysRemaining: -1, state: 'expired' })).toBe('session likely expired (last login 31 days ago)');
    expect(describeLoginStatus({ ...base, daysSince: 25, daysRemaining: 5, state: 'warn' })).toBe('renew within 5 day(s)');
  });
});
