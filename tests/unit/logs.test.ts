import { describe, it, expect } from 'vitest';
import { credentialFailureEntry, failureEntry, successEntry } from '../../src/social/postLog';
import { activityLine, activitySource } from '../../src/activityLog';
import { logTimestamp } from '../../src/logger';

const AT = new Date(2025, 2, 1, 9, 5, 7);

describe('logTimestamp', () => {
  it('formats local time', () => {
    expect(logTimestamp(AT)).toBe('2025-03-01 09:05:07');
  });
});

describe('social log entries', () => {
  it('writes a success line', () => {
    expect(successEntry(AT, 'mastodon', 'Sunset Lake', '/ig/sunset_lake.jpg', 'https://mastodon.example/@me/1')).toBe(
      "[2025-03-01 09:05:07] SUCCESS  platform=mastodon  painting='Sunset Lake'  image=/ig/sunset_lake.jpg  url=https://mastodon.example/@me/1"
    );
    expect(successEntry(AT, 'flickr', 'Fog', null, null)).toBe("[2025-03-01 09:05:07] SUCCESS  platform=flickr  painting='Fog'");
  });

  it('writes a failure block', () => {
    expect(failureEntry(AT, 'mastodon', 'Sunset Lake', '/ig/sunset_lake.jpg', 'HTTP 401: unauthorized')).toBe(
      [
        "[2025-03-01 09:05:07] FAILURE  platform=mastodon  painting='Sunset Lake'",
        '  image: /ig/sunset_lake.jpg',
        '  error: HTTP 401: unauthorized',
      ].join('\n')
    );
  });

  it('lists screenshots for browser platforms', () => {
    const entry = failureEntry(AT, 'cara', 'Fog', null, 'timeout', { dir: '/shots', files: ['cara_01_home.png', 'cara_error.png'] });
    expect(entry.split('\n')).toEqual([
      "[2025-03-01 09:05:07] FAILURE  platform=cara  painting='Fog'",
      '  error: timeout',
      '  screenshots: cara_01_home.png, cara_error.png',
      '  screenshot dir: /shots',
    ]);
  });

  it('writes a credential failure line', () => {
    expect(credentialFailureEntry(AT, 'bluesky')).toBe('[2025-03-01 09:05:07] CREDENTIAL FAILURE  platform=bluesky  credentials invalid or missing');
  });
});

describe('activity log', () => {
  it('tags the line with its source', () => {
    expect(activityLine('check-schedule', 'cron', AT)).toBe('[2025-03-01 09:05:07] [cron] check-schedule');
  });

  it('treats a terminal as a user and anything else as cron', () => {
    expect(activitySource(true)).toBe('user');
    expect(activitySource(false)).toBe('cron');
    expect(activitySource(undefined)).toBe('cron');
  });
});
