import { homedir } from 'os';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { expandHome, loadConfig } from '../../src/config';
import { ConfigurationError } from '../../src/errors';

describe('loadConfig', () => {
  it('falls back to defaults under the home directory', () => {
    const config = loadConfig({});
    const metadata = join(homedir(), 'Pictures', 'processed-metadata');
    expect(config.paths.metadataOutput).toBe(metadata);
    expect(config.paths.scheduleFile).toBe(join(metadata, 'schedule.json'));
    expect(config.paths.roundsFile).toBe(join(metadata, 'rounds.json'));
    expect(config.paths.logs).toBe(join(homedir(), '.config', 'studio-courier', 'logs'));
    expect(config.dimensionUnit).toBe('cm');
    expect(config.logLevel).toBe('info');
    expect(config.ai).toEqual({ apiKey: '', model: 'claude-sonnet-4-20250514', maxTokens: 2000 });
    expect(config.bluesky.service).toBe('https://bsky.social');
    expect(config.tumblr.postState).toBe('published');
  });

  it('honours an explicit schedule path', () => {
    const config = loadConfig({ METADATA_OUTPUT_PATH: '/data/meta', SCHEDULE_PATH: '/data/other/schedule.json' });
    expect(config.paths.metadataOutput).toBe('/data/meta');
    expect(config.paths.scheduleFile).toBe('/data/other/schedule.json');
  });

  it('strips trailing slashes from instance URLs', () => {
    const config = loadConfig({
      MASTODON_INSTANCE_URL: 'https://mastodon.example/',
      MASTODON_ACCESS_TOKEN: 'test-token',
      PIXELFED_INSTANCE_URL: 'https://pixelfed.example//',
    });
    expect(config.mastodon).toEqual({ instanceUrl: 'https://mastodon.example', accessToken: 'test-token' });
    expect(config.pixelfed.instanceUrl).toBe('https://pixelfed.example');
  });

  it('lists every invalid field', () => {
    let caught: unknown;
    try {
      loadConfig({ DIMENSION_UNIT: 'ft', ANTHROPIC_MAX_TOKENS: 'lots' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect([...caught.fields].sort()).toEqual(['ANTHROPIC_MAX_TOKENS', 'DIMENSION_UNIT']);
      expect(caught.message).toContain('DIMENSION_UNIT');
    }
  });
});

describe('expandHome', () => {
  it('expands a leading tilde', () => {
    expect(expandHome('~/art')).toBe(join(homedir(), 'art'));
    expect(expandHome('~')).toBe(homedir());
  });

  it('leaves absolute paths alone', () => {
    expect(expandHome('/srv/art')).toBe('/srv/art');
  });
});
