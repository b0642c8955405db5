import type { AppConfig } from '../config';
import { UnknownPlatformError } from '../errors';
import { BrowserProfile } from '../browser/profile';
import { SocialPoster, HttpClient, axiosHttp } from './platform';
import { MastodonPoster } from './mastodon';
import { PixelfedPoster } from './pixelfed';
import { BlueskyPoster, BlueskySession, AtpSession, stripExif } from './bluesky';
import { FlickrPoster } from './flickr';
import { TumblrPoster } from './tumblr';
import { CaraPoster } from './cara';
import { StubPoster, STUB_DEFINITIONS } from './stubs';

export type PlatformStatus = 'ready' | 'not configured' | 'not yet implemented';

export function platformStatus(poster: SocialPoster): PlatformStatus {
  if (poster.kind === 'stub') return 'not yet implemented';
  return poster.isConfigured() ? 'ready' : 'not configured';
}

export class PosterRegistry {
  private posters = new Map<string, SocialPoster>();

  constructor(posters: SocialPoster[]) {
    for (const p of posters) this.posters.set(p.name, p);
  }

  has(name: string): boolean {
    return this.posters.has(name);
  }

  getPoster(name: string): SocialPoster {
    const poster = this.posters.get(name);
    if (!poster) throw new UnknownPlatformError(name);
    return poster;
  }

  all(): SocialPoster[] {
    return [...this.posters.values()];
  }

  // real and configured
  ready(): SocialPoster[] {
    return this.all().filter((p) => platformStatus(p) === 'ready');
  }
}

export interface PosterDeps {
  http?: HttpClient;
  blueskySession?: BlueskySession;
  loadImage?: (path: string) => Promise<Uint8Array>;
}

// Built once at startup; every platform name maps to exactly one poster.
export function buildPosterRegistry(config: AppConfig, deps: PosterDeps = {}): PosterRegistry {
  const http = deps.http ?? axiosHttp;
  const caraProfile = new BrowserProfile('cara', config.paths.browserProfiles, config.paths.screenshots);
  return new PosterRegistry([
    new MastodonPoster(config.mastodon, http),
    new BlueskyPoster(config.bluesky, deps.blueskySession ?? new AtpSession(config.bluesky.service), deps.loadImage ?? stripExif),
    new PixelfedPoster(config.pixelfed, http),
    new FlickrPoster(config.flickr, http),
    new TumblrPoster(config.tumblr, http),
    new CaraPoster(caraProfile),
    ...STUB_DEFINITIONS.map(([name, display, max]) => new StubPoster(name, display, max)),
  ]);
}
