import { MastodonPoster } from './mastodon';

// Mastodon-compatible API; some instances only honour the token as a query parameter.
export class PixelfedPoster extends MastodonPoster {
  readonly name: string = 'pixelfed';
  readonly displayName: string = 'Pixelfed';
  readonly maxTextLength: number = 2000;
  protected mediaPath = '/api/v1/media';

  protected url(path: string) {
    const base = `${this.cfg.instanceUrl}${path}`;
    if (path.startsWith('/api/v1/accounts')) return base;
    return `${base}?access_token=${encodeURIComponent(this.cfg.accessToken)}`;
  }

  protected statusBody(caption: string, mediaId: string) {
    return { status: caption, media_ids: [mediaId], visibility: 'public' };
  }
}
