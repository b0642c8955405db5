import type winston from 'winston';
import type { MastodonConfig } from '../config';
import { loggers } from '../logger';
import { BasePoster, HttpClient, axiosHttp, describeHttpError, fail, imageForm, ok } from './platform';

interface MediaAttachment {
  id?: string;
}

interface Status {
  url?: string | null;
  uri?: string | null;
}

export class MastodonPoster extends BasePoster {
  readonly name: string = 'mastodon';
  readonly displayName: string = 'Mastodon';
  readonly maxTextLength: number = 500;
  protected mediaPath = '/api/v2/media';

  constructor(protected cfg: MastodonConfig, protected http: HttpClient = axiosHttp, protected log: winston.Logger = loggers.social) {
    super();
  }

  isConfigured() {
    return Boolean(this.cfg.instanceUrl && this.cfg.accessToken);
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.cfg.accessToken}` };
  }

  protected url(path: string) {
    return `${this.cfg.instanceUrl}${path}`;
  }

  async verifyCredentials() {
    if (!this.isConfigured()) return false;
    try {
      const resp = await this.http.get<unknown>(this.url('/api/v1/accounts/verify_credentials'), { headers: this.authHeaders() });
      return resp.status === 200;
    } catch (err) {
      this.log.warn(`${this.displayName} credential check failed: ${describeHttpError(err)}`);
      return false;
    }
  }

  protected statusBody(caption: string, mediaId: string): Record<string, unknown> {
    return { status: caption, media_ids: [mediaId] };
  }

  protected async upload(imagePath: string, caption: string, altText: string) {
    const form = await imageForm(imagePath, 'file', altText ? { description: altText } : {});
    const media = await this.http.post<MediaAttachment>(this.url(this.mediaPath), form, { headers: this.authHeaders() });
    const mediaId = media.data.id;
    if (!mediaId) return fail('Failed to upload media');

    const status = await this.http.post<Status>(this.url('/api/v1/statuses'), this.statusBody(caption, mediaId), {
      headers: { ...this.authHeaders(), 'Content-Type': 'application/json' },
    });
    this.log.info(`posted to ${this.displayName}`, { media: mediaId });
    return ok(status.data.url || status.data.uri || null);
  }
}
