import { basename, extname } from 'path';
import type winston from 'winston';
import type { FlickrConfig } from '../config';
import { loggers } from '../logger';
import { OAuth1Credentials, signParams } from '../oauth';
import { BasePoster, HttpClient, axiosHttp, describeHttpError, fail, imageForm, ok } from './platform';

export const FLICKR_UPLOAD_URL = 'https://up.flickr.com/services/upload/';
export const FLICKR_REST_URL = 'https://www.flickr.com/services/rest/';

interface TestLoginResponse {
  stat?: string;
  user?: { id?: string };
}

export type UploadReply = { ok: true; photoId: string | null } | { ok: false; message: string };

// <rsp stat="ok"><photoid>123</photoid></rsp>
export function parseUploadReply(xml: string): UploadReply {
  const stat = xml.match(/<rsp[^>]*\sstat="([^"]*)"/)?.[1];
  if (stat !== 'ok') {
    const msg = xml.match(/<err[^>]*\smsg="([^"]*)"/)?.[1] ?? 'Unknown error';
    return { ok: false, message: msg };
  }
  return { ok: true, photoId: xml.match(/<photoid[^>]*>([^<]+)<\/photoid>/)?.[1]?.trim() ?? null };
}

// "sunset_over_the_LAKE" -> "Sunset Over The Lake"
export function humanizeStem(imagePath: string): string {
  const stem = basename(imagePath, extname(imagePath));
  return stem
    .replace(/_/g, ' ')
    .split(' ')
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1).toLowerCase() : w))
    .join(' ');
}

export class FlickrPoster extends BasePoster {
  readonly name = 'flickr';
  readonly displayName = 'Flickr';
  readonly maxTextLength = 63206;
  private userNsid: string | null = null;

  constructor(private cfg: FlickrConfig, private http: HttpClient = axiosHttp, private log: winston.Logger = loggers.social) {
    super();
  }

  isConfigured() {
    return Boolean(this.cfg.apiKey && this.cfg.apiSecret && this.cfg.oauthToken && this.cfg.oauthSecret);
  }

  private get creds(): OAuth1Credentials {
    return {
      consumerKey: this.cfg.apiKey,
      consumerSecret: this.cfg.apiSecret,
      token: this.cfg.oauthToken,
      tokenSecret: this.cfg.oauthSecret,
    };
  }

  private async testLogin(): Promise<TestLoginResponse> {
    const signed = signParams('GET', FLICKR_REST_URL, this.creds, {
      method: 'flickr.test.login',
      format: 'json',
      nojsoncallback: '1',
    });
    const resp = await this.http.get<TestLoginResponse>(`${FLICKR_REST_URL}?${new URLSearchParams(signed).toString()}`);
    return resp.data;
  }

  async verifyCredentials() {
    if (!this.isConfigured()) return false;
    try {
      const data = await this.testLogin();
      if (data.stat !== 'ok') return false;
      this.userNsid = data.user?.id ?? null;
      return true;
    } catch (err) {
      this.log.warn(`Flickr credential check failed: ${describeHttpError(err)}`);
      return false;
    }
  }

  private async photoUrl(photoId: string): Promise<string | null> {
    if (!this.userNsid) {
      try {
        this.userNsid = (await this.testLogin()).user?.id ?? null;
      } catch (err) {
        this.log.warn(`could not look up Flickr user id: ${describeHttpError(err)}`);
      }
    }
    return this.userNsid ? `https://www.flickr.com/photos/${this.userNsid}/${photoId}/` : null;
  }

  // alt text is the photo title, the caption its description
  protected async upload(imagePath: string, caption: string, altText: string) {
    const fields = {
      title: altText || humanizeStem(imagePath),
      description: caption,
      is_public: '1',
      safety_level: '1',
      content_type: '1',
    };
    // every field but the photo itself is signed and sent in the body
    const signed = signParams('POST', FLICKR_UPLOAD_URL, this.creds, fields);
    const form = await imageForm(imagePath, 'photo', signed);
    const resp = await this.http.post<string>(FLICKR_UPLOAD_URL, form, { responseType: 'text' });

    const reply = parseUploadReply(String(resp.data));
    if (!reply.ok) return fail(`Flickr upload failed: ${reply.message}`);
    if (!reply.photoId) return fail('Upload succeeded but no photo ID returned');
    return ok(await this.photoUrl(reply.photoId));
  }
}
