import type winston from 'winston';
import type { TumblrConfig } from '../config';
import { loggers } from '../logger';
import { OAuth1Credentials, authorizationHeader, signParams } from '../oauth';
import { BasePoster, HttpClient, axiosHttp, describeHttpError, fail, imageForm, ok } from './platform';

const API = 'https://api.tumblr.com/v2';

interface TumblrEnvelope<T> {
  meta?: { status?: number; msg?: string };
  response?: T;
  errors?: unknown;
}

export class TumblrPoster extends BasePoster {
  readonly name = 'tumblr';
  readonly displayName = 'Tumblr';
  readonly maxTextLength = 0; // no enforced caption limit

  constructor(private cfg: TumblrConfig, private http: HttpClient = axiosHttp, private log: winston.Logger = loggers.social) {
    super();
  }

  isConfigured() {
    const c = this.cfg;
    return Boolean(c.consumerKey && c.consumerSecret && c.oauthToken && c.oauthSecret && c.blogName);
  }

  private get creds(): OAuth1Credentials {
    return {
      consumerKey: this.cfg.consumerKey,
      consumerSecret: this.cfg.consumerSecret,
      token: this.cfg.oauthToken,
      tokenSecret: this.cfg.oauthSecret,
    };
  }

  // Multipart bodies are not part of the signature; only the oauth_* fields are signed.
  private authHeader(method: string, url: string) {
    return { Authorization: authorizationHeader(signParams(method, url, this.creds)) };
  }

  async verifyCredentials() {
    if (!this.isConfigured()) return false;
    const url = `${API}/user/info`;
    try {
      const resp = await this.http.get<TumblrEnvelope<{ user?: unknown }>>(url, { headers: this.authHeader('GET', url) });
      return Boolean(resp.data.response?.user);
    } catch (err) {
      this.log.warn(`Tumblr credential check failed: ${describeHttpError(err)}`);
      return false;
    }
  }

  protected async upload(imagePath: string, caption: string) {
    const blog = this.cfg.blogName;
    const url = `${API}/blog/${blog}.tumblr.com/post`;
    const form = await imageForm(imagePath, 'data', { type: 'photo', state: this.cfg.postState, caption });
    const resp = await this.http.post<TumblrEnvelope<{ id?: number | string; id_string?: string }>>(url, form, {
      headers: this.authHeader('POST', url),
    });

    if (resp.data.errors) return fail(JSON.stringify(resp.data.errors));
    const id = resp.data.response?.id_string ?? resp.data.response?.id;
    if (id === undefined) return fail(`Unexpected response: ${JSON.stringify(resp.data)}`);
    return ok(`https://${blog}.tumblr.com/post/${id}`);
  }
}
