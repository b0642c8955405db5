import { AtpAgent, RichText } from '@atproto/api';
import sharp from 'sharp';
import type winston from 'winston';
import type { BlueskyConfig } from '../config';
import { loggers } from '../logger';
import { errorMessage } from '../errors';
import { BasePoster, fail, mimeType, ok } from './platform';

export interface BlueskySession {
  login(identifier: string, password: string): Promise<void>;
  postImage(text: string, image: Uint8Array, encoding: string, alt: string): Promise<{ uri: string }>;
}

export class AtpSession implements BlueskySession {
  private agent: AtpAgent;

  constructor(service: string) {
    this.agent = new AtpAgent({ service });
  }

  async login(identifier: string, password: string) {
    await this.agent.login({ identifier, password });
  }

  async postImage(text: string, image: Uint8Array, encoding: string, alt: string) {
    const upload = await this.agent.uploadBlob(image, { encoding });
    const rt = new RichText({ text });
    await rt.detectFacets(this.agent);
    const res = await this.agent.post({
      text: rt.text,
      facets: rt.facets,
      embed: {
        $type: 'app.bsky.embed.images',
        images: [{ alt, image: upload.data.blob }],
      },
      createdAt: new Date().toISOString(),
    });
    return { uri: res.uri };
  }
}

// Re-encodes in the source format; sharp drops EXIF unless asked to keep it.
export async function stripExif(imagePath: string): Promise<Buffer> {
  return sharp(imagePath).rotate().toBuffer();
}

// at://did:plc:xyz/app.bsky.feed.post/<rkey> -> web URL
export function blueskyWebUrl(uri: string, handle: string): string {
  const m = uri.match(/^at:\/\/[^/]+\/app\.bsky\.feed\.post\/([^/]+)$/);
  return m ? `https://bsky.app/profile/${handle}/post/${m[1]}` : uri;
}

export class BlueskyPoster extends BasePoster {
  readonly name = 'bluesky';
  readonly displayName = 'Bluesky';
  readonly maxTextLength = 300;
  private loggedIn = false;

  constructor(
    private cfg: BlueskyConfig,
    private session: BlueskySession = new AtpSession(cfg.service),
    private loadImage: (path: string) => Promise<Uint8Array> = stripExif,
    private log: winston.Logger = loggers.social
  ) {
    super();
  }

  isConfigured() {
    return Boolean(this.cfg.handle && this.cfg.appPassword);
  }

  private async ensureLogin() {
    if (this.loggedIn) return;
    await this.session.login(this.cfg.handle, this.cfg.appPassword);
    this.loggedIn = true;
  }

  async verifyCredentials() {
    if (!this.isConfigured()) return false;
    try {
      await this.ensureLogin();
      return true;
    } catch (err) {
      this.log.warn(`Bluesky login failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async postImage(imagePath: string, caption: string, altText: string) {
    // the limit counts graphemes, not UTF-16 units
    const length = new RichText({ text: caption }).graphemeLength;
    if (this.isConfigured() && length > this.maxTextLength) {
      return fail(`Text exceeds ${this.maxTextLength} character limit (${length} chars)`);
    }
    return super.postImage(imagePath, caption, altText);
  }

  protected async upload(imagePath: string, caption: string, altText: string) {
    await this.ensureLogin();
    const image = await this.loadImage(imagePath);
    const { uri } = await this.session.postImage(caption, image, mimeType(imagePath), altText);
    return ok(blueskyWebUrl(uri, this.cfg.handle));
  }
}
