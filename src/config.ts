import { homedir } from 'os';
import { join, resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const envSchema = z.object({
  PAINTINGS_BIG_PATH: z.string().default('~/Pictures/my-paintings-big'),
  PAINTINGS_INSTAGRAM_PATH: z.string().default('~/Pictures/my-paintings-instagram'),
  METADATA_OUTPUT_PATH: z.string().default('~/Pictures/processed-metadata'),
  APP_DATA_DIR: z.string().default('~/.config/studio-courier'),
  SCHEDULE_PATH: z.string().optional(),

  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-20250514'),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(2000),

  WEBSITE_URL: z.string().default(''),
  DIMENSION_UNIT: z.enum(['cm', 'in']).default('cm'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),

  MASTODON_INSTANCE_URL: z.string().default(''),
  MASTODON_ACCESS_TOKEN: z.string().default(''),
  PIXELFED_INSTANCE_URL: z.string().default(''),
  PIXELFED_ACCESS_TOKEN: z.string().default(''),
  BLUESKY_HANDLE: z.string().default(''),
  BLUESKY_APP_PASSWORD: z.string().default(''),
  BLUESKY_SERVICE: z.string().url().default('https://bsky.social'),
  FLICKR_API_KEY: z.string().default(''),
  FLICKR_API_SECRET: z.string().default(''),
  FLICKR_OAUTH_TOKEN: z.string().default(''),
  FLICKR_OAUTH_SECRET: z.string().default(''),
  TUMBLR_CONSUMER_KEY: z.string().default(''),
  TUMBLR_CONSUMER_SECRET: z.string().default(''),
  TUMBLR_OAUTH_TOKEN: z.string().default(''),
  TUMBLR_OAUTH_SECRET: z.string().default(''),
  TUMBLR_BLOG_NAME: z.string().default(''),
  TUMBLR_POST_STATE: z.enum(['published', 'draft', 'queue', 'private']).default('published'),
});

export type DimensionUnit = 'cm' | 'in';

export interface PathsConfig {
  paintingsBig: string;
  paintingsInstagram: string;
  metadataOutput: string;
  appData: string;
  logs: string;
  screenshots: string;
  browserProfiles: string;
  scheduleFile: string;
  roundsFile: string;
  loginStatusFile: string;
}

export interface MastodonConfig {
  instanceUrl: string;
  accessToken: string;
}

export interface BlueskyConfig {
  handle: string;
  appPassword: string;
  service: string;
}

export interface FlickrConfig {
  apiKey: string;
  apiSecret: string;
  oauthToken: string;
  oauthSecret: string;
}

export interface TumblrConfig {
  consumerKey: string;
  consumerSecret: string;
  oauthToken: string;
  oauthSecret: string;
  blogName: string;
  postState: 'published' | 'draft' | 'queue' | 'private';
}

export interface AiConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
}

export interface AppConfig {
  paths: PathsConfig;
  ai: AiConfig;
  websiteUrl: string;
  dimensionUnit: DimensionUnit;
  logLevel: string;
  mastodon: MastodonConfig;
  pixelfed: MastodonConfig;
  bluesky: BlueskyConfig;
  flickr: FlickrConfig;
  tumblr: TumblrConfig;
}

// Choices offered when describing a new painting
export const SUBSTRATES = ['paper', 'board', 'canvas', 'linen'];
export const MEDIUMS = ['acrylic', 'oil', 'watercolor', 'pen and ink', 'pencil'];
export const SUBJECTS = ['abstract', 'landscape', 'cityscape', 'sea creatures', 'fantasy', 'portrait'];
export const STYLES = ['abstract', 'figurative', 'surrealism', 'impressionism', 'landscape', 'cityscape'];
export const COLLECTIONS = ['imaginary places', 'oils', 'abstracts', 'studies'];

export const NEW_PAINTINGS_FOLDER = 'new-paintings';
export const SUPPORTED_IMAGE_FORMATS = ['.jpg', '.jpeg', '.png'];

export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return resolve(p);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors);
    throw new ConfigurationError(`Invalid environment variables: ${fields.join(', ')}`, fields);
  }
  const e = parsed.data;

  const metadataOutput = expandHome(e.METADATA_OUTPUT_PATH);
  const appData = expandHome(e.APP_DATA_DIR);

  return {
    paths: {
      paintingsBig: expandHome(e.PAINTINGS_BIG_PATH),
      paintingsInstagram: expandHome(e.PAINTINGS_INSTAGRAM_PATH),
      metadataOutput,
      appData,
      logs: join(appData, 'logs'),
      screenshots: join(appData, 'screenshots'),
      browserProfiles: join(appData, 'browser-profiles'),
      scheduleFile: e.SCHEDULE_PATH ? expandHome(e.SCHEDULE_PATH) : join(metadataOutput, 'schedule.json'),
      roundsFile: join(metadataOutput, 'rounds.json'),
      loginStatusFile: join(appData, 'login_status.json'),
    },
    ai: {
      apiKey: e.ANTHROPIC_API_KEY ?? '',
      model: e.ANTHROPIC_MODEL,
      maxTokens: e.ANTHROPIC_MAX_TOKENS,
    },
    websiteUrl: e.WEBSITE_URL,
    dimensionUnit: e.DIMENSION_UNIT,
    logLevel: e.LOG_LEVEL,
    mastodon: {
      instanceUrl: e.MASTODON_INSTANCE_URL.replace(/\/+$/, ''),
      accessToken: e.MASTODON_ACCESS_TOKEN,
    },
    pixelfed: {
      instanceUrl: e.PIXELFED_INSTANCE_URL.replace(/\/+$/, ''),
      accessToken: e.PIXELFED_ACCESS_TOKEN,
    },
    bluesky: {
      handle: e.BLUESKY_HANDLE,
      appPassword: e.BLUESKY_APP_PASSWORD,
      service: e.BLUESKY_SERVICE,
    },
    flickr: {
      apiKey: e.FLICKR_API_KEY,
      apiSecret: e.FLICKR_API_SECRET,
      oauthToken: e.FLICKR_OAUTH_TOKEN,
      oauthSecret: e.FLICKR_OAUTH_SECRET,
    },
    tumblr: {
      consumerKey: e.TUMBLR_CONSUMER_KEY,
      consumerSecret: e.TUMBLR_CONSUMER_SECRET,
      oauthToken: e.TUMBLR_OAUTH_TOKEN,
      oauthSecret: e.TUMBLR_OAUTH_SECRET,
      blogName: e.TUMBLR_BLOG_NAME,
      postState: e.TUMBLR_POST_STATE,
    },
  };
}
