import axios, { AxiosRequestConfig } from 'axios';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import type { PostResult } from '../models';
import { errorMessage } from '../errors';

export type PosterKind = 'real' | 'stub';

export interface SocialPoster {
  readonly name: string;
  readonly displayName: string;
  readonly kind: PosterKind;
  readonly maxTextLength: number;
  isConfigured(): boolean;
  verifyCredentials(): Promise<boolean>;
  postImage(imagePath: string, caption: string, altText: string): Promise<PostResult>;
}

export function ok(postUrl: string | null): PostResult {
  return { success: true, postUrl, error: null };
}

export function fail(error: string): PostResult {
  return { success: false, postUrl: null, error };
}

export interface HttpResponse<T> {
  data: T;
  status: number;
}

// The slice of axios the posters use; tests hand in a fake.
export interface HttpClient {
  get<T>(url: string, config?: AxiosRequestConfig): Promise<HttpResponse<T>>;
  post<T>(url: string, body?: unknown, config?: AxiosRequestConfig): Promise<HttpResponse<T>>;
}

export const axiosHttp: HttpClient = {
  async get<T>(url: string, config?: AxiosRequestConfig) {
    const resp = await axios.get<T>(url, { timeout: 30000, ...config });
    return { data: resp.data, status: resp.status };
  },
  async post<T>(url: string, body?: unknown, config?: AxiosRequestConfig) {
    const resp = await axios.post<T>(url, body, { timeout: 120000, ...config });
    return { data: resp.data, status: resp.status };
  },
};

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

export function describeHttpError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) return `HTTP ${err.response.status}: ${bodyText(err.response.data)}`;
    return `Connection error: ${err.message}`;
  }
  return errorMessage(err);
}

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

export function mimeType(path: string): string {
  return MIME_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream';
}

export async function imageForm(imagePath: string, field: string, fields: Record<string, string> = {}): Promise<FormData> {
  const form = new FormData();
  for (const [k, v] of Object.entries(fields)) form.append(k, v);
  const data = await readFile(imagePath);
  form.append(field, new Blob([data], { type: mimeType(imagePath) }), basename(imagePath));
  return form;
}

// Shared guards for real platforms: credentials, image present, no throw escapes.
export abstract class BasePoster implements SocialPoster {
  abstract readonly name: string;
  abstract readonly displayName: string;
  readonly kind: PosterKind = 'real';
  abstract readonly maxTextLength: number;

  abstract isConfigured(): boolean;
  abstract verifyCredentials(): Promise<boolean>;
  protected abstract upload(imagePath: string, caption: string, altText: string): Promise<PostResult>;

  async postImage(imagePath: string, caption: string, altText: string): Promise<PostResult> {
    if (!this.isConfigured()) return fail(`${this.displayName} not configured`);
    if (!existsSync(imagePath)) return fail(`Image not found: ${imagePath}`);
    try {
      return await this.upload(imagePath, caption, altText);
    } catch (err) {
      return fail(describeHttpError(err));
    }
  }
}
