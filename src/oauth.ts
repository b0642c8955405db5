import crypto from 'crypto';
import { nanoid } from 'nanoid';

// OAuth 1.0a (RFC 5849) request signing with HMAC-SHA1, for Flickr and Tumblr.

export interface OAuth1Credentials {
  consumerKey: string;
  consumerSecret: string;
  token: string;
  tokenSecret: string;
}

export interface SigningOptions {
  nonce?: string;
  timestamp?: number; // seconds
}

// RFC 3986: everything but ALPHA / DIGIT / "-" / "." / "_" / "~"
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

function byteOrder(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function normalizeParams(params: Record<string, string>): string {
  return Object.entries(params)
    .map(([k, v]) => [percentEncode(k), percentEncode(v)] as const)
    .sort((a, b) => byteOrder(a[0], b[0]) || byteOrder(a[1], b[1]))
    .map(([k, v]) => `${k}=${v}`)
    .join('&');
}

// Query parameters in the URL are folded into the signed set.
export function signatureBaseString(method: string, url: string, params: Record<string, string>): string {
  const parsed = new URL(url);
  const all: Record<string, string> = { ...params };
  parsed.searchParams.forEach((v, k) => {
    all[k] = v;
  });
  const baseUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  return [method.toUpperCase(), percentEncode(baseUrl), percentEncode(normalizeParams(all))].join('&');
}

export function hmacSha1(baseString: string, consumerSecret: string, tokenSecret: string): string {
  const key = `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret)}`;
  return crypto.createHmac('sha1', key).update(baseString).digest('base64');
}

export function oauthParams(creds: OAuth1Credentials, opts: SigningOptions = {}): Record<string, string> {
  return {
    oauth_consumer_key: creds.consumerKey,
    oauth_nonce: opts.nonce ?? nanoid(32),
    oauth_signature_method: 'HMAC-SHA1',
    oauth_timestamp: String(opts.timestamp ?? Math.floor(Date.now() / 1000)),
    oauth_token: creds.token,
    oauth_version: '1.0',
  };
}

// Returns params plus every oauth_* field, oauth_signature included.
export function signParams(
  method: string,
  url: string,
  creds: OAuth1Credentials,
  params: Record<string, string> = {},
  opts: SigningOptions = {}
): Record<string, string> {
  const signed = { ...oauthParams(creds, opts), ...params };
  const base = signatureBaseString(method, url, signed);
  return { ...signed, oauth_signature: hmacSha1(base, creds.consumerSecret, creds.tokenSecret) };
}

export function authorizationHeader(signed: Record<string, string>): string {
  const fields = Object.entries(signed)
    .filter(([k]) => k.startsWith('oauth_'))
    .sort((a, b) => byteOrder(a[0], b[0]))
    .map(([k, v]) => `${percentEncode(k)}="${percentEncode(v)}"`);
  return `OAuth ${fields.join(', ')}`;
}
