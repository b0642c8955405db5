import { join } from 'path';
import { describe, it, expect, beforeEach } from 'vitest';
import winston from 'winston';
import { FLICKR_REST_URL, FLICKR_UPLOAD_URL, FlickrPoster, humanizeStem, parseUploadReply } from '../../src/social/flickr';
import { fakeHttp, tempDir, touch } from '../helpers';

const quiet = winston.createLogger({ silent: true });
const cfg = { apiKey: 'test-key', apiSecret: 'test-secret', oauthToken: 'test-token', oauthSecret: 'test-token-secret' };

describe('parseUploadReply', () => {
  it('reads the photo id from an ok reply', () => {
    expect(parseUploadReply('<?xml version="1.0"?>\n<rsp stat="ok">\n<photoid>5317</photoid>\n</rsp>')).toEqual({ ok: true, photoId: '5317' });
  });

  it('reads the error message from a failed reply', () => {
    expect(parseUploadReply('<rsp stat="fail"><err code="98" msg="Invalid auth token" /></rsp>')).toEqual({
      ok: false,
      message: 'Invalid auth token',
    });
    expect(parseUploadReply('gateway timeout')).toEqual({ ok: false, message: 'Unknown error' });
  });

  it('reports an ok reply without an id', () => {
    expect(parseUploadReply('<rsp stat="ok"></rsp>')).toEqual({ ok: true, photoId: null });
  });
});

describe('humanizeStem', () => {
  it('title-cases the file stem', () => {
    expect(humanizeStem('/x/sunset_over_the_LAKE.jpg')).toBe('Sunset Over The Lake');
  });
});

describe('FlickrPoster', () => {
  let image: string;
  let http: ReturnType<typeof fakeHttp>;

  beforeEach(() => {
    image = join(tempDir(), 'sunset_lake.jpg');
    touch(image);
    http = fakeHttp();
  });

  it('uploads signed fields and links the photo under the user id', async () => {
    http.post.mockResolvedValueOnce({ data: '<rsp stat="ok"><photoid>42</photoid></rsp>', status: 200 });
    http.get.mockResolvedValueOnce({ data: { stat: 'ok', user: { id: '123@N01' } }, status: 200 });
    const poster = new FlickrPoster(cfg, http, quiet);

    const result = await poster.postImage(image, 'Sunset Lake\n\n#art', 'Sunset Lake');
    expect(result).toEqual({ success: true, postUrl: 'https://www.flickr.com/photos/123@N01/42/', error: null });

    const [url, form, config] = http.post.mock.calls[0];
    expect(url).toBe(FLICKR_UPLOAD_URL);
    expect(config).toEqual({ responseType: 'text' });
    expect(form.get('title')).toBe('Sunset Lake');
    expect(form.get('description')).toBe('Sunset Lake\n\n#art');
    expect(form.get('is_public')).toBe('1');
    expect(form.get('oauth_consumer_key')).toBe('test-key');
    expect(typeof form.get('oauth_signature')).toBe('string');
    expect(form.get('photo')).toBeInstanceOf(Blob);

    const lookup = new URL(http.get.mock.calls[0][0]);
    expect(`${lookup.origin}${lookup.pathname}`).toBe(FLICKR_REST_URL);
    expect(lookup.searchParams.get('method')).toBe('flickr.test.login');
  });

  it('titles the photo from the file name when there is no alt text', async () => {
    http.post.mockResolvedValueOnce({ data: '<rsp stat="ok"><photoid>42</photoid></rsp>', status: 200 });
    http.get.mockRejectedValueOnce(new Error('offline'));
    const result = await new FlickrPoster(cfg, http, quiet).postImage(image, 'caption', '');
    expect(http.post.mock.calls[0][1].get('title')).toBe('Sunset Lake');
    expect(result).toEqual({ success: true, postUrl: null, error: null });
  });

  it('reports an upload error from the reply', async () => {
    http.post.mockResolvedValueOnce({ data: '<rsp stat="fail"><err code="5" msg="Filetype was not recognised" /></rsp>', status: 200 });
    expect(await new FlickrPoster(cfg, http, quiet).postImage(image, 'c', 'a')).toEqual({
      success: false,
      postUrl: null,
      error: 'Flickr upload failed: Filetype was not recognised',
    });
  });

  it('reports a reply without a photo id', async () => {
    http.post.mockResolvedValueOnce({ data: '<rsp stat="ok"></rsp>', status: 200 });
    expect(await new FlickrPoster(cfg, http, quiet).postImage(image, 'c', 'a')).toEqual({
      success: false,
      postUrl: null,
      error: 'Upload succeeded but no photo ID returned',
    });
  });

  it('verifies credentials with test.login and reuses the user id', async () => {
    http.get.mockResolvedValueOnce({ data: { stat: 'ok', user: { id: '9@N02' } }, status: 200 });
    http.post.mockResolvedValueOnce({ data: '<rsp stat="ok"><photoid>7</photoid></rsp>', status: 200 });
    const poster = new FlickrPoster(cfg, http, quiet);

    expect(await poster.verifyCredentials()).toBe(true);
    expect(await poster.postImage(image, 'c', 'a')).toEqual({ success: true, postUrl: 'https://www.flickr.com/photos/9@N02/7/', error: null });
    expect(http.get).toHaveBeenCalledTimes(1);
  });

  it('is not configured without all four keys', async () => {
    const poster = new FlickrPoster({ ...cfg, oauthSecret: '' }, http, quiet);
    expect(poster.isConfigured()).toBe(false);
    expect(await poster.verifyCredentials()).toBe(false);
  });
});
