import { join } from 'path';
import { describe, it, expect, vi } from 'vitest';
import winston from 'winston';
import { ImageAnalyzer, ModelClient, clampChars, parseTitles } from '../../src/agent/analyzer';
import { ConfigurationError } from '../../src/errors';
import { tempDir, touch } from '../helpers';

const quiet = winston.createLogger({ silent: true });
const TEN = ['One', 'Two', 'Three', 'Four', 'Five', 'Six', 'Seven', 'Eight', 'Nine', 'Ten'];

function client(reply: string) {
  return { complete: vi.fn<ModelClient['complete']>().mockResolvedValue(reply) };
}

describe('parseTitles', () => {
  it('accepts a JSON array of ten strings', () => {
    expect(parseTitles(JSON.stringify(TEN))).toEqual(TEN);
  });

  it('falls back to quoted strings', () => {
    const reply = `Here you go:\n${TEN.map((t) => `1. "${t}"`).join('\n')}\n"Eleven"`;
    expect(parseTitles(reply)).toEqual(TEN);
  });

  it('falls back to lines, padded with Untitled', () => {
    expect(parseTitles('Fog\n\n  Mist  \nHaze')).toEqual(['Fog', 'Mist', 'Haze', ...Array(7).fill('Untitled')]);
  });
});

describe('clampChars', () => {
  it('cuts long text to the limit with an ellipsis', () => {
    expect(clampChars('abcdefghij', 8)).toBe('abcde...');
    expect(clampChars('  short  ', 8)).toBe('short');
  });
});

describe('ImageAnalyzer', () => {
  it('needs an API key', () => {
    expect(() => ImageAnalyzer.fromConfig({ apiKey: '', model: 'm', maxTokens: 10 })).toThrow(ConfigurationError);
  });

  it('sends the image with the title prompt', async () => {
    const image = join(tempDir(), 'fog.png');
    touch(image, 'png bytes');
    const c = client(JSON.stringify(TEN));
    expect(await new ImageAnalyzer(c, quiet).generateTitles(image)).toEqual(TEN);

    const [content] = c.complete.mock.calls[0];
    expect(content[0]).toEqual({
      type: 'image',
      source: { type: 'base64', media_type: 'image/png', data: Buffer.from('png bytes').toString('base64') },
    });
    expect(content[1].type).toBe('text');
  });

  it('clamps the short description', async () => {
    const analyzer = new ImageAnalyzer(client('x'.repeat(250)), quiet);
    const short = await analyzer.summarizeToShortDescription('A long description.', 200);
    expect(short).toHaveLength(200);
    expect(short.endsWith('...')).toBe(true);
  });

  it('returns the description text trimmed', async () => {
    const image = join(tempDir(), 'fog.jpg');
    touch(image);
    const c = client('  Grey on grey.\n');
    const text = await new ImageAnalyzer(c, quiet).generateDescription(image, {
      title: 'Fog',
      medium: 'oil on canvas',
      dimensions: '30cm x 40cm',
      category: 'new-paintings',
    });
    expect(text).toBe('Grey on grey.');
    const prompt = c.complete.mock.calls[0][0][1];
    expect(prompt.type === 'text' && prompt.text.includes('Dimensions: 30cm x 40cm')).toBe(true);
  });
});
