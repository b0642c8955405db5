import Anthropic from '@anthropic-ai/sdk';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import type winston from 'winston';
import type { AiConfig } from '../config';
import { ConfigurationError } from '../errors';
import { loggers } from '../logger';
import { TITLE_PROMPT, DescriptionPromptInput, descriptionPrompt, socialDescriptionPrompt, summaryPrompt } from './prompts';

export type ContentBlock = Anthropic.TextBlockParam | Anthropic.ImageBlockParam;
type ImageMediaType = Anthropic.ImageBlockParam['source']['media_type'];

export interface ModelClient {
  complete(content: ContentBlock[]): Promise<string>;
}

export class AnthropicClient implements ModelClient {
  private client: Anthropic;

  constructor(private cfg: AiConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey, timeout: 120000 });
  }

  async complete(content: ContentBlock[]): Promise<string> {
    const msg = await this.client.messages.create({
      model: this.cfg.model,
      max_tokens: this.cfg.maxTokens,
      messages: [{ role: 'user', content }],
    });
    return msg.content
      .map((b) => (b.type === 'text' ? b.text : ''))
      .join('')
      .trim();
  }
}

const IMAGE_TYPES: Record<string, ImageMediaType> = {
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

export async function imageBlock(imagePath: string): Promise<ContentBlock> {
  const data = await readFile(imagePath);
  return {
    type: 'image',
    source: { type: 'base64', media_type: IMAGE_TYPES[extname(imagePath).toLowerCase()] ?? 'image/jpeg', data: data.toString('base64') },
  };
}

export function clampChars(text: string, maxChars: number): string {
  const t = text.trim();
  return t.length > maxChars ? t.slice(0, maxChars - 3) + '...' : t;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// JSON array of 10, else the first 10 quoted strings, else the first 10 lines padded with "Untitled".
export function parseTitles(reply: string): string[] {
  const parsed = parseJson(reply);
  if (Array.isArray(parsed)) {
    const titles = parsed.filter((t): t is string => typeof t === 'string');
    if (titles.length === 10 && parsed.length === 10) return titles;
  }
  const quoted = [...reply.matchAll(/"([^"]+)"/g)].map((m) => m[1]);
  if (quoted.length >= 10) return quoted.slice(0, 10);

  const lines = reply
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean)
    .slice(0, 10);
  while (lines.length < 10) lines.push('Untitled');
  return lines;
}

export class ImageAnalyzer {
  constructor(private client: ModelClient, private log: winston.Logger = loggers.analyzer) {}

  static fromConfig(cfg: AiConfig): ImageAnalyzer {
    if (!cfg.apiKey) throw new ConfigurationError('ANTHROPIC_API_KEY not found in environment variables', ['ANTHROPIC_API_KEY']);
    return new ImageAnalyzer(new AnthropicClient(cfg));
  }

  async generateTitles(imagePath: string): Promise<string[]> {
    this.log.info(`generating titles for ${imagePath}`);
    const reply = await this.client.complete([await imageBlock(imagePath), { type: 'text', text: TITLE_PROMPT }]);
    return parseTitles(reply);
  }

  async generateDescription(imagePath: string, input: DescriptionPromptInput): Promise<string> {
    this.log.info(`generating description for '${input.title}'`);
    const reply = await this.client.complete([await imageBlock(imagePath), { type: 'text', text: descriptionPrompt(input) }]);
    return reply.trim();
  }

  async generateSocialDescription(imagePath: string, title: string, maxChars = 200): Promise<string> {
    const reply = await this.client.complete([
      await imageBlock(imagePath),
      { type: 'text', text: socialDescriptionPrompt(title, maxChars) },
    ]);
    return clampChars(reply, maxChars);
  }

  async summarizeToShortDescription(text: string, maxChars = 200): Promise<string> {
    const reply = await this.client.complete([{ type: 'text', text: summaryPrompt(text, maxChars) }]);
    return clampChars(reply, maxChars);
  }
}
