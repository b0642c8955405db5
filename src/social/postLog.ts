import { mkdirSync } from 'fs';
import { join } from 'path';
import type winston from 'winston';
import { createPlainFileLogger, logTimestamp } from '../logger';
import { recentScreenshots } from '../browser/profile';

// platforms posted through a browser; failures point at their screenshots
const BROWSER_PLATFORMS = new Set(['cara', 'instagram']);

export interface PostLogger {
  success(platform: string, title: string, imagePath: string | null, postUrl: string | null): void;
  failure(platform: string, title: string, imagePath: string | null, error: string): void;
  credentialFailure(platform: string): void;
}

export function successEntry(at: Date, platform: string, title: string, imagePath: string | null, postUrl: string | null): string {
  const img = imagePath ? `  image=${imagePath}` : '';
  const url = postUrl ? `  url=${postUrl}` : '';
  return `[${logTimestamp(at)}] SUCCESS  platform=${platform}  painting='${title}'${img}${url}`;
}

export function failureEntry(
  at: Date,
  platform: string,
  title: string,
  imagePath: string | null,
  error: string,
  screenshots: { dir: string; files: string[] } | null = null
): string {
  const img = imagePath ? `\n  image: ${imagePath}` : '';
  const lines = [`[${logTimestamp(at)}] FAILURE  platform=${platform}  painting='${title}'${img}`, `  error: ${error}`];
  if (screenshots && screenshots.files.length > 0) {
    lines.push(`  screenshots: ${screenshots.files.join(', ')}`);
    lines.push(`  screenshot dir: ${screenshots.dir}`);
  }
  return lines.join('\n');
}

export function credentialFailureEntry(at: Date, platform: string): string {
  return `[${logTimestamp(at)}] CREDENTIAL FAILURE  platform=${platform}  credentials invalid or missing`;
}

// logs/social.log, created on first entry
export class FilePostLog implements PostLogger {
  private file: winston.Logger | null = null;

  constructor(private logsDir: string, private screenshotsDir: string) {}

  private write(level: 'info' | 'warn' | 'error', entry: string) {
    if (!this.file) {
      mkdirSync(this.logsDir, { recursive: true });
      this.file = createPlainFileLogger(join(this.logsDir, 'social.log'));
    }
    this.file.log(level, entry);
  }

  success(platform: string, title: string, imagePath: string | null, postUrl: string | null) {
    this.write('info', successEntry(new Date(), platform, title, imagePath, postUrl));
  }

  failure(platform: string, title: string, imagePath: string | null, error: string) {
    const shots = BROWSER_PLATFORMS.has(platform)
      ? { dir: this.screenshotsDir, files: recentScreenshots(this.screenshotsDir, platform) }
      : null;
    this.write('error', failureEntry(new Date(), platform, title, imagePath, error, shots));
  }

  credentialFailure(platform: string) {
    this.write('warn', credentialFailureEntry(new Date(), platform));
  }
}
