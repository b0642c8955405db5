import { mkdirSync } from 'fs';
import { join } from 'path';
import type winston from 'winston';
import { createPlainFileLogger, logTimestamp } from './logger';

export type ActivitySource = 'user' | 'cron';

export function activitySource(isTTY: boolean | undefined = process.stdin.isTTY): ActivitySource {
  return isTTY ? 'user' : 'cron';
}

export function activityLine(action: string, source: ActivitySource, at: Date = new Date()) {
  return `[${logTimestamp(at)}] [${source}] ${action}`;
}

export class ActivityLog {
  private file: winston.Logger | null = null;

  constructor(private logsDir: string) {}

  record(action: string, source: ActivitySource = activitySource()) {
    if (!this.file) {
      mkdirSync(this.logsDir, { recursive: true });
      this.file = createPlainFileLogger(join(this.logsDir, 'activity.log'));
    }
    this.file.info(activityLine(action, source));
  }
}
