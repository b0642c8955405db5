import winston from 'winston';
import { mkdirSync } from 'fs';
import { join } from 'path';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const consoleFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  let msg = `${timestamp} [${level}]${component ? ` (${component})` : ''} ${message}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

export const logger = winston.createLogger({
  level: 'info',
  format: combine(errors({ stack: true }), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), consoleFormat),
    }),
  ],
});

export const loggers = {
  scheduler: logger.child({ component: 'scheduler' }),
  social: logger.child({ component: 'social' }),
  daily: logger.child({ component: 'daily' }),
  metadata: logger.child({ component: 'metadata' }),
  analyzer: logger.child({ component: 'analyzer' }),
  gallery: logger.child({ component: 'gallery' }),
  browser: logger.child({ component: 'browser' }),
};

let fileTransportDir: string | null = null;

// Adds app.log under the logs dir and applies LOG_LEVEL. Safe to call more than once.
export function configureLogging(opts: { level: string; logsDir: string }) {
  logger.level = opts.level;
  if (fileTransportDir === opts.logsDir) return;
  mkdirSync(opts.logsDir, { recursive: true });
  logger.add(
    new winston.transports.File({
      filename: join(opts.logsDir, 'app.log'),
      format: winston.format.json(),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
  fileTransportDir = opts.logsDir;
}

// Plain-text file logger: each message is written as-is.
export function createPlainFileLogger(filename: string): winston.Logger {
  return winston.createLogger({
    level: 'info',
    format: printf(({ message }) => String(message)),
    transports: [new winston.transports.File({ filename })],
  });
}

function pad(n: number) {
  return String(n).padStart(2, '0');
}

// Local "YYYY-MM-DD HH:MM:SS"
export function logTimestamp(d: Date = new Date()): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

