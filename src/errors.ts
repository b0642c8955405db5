export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, public readonly fields: string[] = []) {
    super(message);
  }
}

export class ScheduleStoreError extends AppError {}

export class ScheduledPostNotFoundError extends AppError {
  constructor(public readonly postId: string) {
    super(`Scheduled post not found: ${postId}`);
  }
}

// Raised when a terminal scheduled post is asked to transition again.
export class InvalidTransitionError extends AppError {
  constructor(public readonly postId: string, public readonly from: string, public readonly to: string) {
    super(`Cannot mark scheduled post ${postId} as ${to}: it is already ${from}`);
  }
}

export class UnknownPlatformError extends AppError {
  constructor(public readonly platform: string) {
    super(`Unknown platform: ${platform}`);
  }
}

export class PaintingNotFoundError extends AppError {
  constructor(public readonly path: string) {
    super(`Metadata not found: ${path}`);
  }
}

// A record already lives at the path a new one would take.
export class PaintingExistsError extends AppError {
  constructor(public readonly path: string) {
    super(`Metadata already exists: ${path}`);
  }
}

export class InvalidPaintingRecordError extends AppError {
  constructor(public readonly path: string, detail: string) {
    super(`Invalid painting record ${path}: ${detail}`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
