import type { PostResult } from '../models';
import { SocialPoster, fail } from './platform';

// Platforms listed for completeness; posting is not wired up yet and does no I/O.
export class StubPoster implements SocialPoster {
  readonly kind = 'stub' as const;

  constructor(readonly name: string, readonly displayName: string, readonly maxTextLength: number) {}

  isConfigured() {
    return false;
  }

  async verifyCredentials() {
    return false;
  }

  async postImage(): Promise<PostResult> {
    return fail(`${this.displayName} integration not yet implemented`);
  }
}

export const STUB_DEFINITIONS: ReadonlyArray<[name: string, displayName: string, maxTextLength: number]> = [
  ['instagram', 'Instagram', 2200],
  ['facebook', 'Facebook', 63206],
  ['linkedin', 'LinkedIn', 3000],
  ['tiktok', 'TikTok', 2200],
  ['youtube', 'YouTube', 5000],
  ['threads', 'Threads', 500],
  ['upscrolled', 'UpScrolled', 2000],
];
