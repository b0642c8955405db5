import type { PaintingRecord, PostResult, SocialTrackingEntry, GalleryTrackingEntry, UploadResult } from '../models';

export function emptySocialEntry(): SocialTrackingEntry {
  return { last_posted: null, post_url: null, post_count: 0 };
}

export function emptyGalleryEntry(): GalleryTrackingEntry {
  return { last_uploaded: null, url: null };
}

export function socialEntry(record: PaintingRecord, platform: string): SocialTrackingEntry {
  return record.social_media[platform] ?? emptySocialEntry();
}

export function postCount(record: PaintingRecord, platform: string): number {
  return socialEntry(record, platform).post_count;
}

// The only place a post outcome reaches a record. Failures leave it as it was.
export function recordPostResult(record: PaintingRecord, platform: string, result: PostResult, now: Date = new Date()): PaintingRecord {
  if (!result.success) return record;
  const prev = socialEntry(record, platform);
  return {
    ...record,
    social_media: {
      ...record.social_media,
      [platform]: {
        ...prev,
        last_posted: now.toISOString(),
        post_url: result.postUrl,
        post_count: prev.post_count + 1,
      },
    },
  };
}

export function recordGalleryUpload(record: PaintingRecord, gallery: string, result: UploadResult, now: Date = new Date()): PaintingRecord {
  if (!result.success) return record;
  const prev = record.gallery_sites[gallery] ?? emptyGalleryEntry();
  return {
    ...record,
    gallery_sites: {
      ...record.gallery_sites,
      [gallery]: { ...prev, last_uploaded: now.toISOString(), url: result.url },
    },
  };
}

// Fills in a default entry for every listed platform and gallery that has none.
export function withTrackingDefaults(record: PaintingRecord, platforms: readonly string[], galleries: readonly string[]): PaintingRecord {
  const social_media = { ...record.social_media };
  for (const p of platforms) social_media[p] = social_media[p] ?? emptySocialEntry();
  const gallery_sites = { ...record.gallery_sites };
  for (const g of galleries) gallery_sites[g] = gallery_sites[g] ?? emptyGalleryEntry();
  return { ...record, social_media, gallery_sites };
}
