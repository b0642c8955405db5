import { z } from 'zod';

export const REAL_PLATFORMS = ['mastodon', 'bluesky', 'pixelfed', 'flickr', 'tumblr', 'cara'] as const;
export const STUB_PLATFORMS = ['instagram', 'facebook', 'linkedin', 'tiktok', 'youtube', 'threads', 'upscrolled'] as const;
export const SOCIAL_PLATFORMS = [...REAL_PLATFORMS, ...STUB_PLATFORMS] as const;

export const GALLERIES = ['faso'] as const;

const fileRef = z.union([z.string(), z.array(z.string())]).nullable().default(null);

export const socialEntrySchema = z.object({
  last_posted: z.string().nullable().default(null),
  post_url: z.string().nullable().default(null),
  post_count: z.number().int().min(0).default(0),
});

export const galleryEntrySchema = z.object({
  last_uploaded: z.string().nullable().default(null),
  url: z.string().nullable().default(null),
});

export const dimensionsSchema = z
  .object({
    width: z.number().nullable().default(null),
    height: z.number().nullable().default(null),
    depth: z.number().nullable().default(null),
    unit: z.enum(['cm', 'in']).default('cm'),
    formatted: z.string().default(''),
  })
  .passthrough();

// Unknown keys survive a load/save round trip.
export const paintingSchema = z
  .object({
    filename_base: z.string().min(1),
    category: z.string().default(''),
    collection_folder: z.string().nullish(),
    files: z.object({ big: fileRef, instagram: fileRef }).passthrough().default({ big: null, instagram: null }),
    title: z
      .object({ selected: z.string(), all_options: z.array(z.string()).default([]) })
      .passthrough()
      .optional(),
    description: z.string().nullish(),
    short_description: z.string().nullish(),
    dimensions: dimensionsSchema.optional(),
    substrate: z.string().nullish(),
    medium: z.string().nullish(),
    subject: z.string().nullish(),
    style: z.string().nullish(),
    collection: z.string().nullish(),
    price_eur: z.number().nullish(),
    creation_date: z.string().nullish(),
    processed_date: z.string().nullish(),
    organized_date: z.string().nullish(),
    is_skeleton: z.boolean().optional(),
    analyzed_from: z.enum(['instagram', 'big']).nullish(),
    gallery_sites: z.record(galleryEntrySchema).default({}),
    social_media: z.record(socialEntrySchema).default({}),
  })
  .passthrough();

export type SocialTrackingEntry = z.infer<typeof socialEntrySchema>;
export type GalleryTrackingEntry = z.infer<typeof galleryEntrySchema>;
export type Dimensions = z.infer<typeof dimensionsSchema>;
export type PaintingRecord = z.infer<typeof paintingSchema>;

export interface Painting {
  path: string;
  record: PaintingRecord;
}

export const POST_STATUSES = ['pending', 'posted', 'cancelled', 'failed'] as const;
export type PostStatus = (typeof POST_STATUSES)[number];

export const scheduledPostSchema = z.object({
  id: z.string().min(1),
  content_type: z.literal('painting').default('painting'),
  content_id: z.string(),
  metadata_path: z.string(),
  platform: z.string(),
  scheduled_time: z.string(),
  status: z.enum(POST_STATUSES),
  post_url: z.string().nullable().default(null),
  error: z.string().nullable().default(null),
  created_at: z.string(),
});

export type ScheduledPost = z.infer<typeof scheduledPostSchema>;

export const scheduleDocumentSchema = z.object({
  scheduled_posts: z.array(z.unknown()).default([]),
});

export interface ScheduleDocument {
  scheduled_posts: unknown[];
}

export interface RoundsDocument {
  current_round: number;
}

export type PostResult =
  | { success: true; postUrl: string | null; error: null }
  | { success: false; postUrl: null; error: string };

export type UploadResult =
  | { success: true; url: string | null; error: null }
  | { success: false; url: null; error: string };
