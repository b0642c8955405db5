import type { Painting, PaintingRecord, UploadResult } from '../models';

export interface GalleryUploader {
  readonly name: string;
  readonly displayName: string;
  isConfigured(): boolean;
  uploadArtwork(record: PaintingRecord, imagePath: string): Promise<UploadResult>;
  close(): Promise<void>;
}

export function uploaded(url: string | null): UploadResult {
  return { success: true, url, error: null };
}

export function uploadFailed(error: string): UploadResult {
  return { success: false, url: null, error };
}

export function pendingGalleryUploads(paintings: Painting[], gallery: string): Painting[] {
  return paintings.filter((p) => !p.record.gallery_sites[gallery]?.last_uploaded);
}
