import type { PaintingRecord } from '../models';

const BASE_TAGS = ['#art', '#artforsale'];

// Plain text of at most maxWords words; markdown emphasis removed.
export function truncateDescription(text: string | null | undefined, maxWords = 75): string {
  if (!text) return '';
  const plain = text.replace(/\*{1,2}(.+?)\*{1,2}/g, '$1').replace(/\s+/g, ' ').trim();
  const words = plain.split(' ').filter(Boolean);
  if (words.length <= maxWords) return plain;
  return words.slice(0, maxWords).join(' ') + '...';
}

export function subjectToHashtag(subject: string | null | undefined): string {
  if (!subject) return '';
  const tag = subject.replace(/[^a-zA-Z0-9]/g, '').toLowerCase();
  return tag ? `#${tag}` : '';
}

export function buildHashtags(subject: string | null | undefined): string {
  const tags = [...BASE_TAGS];
  const tag = subjectToHashtag(subject);
  if (tag && !tags.includes(tag)) tags.push(tag);
  return tags.join(' ');
}

export interface FormatOptions {
  websiteUrl: string;
  maxWords?: number;
  // replaces record.description, e.g. a cached short description
  description?: string | null;
}

export function formatPostText(record: PaintingRecord, opts: FormatOptions): string {
  const title = record.title?.selected || 'Untitled';
  const desc = truncateDescription(opts.description !== undefined ? opts.description : record.description, opts.maxWords ?? 75);
  const parts = [title];
  if (desc) parts.push(desc);
  parts.push(`${buildHashtags(record.subject)}\n${opts.websiteUrl}`);
  return parts.join('\n\n');
}
