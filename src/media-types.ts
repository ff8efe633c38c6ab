import path from 'node:path';
import mime from 'mime-types';

export type MediaCategory = 'video' | 'image' | 'other';

const VIDEO_TYPES: Readonly<Record<string, string>> = Object.freeze({
  '.mp4': 'video/mp4',
  '.m4v': 'video/mp4',
  '.avi': 'video/x-msvideo',
  '.mkv': 'video/x-matroska',
  '.mov': 'video/quicktime',
  '.wmv': 'video/x-ms-wmv',
  '.flv': 'video/x-flv',
  '.webm': 'video/webm',
  '.mpeg': 'video/mpeg',
  '.mpg': 'video/mpeg',
  '.3gp': 'video/3gpp',
  '.ogv': 'video/ogg'
});

const IMAGE_TYPES: Readonly<Record<string, string>> = Object.freeze({
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.bmp': 'image/bmp',
  '.svg': 'image/svg+xml',
  '.webp': 'image/webp',
  '.ico': 'image/x-icon'
});

const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

function extensionOf(name: string): string {
  return path.extname(name).toLowerCase();
}

export function classifyMedia(name: string): MediaCategory {
  const ext = extensionOf(name);
  if (Object.hasOwn(VIDEO_TYPES, ext)) {
    return 'video';
  }
  if (Object.hasOwn(IMAGE_TYPES, ext)) {
    return 'image';
  }
  return 'other';
}

export function contentTypeFor(name: string): string {
  const ext = extensionOf(name);
  const fixed = VIDEO_TYPES[ext] ?? IMAGE_TYPES[ext];
  if (fixed) {
    return fixed;
  }
  const looked = mime.lookup(name);
  if (!looked) {
    return FALLBACK_CONTENT_TYPE;
  }
  return mime.contentType(looked) || looked;
}
