/**
 * Media type helpers shared by the feed codecs
 */

import type { CanonicalObject, ObjectType } from '../schemas/index.js';

const MIME_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  mp4: 'video/mp4',
  mov: 'video/quicktime',
  webm: 'video/webm',
  mp3: 'audio/mpeg',
  m4a: 'audio/mp4',
  ogg: 'audio/ogg',
  wav: 'audio/wav',
};

const FALLBACK_TYPES: Partial<Record<ObjectType, string>> = {
  image: 'image/jpeg',
  video: 'video/mp4',
  audio: 'audio/mpeg',
};

/**
 * Guess a MIME type from a URL's file extension
 */
export function guessMimeType(url: string, objectType?: ObjectType): string | undefined {
  const path = url.split(/[?#]/)[0] ?? url;
  const extension = /\.([a-z0-9]+)$/i.exec(path)?.[1]?.toLowerCase();
  return (extension && MIME_TYPES[extension]) || (objectType ? FALLBACK_TYPES[objectType] : undefined);
}

/**
 * Object type of a media MIME type
 */
export function mediaObjectType(mimeType: string | undefined): ObjectType | undefined {
  const family = mimeType?.split('/')[0];
  return family === 'image' || family === 'video' || family === 'audio' ? family : undefined;
}

/**
 * URL of an attachment's media: the image for images, the stream otherwise
 */
export function mediaUrl(attachment: CanonicalObject): string | undefined {
  return attachment.objectType === 'image'
    ? attachment.image ?? attachment.url
    : attachment.stream ?? attachment.url;
}
