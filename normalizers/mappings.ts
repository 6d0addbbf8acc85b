/**
 * Type mapping tables for each source
 *
 * These tables document and enforce the mapping from source-specific
 * item kinds to the canonical verb and object type. An item whose kind is
 * not listed is skipped as an unrecognized item.
 */

import type { SourceId } from '../schemas/index.js';
import type { SourceTypeMapping, TypeMappingEntry } from './types.js';

/**
 * Twitter type mappings
 */
export const TWITTER_TYPE_MAPPINGS: TypeMappingEntry[] = [
  { source: 'tweet', verb: 'post', objectType: 'note', description: 'Original tweet' },
  { source: 'reply', verb: 'post', objectType: 'comment', description: 'Tweet with in_reply_to_status_id' },
  { source: 'quote', verb: 'post', objectType: 'note', description: 'Quote tweet; quoted tweet becomes an attachment' },
  { source: 'retweet', verb: 'share', objectType: 'note', description: 'Retweet; object is the retweeted tweet' },
];

/**
 * Facebook type mappings, keyed by the post `type` field
 */
export const FACEBOOK_TYPE_MAPPINGS: TypeMappingEntry[] = [
  { source: 'status', verb: 'post', objectType: 'note', description: 'Status update' },
  { source: 'link', verb: 'post', objectType: 'note', description: 'Shared link; link becomes an article attachment' },
  { source: 'photo', verb: 'post', objectType: 'note', description: 'Photo post; photo becomes an image attachment' },
  { source: 'video', verb: 'post', objectType: 'note', description: 'Video post; video becomes a video attachment' },
  { source: 'comment', verb: 'post', objectType: 'comment', description: 'Comment on a post' },
];

/**
 * Instagram type mappings, keyed by `media_type`
 */
export const INSTAGRAM_TYPE_MAPPINGS: TypeMappingEntry[] = [
  { source: 'IMAGE', verb: 'post', objectType: 'note', description: 'Single photo' },
  { source: 'VIDEO', verb: 'post', objectType: 'note', description: 'Single video' },
  { source: 'CAROUSEL_ALBUM', verb: 'post', objectType: 'note', description: 'Album; children become attachments' },
];

/**
 * Mastodon type mappings
 */
export const MASTODON_TYPE_MAPPINGS: TypeMappingEntry[] = [
  { source: 'status', verb: 'post', objectType: 'note', description: 'Status' },
  { source: 'reply', verb: 'post', objectType: 'comment', description: 'Status with in_reply_to_id' },
  { source: 'reblog', verb: 'share', objectType: 'note', description: 'Boost; object is the boosted status' },
];

/**
 * Bluesky type mappings
 */
export const BLUESKY_TYPE_MAPPINGS: TypeMappingEntry[] = [
  { source: 'post', verb: 'post', objectType: 'note', description: 'app.bsky.feed.post' },
  { source: 'reply', verb: 'post', objectType: 'comment', description: 'Post with a reply ref' },
  { source: 'repost', verb: 'share', objectType: 'note', description: 'Feed item with a repost reason' },
];

/**
 * All source type mappings
 */
export const SOURCE_TYPE_MAPPINGS: SourceTypeMapping[] = [
  { source: 'twitter', mappings: TWITTER_TYPE_MAPPINGS },
  { source: 'facebook', mappings: FACEBOOK_TYPE_MAPPINGS },
  { source: 'instagram', mappings: INSTAGRAM_TYPE_MAPPINGS },
  { source: 'mastodon', mappings: MASTODON_TYPE_MAPPINGS },
  { source: 'bluesky', mappings: BLUESKY_TYPE_MAPPINGS },
];

/**
 * Get type mappings for a source
 */
export function getSourceTypeMappings(source: SourceId): TypeMappingEntry[] {
  const mapping = SOURCE_TYPE_MAPPINGS.find((m) => m.source === source);
  return mapping?.mappings ?? [];
}

/**
 * Get the mapping for a source item kind
 */
export function mapSourceType(source: SourceId, sourceType: string): TypeMappingEntry | null {
  const mappings = getSourceTypeMappings(source);
  return mappings.find((m) => m.source === sourceType) ?? null;
}
