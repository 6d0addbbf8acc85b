/**
 * Instagram adapter
 *
 * Normalizes Graph API media lists. Instagram reports no entity offsets, so
 * hashtags and mentions are found in the caption text.
 */

import type { Activity, Actor, CanonicalObject, Capability, Tag } from '../../schemas/index.js';
import { createActivity, createActor } from '../../schemas/index.js';
import type { SourceAdapter } from '../../normalizers/types.js';
import { mapSourceType } from '../../normalizers/mappings.js';
import { normalizeBatch, parsePayload } from '../../normalizers/batch.js';
import { codepointLength } from '../../normalizers/offsets.js';
import { tagUri } from '../../normalizers/utils.js';
import { UpstreamFormatError, unsupported } from '../../src/errors.js';
import { detectGraphError } from '../facebook/adapter.js';
import type { InstagramChild, InstagramMedia, InstagramUser } from './types.js';
import { InstagramMediaListSchema, InstagramMediaSchema, InstagramUserSchema } from './types.js';

export const INSTAGRAM_DOMAIN = 'instagram.com';
const BASE_URL = 'https://www.instagram.com';

const HASHTAG_REGEX = /(?<![\p{L}\p{N}_])#([\p{L}\p{N}_]+)/gu;
const MENTION_REGEX = /(?<![\p{L}\p{N}_.])@([A-Za-z0-9_](?:[A-Za-z0-9_.]*[A-Za-z0-9_])?)/gu;

function profileUrl(username: string): string {
  return `${BASE_URL}/${username}/`;
}

/**
 * Find hashtags and mentions in a caption, in text order
 */
export function captionTags(caption: string): Tag[] {
  const found: Tag[] = [];

  const collect = (regex: RegExp, build: (name: string) => Omit<Tag, 'startIndex' | 'length'>) => {
    for (const match of caption.matchAll(regex)) {
      const index = match.index ?? 0;
      found.push({
        ...build(match[1]),
        startIndex: codepointLength(caption.slice(0, index)),
        length: codepointLength(match[0]),
      });
    }
  };

  collect(HASHTAG_REGEX, (name) => ({
    objectType: 'hashtag',
    displayName: name,
    url: `${BASE_URL}/explore/tags/${encodeURIComponent(name)}/`,
  }));
  collect(MENTION_REGEX, (name) => ({
    objectType: 'mention',
    displayName: name,
    url: profileUrl(name),
  }));

  return found.sort((a, b) => (a.startIndex ?? 0) - (b.startIndex ?? 0));
}

function mediaToAttachment(media: InstagramChild | InstagramMedia): CanonicalObject | undefined {
  if (media.media_type === 'VIDEO' && media.media_url) {
    return { objectType: 'video', stream: media.media_url, image: media.thumbnail_url ?? undefined };
  }
  if (media.media_type === 'IMAGE' && media.media_url) {
    return { objectType: 'image', image: media.media_url };
  }
  return undefined;
}

/**
 * Map an Instagram user to a canonical actor
 */
export function normalizeInstagramUser(user: InstagramUser): Actor {
  return {
    id: tagUri(INSTAGRAM_DOMAIN, user.username),
    username: user.username,
    displayName: user.name ?? undefined,
    description: user.biography ?? undefined,
    url: profileUrl(user.username),
    image: user.profile_picture_url ?? undefined,
  };
}

/**
 * Map an Instagram media item to a canonical activity
 */
export function mediaToActivity(media: InstagramMedia): Activity {
  const mapping = mapSourceType('instagram', media.media_type);
  if (!mapping) {
    throw new UpstreamFormatError(`Unrecognized instagram media type: ${media.media_type}`, 'instagram');
  }

  const caption = media.caption ?? '';
  const items: Array<InstagramChild | InstagramMedia> =
    media.media_type === 'CAROUSEL_ALBUM' ? media.children?.data ?? [] : [media];
  const attachments = items
    .map(mediaToAttachment)
    .filter((attachment): attachment is CanonicalObject => attachment !== undefined);

  const object: CanonicalObject = {
    objectType: mapping.objectType,
    id: tagUri(INSTAGRAM_DOMAIN, media.id),
    url: media.permalink ?? undefined,
    content: caption,
    published: media.timestamp,
    tags: captionTags(caption),
    attachments,
  };

  return createActivity({
    verb: mapping.verb,
    id: object.id,
    url: object.url,
    published: object.published,
    actor: {
      id: tagUri(INSTAGRAM_DOMAIN, media.username),
      username: media.username,
      url: profileUrl(media.username),
    },
    object,
  });
}

/**
 * Create the Instagram adapter
 */
export function createInstagramAdapter(): SourceAdapter {
  return {
    source: 'instagram',
    domain: INSTAGRAM_DOMAIN,
    capabilities: new Set<Capability>(),

    normalize(raw) {
      const error = detectGraphError('instagram', raw);
      if (error) {
        throw error;
      }
      const list = parsePayload('instagram', InstagramMediaListSchema, raw, 'media list');
      return normalizeBatch('instagram', list.data, InstagramMediaSchema, mediaToActivity);
    },

    normalizeActor(raw) {
      const error = detectGraphError('instagram', raw);
      if (error) {
        throw error;
      }
      return createActor(normalizeInstagramUser(parsePayload('instagram', InstagramUserSchema, raw, 'user')));
    },

    denormalize(activity) {
      return unsupported('instagram', `writing ${activity.verb} activities`);
    },

    detectError(raw) {
      return detectGraphError('instagram', raw);
    },

    totalResults() {
      return undefined;
    },
  };
}
