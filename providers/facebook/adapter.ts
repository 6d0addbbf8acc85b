/**
 * Facebook adapter
 *
 * Normalizes Graph API feed payloads (`{ data, paging, summary }`). Paging is
 * native: the caller passes offset and limit to the Graph API and the
 * returned page is used as is.
 */

import type { Activity, Actor, Capability, CanonicalObject, SourceId, Tag } from '../../schemas/index.js';
import { createActivity, createActor } from '../../schemas/index.js';
import type { SourceAdapter } from '../../normalizers/types.js';
import { mapSourceType } from '../../normalizers/mappings.js';
import { normalizeBatch, parsePayload } from '../../normalizers/batch.js';
import { utf16ToCodepointIndex } from '../../normalizers/offsets.js';
import { firstNativeId, nativeId, tagUri } from '../../normalizers/utils.js';
import {
  AuthError,
  EncodingError,
  NotFoundError,
  RateLimitError,
  UpstreamFormatError,
  unsupported,
} from '../../src/errors.js';
import type { UpstreamError } from '../../src/errors.js';
import type { FacebookMessageTag, FacebookPost, FacebookProfile, FacebookWriteRequest } from './types.js';
import {
  FacebookFeedSchema,
  FacebookPostSchema,
  FacebookProfileSchema,
  GRAPH_AUTH_ERROR_CODES,
  GRAPH_NOT_FOUND_ERROR_CODES,
  GRAPH_PERMISSION_ERROR_CODES,
  GRAPH_RATE_LIMIT_ERROR_CODES,
  GraphErrorSchema,
} from './types.js';

export const FACEBOOK_DOMAIN = 'facebook.com';
const BASE_URL = 'https://www.facebook.com';

const RSVP_ENDPOINTS: Partial<Record<Activity['verb'], string>> = {
  'rsvp-yes': 'attending',
  'rsvp-no': 'declined',
  'rsvp-maybe': 'maybe',
  'rsvp-interested': 'interested',
};

/**
 * Recognize a Graph API error body. Shared with Instagram, which uses the
 * same Graph API.
 */
export function detectGraphError(source: SourceId, raw: unknown): UpstreamError | null {
  const parsed = GraphErrorSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const { message, type, code } = parsed.data.error;
  const text = `${source} error${code ? ` ${code}` : ''}: ${message}`;

  if (code && GRAPH_RATE_LIMIT_ERROR_CODES.has(code)) {
    return new RateLimitError(text, 429);
  }
  if (code && GRAPH_PERMISSION_ERROR_CODES.has(code)) {
    return new AuthError(text, 403);
  }
  if (code && GRAPH_NOT_FOUND_ERROR_CODES.has(code)) {
    return new NotFoundError(text);
  }
  if (type === 'OAuthException' || (code && GRAPH_AUTH_ERROR_CODES.has(code))) {
    return new AuthError(text, 401);
  }
  return null;
}

/**
 * Map a Facebook user or page to a canonical actor
 */
export function normalizeFacebookProfile(profile: FacebookProfile): Actor {
  return {
    id: tagUri(FACEBOOK_DOMAIN, profile.id),
    username: profile.username ?? undefined,
    displayName: profile.name ?? undefined,
    description: profile.about ?? undefined,
    url: profile.link ?? `${BASE_URL}/${profile.id}`,
    image: profile.picture?.data.url,
  };
}

/**
 * Convert message tags from UTF-16 offsets to code point offsets. A tag whose
 * range does not fall on code point boundaries keeps no offsets.
 */
export function messageTagsToTags(message: string, messageTags: FacebookMessageTag[]): Tag[] {
  return messageTags.map((tag): Tag => {
    const start = utf16ToCodepointIndex(message, tag.offset);
    const end = utf16ToCodepointIndex(message, tag.offset + tag.length);
    const positioned = start !== null && end !== null && end >= start ? { startIndex: start, length: end - start } : {};
    return {
      objectType: 'mention',
      displayName: tag.name,
      url: `${BASE_URL}/${tag.id}`,
      ...positioned,
    };
  });
}

function postKind(post: FacebookPost): string {
  return post.type ?? (post.parent ? 'comment' : 'status');
}

function postUrl(post: FacebookPost, kind: string): string {
  if (post.permalink_url) {
    return post.permalink_url;
  }
  const [owner, item] = post.id.split('_');
  if (!item) {
    return `${BASE_URL}/${post.id}`;
  }
  return kind === 'comment' ? `${BASE_URL}/${owner}?comment_id=${item}` : `${BASE_URL}/${owner}/posts/${item}`;
}

function postAttachments(post: FacebookPost, kind: string): CanonicalObject[] {
  const picture = post.full_picture ?? post.picture ?? undefined;

  switch (kind) {
    case 'link':
      return post.link
        ? [
            {
              objectType: 'article',
              url: post.link,
              displayName: post.name ?? undefined,
              summary: post.description ?? undefined,
              image: picture,
            },
          ]
        : [];
    case 'photo':
      return picture ? [{ objectType: 'image', image: picture }] : [];
    case 'video':
      return post.source ? [{ objectType: 'video', stream: post.source, image: picture }] : [];
    default:
      return [];
  }
}

/**
 * Map a Graph API post or comment to a canonical object
 */
export function postToObject(post: FacebookPost): CanonicalObject {
  const kind = postKind(post);
  const mapping = mapSourceType('facebook', kind);
  if (!mapping) {
    throw new UpstreamFormatError(`Unrecognized facebook post type: ${kind}`, 'facebook');
  }

  const message = post.message ?? '';
  const parentId = post.parent?.id ?? post.id.split('_')[0];

  return {
    objectType: mapping.objectType,
    id: tagUri(FACEBOOK_DOMAIN, post.id),
    url: postUrl(post, kind),
    content: message,
    published: post.created_time,
    updated: post.updated_time ?? undefined,
    tags: messageTagsToTags(message, post.message_tags ?? []),
    attachments: postAttachments(post, kind),
    inReplyTo: kind === 'comment' ? [{ id: tagUri(FACEBOOK_DOMAIN, parentId) }] : undefined,
    location: post.place
      ? {
          displayName: post.place.name ?? undefined,
          url: `${BASE_URL}/${post.place.id}`,
          latitude: post.place.location?.latitude ?? undefined,
          longitude: post.place.location?.longitude ?? undefined,
        }
      : undefined,
  };
}

/**
 * Map a Graph API post to a canonical activity
 */
export function postToActivity(post: FacebookPost): Activity {
  const object = postToObject(post);
  const mapping = mapSourceType('facebook', postKind(post));

  return createActivity({
    verb: mapping?.verb ?? 'post',
    id: object.id,
    url: object.url,
    published: object.published,
    updated: object.updated,
    actor: normalizeFacebookProfile(post.from),
    object,
    generator: post.application
      ? { displayName: post.application.name, url: post.application.link ?? undefined }
      : undefined,
  });
}

function requireObjectId(activity: Activity, what: string): string {
  const id = nativeId(FACEBOOK_DOMAIN, activity.object);
  if (!id) {
    throw new EncodingError(`facebook ${what} needs an object with an id or url`);
  }
  return id;
}

/**
 * Map a canonical activity to a Graph API write request
 */
export function activityToFacebookRequest(activity: Activity): FacebookWriteRequest {
  const { object } = activity;

  if (activity.verb === 'post') {
    if (!object.content) {
      throw new EncodingError('facebook posts need a message');
    }
    const replyTo = firstNativeId(FACEBOOK_DOMAIN, object.inReplyTo);
    if (object.objectType === 'comment' && replyTo) {
      return {
        source: 'facebook',
        method: 'POST',
        endpoint: `${replyTo}/comments`,
        body: { message: object.content },
      };
    }
    const link = object.attachments?.find((attachment) => attachment.objectType === 'article')?.url;
    return {
      source: 'facebook',
      method: 'POST',
      endpoint: 'me/feed',
      body: { message: object.content, ...(link ? { link } : {}) },
    };
  }

  if (activity.verb === 'like') {
    const id = requireObjectId(activity, 'likes');
    return { source: 'facebook', method: 'POST', endpoint: `${id}/likes`, body: {} };
  }

  const rsvp = RSVP_ENDPOINTS[activity.verb];
  if (rsvp) {
    const id = requireObjectId(activity, 'RSVPs');
    return { source: 'facebook', method: 'POST', endpoint: `${id}/${rsvp}`, body: {} };
  }

  return unsupported('facebook', `writing ${activity.verb} activities`);
}

/**
 * Create the Facebook adapter
 */
export function createFacebookAdapter(): SourceAdapter<FacebookWriteRequest> {
  return {
    source: 'facebook',
    domain: FACEBOOK_DOMAIN,
    capabilities: new Set<Capability>(['paging', 'write']),

    normalize(raw) {
      const error = detectGraphError('facebook', raw);
      if (error) {
        throw error;
      }
      const feed = parsePayload('facebook', FacebookFeedSchema, raw, 'feed');
      return normalizeBatch('facebook', feed.data, FacebookPostSchema, postToActivity);
    },

    normalizeActor(raw) {
      const error = detectGraphError('facebook', raw);
      if (error) {
        throw error;
      }
      return createActor(normalizeFacebookProfile(parsePayload('facebook', FacebookProfileSchema, raw, 'profile')));
    },

    denormalize: activityToFacebookRequest,

    detectError(raw) {
      return detectGraphError('facebook', raw);
    },

    totalResults(raw) {
      const feed = FacebookFeedSchema.safeParse(raw);
      return feed.success ? feed.data.summary?.total_count : undefined;
    },
  };
}
