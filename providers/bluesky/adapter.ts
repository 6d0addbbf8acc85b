/**
 * Bluesky adapter
 *
 * Normalizes feed and search payloads of the AppView API. Facets carry UTF-8
 * byte ranges; they are converted to code point offsets, and back again when
 * building a post record.
 */

import type { Activity, Actor, Capability, CanonicalObject, ObjectReference, Tag } from '../../schemas/index.js';
import { createActivity, createActor } from '../../schemas/index.js';
import type { SourceAdapter } from '../../normalizers/types.js';
import { mapSourceType } from '../../normalizers/mappings.js';
import { normalizeBatch, parsePayload } from '../../normalizers/batch.js';
import {
  codepointToUtf8ByteOffset,
  sliceCodepoints,
  utf8ByteToCodepointIndex,
} from '../../normalizers/offsets.js';
import { isUrlOnHost } from '../../normalizers/utils.js';
import {
  AuthError,
  EncodingError,
  NotFoundError,
  RateLimitError,
  UpstreamFormatError,
  unsupported,
} from '../../src/errors.js';
import type { UpstreamError } from '../../src/errors.js';
import type {
  BlueskyEmbedView,
  BlueskyFacet,
  BlueskyFacetWrite,
  BlueskyFeedViewPost,
  BlueskyPostView,
  BlueskyProfile,
  BlueskyStrongRefWrite,
  BlueskyWriteRequest,
} from './types.js';
import {
  BLUESKY_AUTH_ERRORS,
  BLUESKY_NOT_FOUND_ERRORS,
  BLUESKY_RATE_LIMIT_ERRORS,
  BlueskyEmbedViewSchema,
  BlueskyErrorSchema,
  BlueskyFacetFeatureSchema,
  BlueskyFeedSchema,
  BlueskyFeedViewPostSchema,
  BlueskyProfileSchema,
} from './types.js';

export interface BlueskyAdapterOptions {
  /** Host of the web app that profile and post URLs point at */
  appHost: string;
}

const AT_URI_REGEX = /^at:\/\/([^/]+)\/([^/]+)\/([^/]+)$/;
const POST_URL_REGEX = /\/profile\/([^/]+)\/post\/([^/]+)$/;
const PROFILE_DID_REGEX = /\/profile\/(did:[^/]+)$/;

/**
 * Web URL of a post's at:// URI, or undefined for other record types
 */
export function atUriToWebUrl(uri: string, appHost: string): string | undefined {
  const match = AT_URI_REGEX.exec(uri);
  if (!match || match[2] !== 'app.bsky.feed.post') {
    return undefined;
  }
  return `https://${appHost}/profile/${match[1]}/post/${match[3]}`;
}

/**
 * at:// URI of a referenced post, from its id or its web URL on the app host
 */
export function postAtUri(ref: { id?: string; url?: string } | undefined, appHost: string): string | undefined {
  if (ref?.id?.startsWith('at://')) {
    return ref.id;
  }
  const match = ref?.url && isUrlOnHost(ref.url, [appHost]) ? POST_URL_REGEX.exec(new URL(ref.url).pathname) : null;
  return match ? `at://${match[1]}/app.bsky.feed.post/${match[2]}` : undefined;
}

function strongRef(uri: string): BlueskyStrongRefWrite {
  return { uri, cid: '' };
}

/**
 * Convert facets to tags. A facet whose byte range does not fall on code
 * point boundaries keeps its tag without offsets.
 */
export function facetsToTags(text: string, facets: BlueskyFacet[], appHost: string): Tag[] {
  const tags: Tag[] = [];

  for (const facet of facets) {
    const start = utf8ByteToCodepointIndex(text, facet.index.byteStart);
    const end = utf8ByteToCodepointIndex(text, facet.index.byteEnd);
    const valid = start !== null && end !== null && end >= start;
    const positioned = valid ? { startIndex: start, length: end - start } : {};
    const covered = valid ? sliceCodepoints(text, start, end) : undefined;

    for (const raw of facet.features) {
      const feature = BlueskyFacetFeatureSchema.safeParse(raw);
      if (!feature.success) {
        continue;
      }
      switch (feature.data.$type) {
        case 'app.bsky.richtext.facet#mention':
          tags.push({
            objectType: 'mention',
            url: `https://${appHost}/profile/${feature.data.did}`,
            displayName: covered ?? feature.data.did,
            ...positioned,
          });
          break;
        case 'app.bsky.richtext.facet#link':
          tags.push({
            objectType: 'article',
            url: feature.data.uri,
            displayName: covered ?? feature.data.uri,
            ...positioned,
          });
          break;
        case 'app.bsky.richtext.facet#tag':
          tags.push({
            objectType: 'hashtag',
            url: `https://${appHost}/hashtag/${encodeURIComponent(feature.data.tag)}`,
            displayName: feature.data.tag,
            ...positioned,
          });
          break;
      }
    }
  }

  return tags;
}

/**
 * Convert positioned tags back to facets with UTF-8 byte ranges
 */
export function tagsToFacets(text: string, tags: Tag[]): BlueskyFacetWrite[] {
  const facets: BlueskyFacetWrite[] = [];

  for (const tag of tags) {
    if (tag.startIndex === undefined || tag.length === undefined) {
      continue;
    }
    const index = {
      byteStart: codepointToUtf8ByteOffset(text, tag.startIndex),
      byteEnd: codepointToUtf8ByteOffset(text, tag.startIndex + tag.length),
    };

    if (tag.objectType === 'mention') {
      const did = tag.url ? PROFILE_DID_REGEX.exec(new URL(tag.url).pathname)?.[1] : undefined;
      if (did) {
        facets.push({ index, features: [{ $type: 'app.bsky.richtext.facet#mention', did }] });
      }
    } else if (tag.objectType === 'article') {
      if (tag.url) {
        facets.push({ index, features: [{ $type: 'app.bsky.richtext.facet#link', uri: tag.url }] });
      }
    } else {
      const name = (tag.displayName ?? sliceCodepoints(text, tag.startIndex, tag.startIndex + tag.length)).replace(/^#/, '');
      facets.push({ index, features: [{ $type: 'app.bsky.richtext.facet#tag', tag: name }] });
    }
  }

  return facets;
}

/**
 * Create a Bluesky adapter
 */
export function createBlueskyAdapter(options: BlueskyAdapterOptions): SourceAdapter<BlueskyWriteRequest> {
  const { appHost } = options;

  const normalizeProfile = (profile: BlueskyProfile): Actor => ({
    id: profile.did,
    username: profile.handle,
    displayName: profile.displayName ?? undefined,
    description: profile.description ?? undefined,
    url: `https://${appHost}/profile/${profile.handle}`,
    image: profile.avatar ?? undefined,
  });

  const embedAttachments = (embed: BlueskyEmbedView): CanonicalObject[] => {
    switch (embed.$type) {
      case 'app.bsky.embed.images#view':
        return embed.images.map((image): CanonicalObject => ({
          objectType: 'image',
          image: image.fullsize,
          displayName: image.alt ?? undefined,
        }));
      case 'app.bsky.embed.external#view':
        return [
          {
            objectType: 'article',
            url: embed.external.uri,
            displayName: embed.external.title ?? undefined,
            summary: embed.external.description ?? undefined,
            image: embed.external.thumb ?? undefined,
          },
        ];
      case 'app.bsky.embed.record#view': {
        const { record } = embed;
        if (!('value' in record)) {
          return [];
        }
        return [
          {
            objectType: 'note',
            id: record.uri,
            url: atUriToWebUrl(record.uri, appHost),
            content: record.value.text,
            published: record.value.createdAt,
            author: normalizeProfile(record.author),
            tags: facetsToTags(record.value.text, record.value.facets ?? [], appHost),
          },
        ];
      }
      case 'app.bsky.embed.recordWithMedia#view':
        return [...embedAttachments(embed.media), ...embedAttachments(embed.record)];
    }
  };

  const postToObject = (view: BlueskyPostView, withAuthor: boolean): CanonicalObject => {
    const { record } = view;
    const embed = view.embed === undefined ? undefined : BlueskyEmbedViewSchema.safeParse(view.embed);
    const parent = record.reply?.parent;
    const inReplyTo: ObjectReference[] | undefined = parent
      ? [{ id: parent.uri, url: atUriToWebUrl(parent.uri, appHost) }]
      : undefined;

    return {
      objectType: mapSourceType('bluesky', record.reply ? 'reply' : 'post')?.objectType ?? 'note',
      id: view.uri,
      url: atUriToWebUrl(view.uri, appHost),
      content: record.text,
      published: record.createdAt,
      author: withAuthor ? normalizeProfile(view.author) : undefined,
      tags: facetsToTags(record.text, record.facets ?? [], appHost),
      attachments: embed?.success ? embedAttachments(embed.data) : undefined,
      inReplyTo,
    };
  };

  const feedItemToActivity = (item: BlueskyFeedViewPost): Activity => {
    const kind = item.reason ? 'repost' : item.post.record.reply ? 'reply' : 'post';
    const mapping = mapSourceType('bluesky', kind);
    if (!mapping) {
      throw new UpstreamFormatError(`Unrecognized bluesky item kind: ${kind}`, 'bluesky');
    }

    if (item.reason) {
      return createActivity({
        verb: mapping.verb,
        published: item.reason.indexedAt,
        actor: normalizeProfile(item.reason.by),
        object: postToObject(item.post, true),
      });
    }

    const object = postToObject(item.post, false);
    return createActivity({
      verb: mapping.verb,
      id: object.id,
      url: object.url,
      published: object.published,
      actor: normalizeProfile(item.post.author),
      object,
    });
  };

  const detectError = (raw: unknown): UpstreamError | null => {
    const parsed = BlueskyErrorSchema.safeParse(raw);
    if (!parsed.success) {
      return null;
    }
    const { error, message } = parsed.data;
    const text = `bluesky ${error}${message ? `: ${message}` : ''}`;
    if (BLUESKY_AUTH_ERRORS.has(error)) {
      return new AuthError(text, 401);
    }
    if (BLUESKY_RATE_LIMIT_ERRORS.has(error)) {
      return new RateLimitError(text, 429);
    }
    if (BLUESKY_NOT_FOUND_ERRORS.has(error)) {
      return new NotFoundError(text);
    }
    return null;
  };

  const denormalize = (activity: Activity): BlueskyWriteRequest => {
    const { object } = activity;
    const createdAt = activity.published ?? object.published ?? new Date().toISOString();

    switch (activity.verb) {
      case 'post': {
        if (!object.content) {
          throw new EncodingError('bluesky posts need text content');
        }
        const facets = tagsToFacets(object.content, object.tags ?? []);
        const parent = (object.inReplyTo ?? [])
          .map((ref) => postAtUri(ref, appHost))
          .find((uri) => uri !== undefined);
        return {
          source: 'bluesky',
          method: 'POST',
          endpoint: 'com.atproto.repo.createRecord',
          body: {
            collection: 'app.bsky.feed.post',
            record: {
              $type: 'app.bsky.feed.post',
              text: object.content,
              createdAt,
              ...(facets.length > 0 ? { facets } : {}),
              // The thread root is only known from the parent's record
              ...(parent ? { reply: { root: strongRef(parent), parent: strongRef(parent) } } : {}),
            },
          },
        };
      }
      case 'share':
      case 'like': {
        const uri = postAtUri(object, appHost);
        if (!uri) {
          throw new EncodingError(`bluesky ${activity.verb} needs a post with an at:// id or post url`);
        }
        const collection = activity.verb === 'share' ? 'app.bsky.feed.repost' : 'app.bsky.feed.like';
        return {
          source: 'bluesky',
          method: 'POST',
          endpoint: 'com.atproto.repo.createRecord',
          body: { collection, record: { $type: collection, subject: strongRef(uri), createdAt } },
        };
      }
      default:
        return unsupported('bluesky', `writing ${activity.verb} activities`);
    }
  };

  return {
    source: 'bluesky',
    domain: appHost,
    capabilities: new Set<Capability>(['search', 'write']),

    normalize(raw) {
      const error = detectError(raw);
      if (error) {
        throw error;
      }
      const items = parsePayload('bluesky', BlueskyFeedSchema, raw, 'feed');
      return normalizeBatch('bluesky', items, BlueskyFeedViewPostSchema, feedItemToActivity);
    },

    normalizeActor(raw) {
      const error = detectError(raw);
      if (error) {
        throw error;
      }
      return createActor(normalizeProfile(parsePayload('bluesky', BlueskyProfileSchema, raw, 'profile')));
    },

    denormalize,
    detectError,

    totalResults() {
      return undefined;
    },
  };
}
