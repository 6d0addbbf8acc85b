/**
 * Twitter adapter
 *
 * Normalizes v1.1 timeline and search payloads. Entity indices are computed
 * by Twitter against the HTML-escaped text, so the text is unescaped and
 * every index re-mapped onto the unescaped content.
 */

import type { Activity, Actor, CanonicalObject, Capability, Location, Tag } from '../../schemas/index.js';
import { createActivity, createActor } from '../../schemas/index.js';
import type { SourceAdapter } from '../../normalizers/types.js';
import { mapSourceType } from '../../normalizers/mappings.js';
import { normalizeBatch, parsePayload } from '../../normalizers/batch.js';
import { htmlToText } from '../../normalizers/html.js';
import { codepointLength, unescapeEntities } from '../../normalizers/offsets.js';
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
import type {
  TwitterMedia,
  TwitterQuotedTweet,
  TwitterTweet,
  TwitterUser,
  TwitterWriteRequest,
} from './types.js';
import {
  TWITTER_AUTH_ERROR_CODES,
  TWITTER_NOT_FOUND_ERROR_CODES,
  TWITTER_RATE_LIMIT_ERROR_CODES,
  TWITTER_RATE_LIMIT_STATUS,
  TwitterErrorSchema,
  TwitterTimelineSchema,
  TwitterTweetSchema,
  TwitterUserSchema,
} from './types.js';

export const TWITTER_DOMAIN = 'twitter.com';
/** Hosts whose status URLs name tweets */
const TWITTER_HOSTS = [TWITTER_DOMAIN, 'x.com'];
const BASE_URL = 'https://twitter.com';
const MAX_TWEET_LENGTH = 280;

function tweetUrl(screenName: string, id: string): string {
  return `${BASE_URL}/${screenName}/status/${id}`;
}

/**
 * Map a Twitter user to a canonical actor
 */
export function normalizeTwitterUser(user: TwitterUser): Actor {
  return {
    id: tagUri(TWITTER_DOMAIN, user.screen_name),
    username: user.screen_name,
    displayName: user.name ?? undefined,
    description: user.description ?? undefined,
    url: `${BASE_URL}/${user.screen_name}`,
    image: user.profile_image_url_https ?? user.profile_image_url ?? undefined,
  };
}

interface TweetText {
  content: string;
  tags: Tag[];
}

/**
 * Visible tweet text with entity tags re-indexed onto it
 *
 * The visible part is `display_text_range` when present. Without it, a
 * media link at the end of the text is cut off.
 */
export function tweetText(tweet: TwitterQuotedTweet): TweetText {
  const chars = Array.from(tweet.full_text ?? tweet.text ?? '');
  const entities = tweet.entities ?? {};

  let [rangeStart, rangeEnd] = tweet.display_text_range ?? [0, chars.length];
  rangeEnd = Math.min(rangeEnd, chars.length);
  rangeStart = Math.min(rangeStart, rangeEnd);

  if (!tweet.display_text_range) {
    for (const media of entities.media ?? []) {
      const [start, end] = media.indices;
      if (start >= rangeStart && start < rangeEnd && end >= rangeEnd) {
        rangeEnd = start;
      }
    }
    while (rangeEnd > rangeStart && /\s/.test(chars[rangeEnd - 1])) {
      rangeEnd--;
    }
  }

  const visible = unescapeEntities(chars.slice(rangeStart, rangeEnd).join(''));

  const position = ([start, end]: [number, number]): Pick<Tag, 'startIndex' | 'length'> => {
    if (start < rangeStart || end > rangeEnd || end < start) {
      return {};
    }
    const startIndex = visible.mapIndex(start - rangeStart);
    return { startIndex, length: visible.mapIndex(end - rangeStart) - startIndex };
  };

  const tags: Tag[] = [
    ...(entities.hashtags ?? []).map((hashtag): Tag => ({
      objectType: 'hashtag',
      displayName: hashtag.text,
      url: `${BASE_URL}/hashtag/${encodeURIComponent(hashtag.text)}`,
      ...position(hashtag.indices),
    })),
    ...(entities.urls ?? []).map((link): Tag => ({
      objectType: 'article',
      displayName: link.display_url ?? link.url,
      url: link.expanded_url ?? link.url,
      ...position(link.indices),
    })),
    ...(entities.user_mentions ?? []).map((mention): Tag => ({
      objectType: 'mention',
      displayName: mention.name ?? mention.screen_name,
      url: `${BASE_URL}/${mention.screen_name}`,
      ...position(mention.indices),
    })),
  ];

  return { content: visible.text, tags };
}

function mediaToAttachment(media: TwitterMedia): CanonicalObject {
  if (media.type === 'photo') {
    return {
      objectType: 'image',
      image: media.media_url_https,
      displayName: media.ext_alt_text ?? undefined,
    };
  }

  // Highest bitrate mp4
  const variants = (media.video_info?.variants ?? [])
    .filter((variant) => variant.content_type === 'video/mp4')
    .sort((a, b) => (b.bitrate ?? 0) - (a.bitrate ?? 0));

  return {
    objectType: 'video',
    stream: variants[0]?.url,
    image: media.media_url_https,
    displayName: media.ext_alt_text ?? undefined,
  };
}

function tweetLocation(tweet: TwitterQuotedTweet): Location | undefined {
  if (!tweet.place && !tweet.coordinates) {
    return undefined;
  }
  return {
    displayName: tweet.place?.full_name ?? tweet.place?.name ?? undefined,
    url: tweet.place ? `${BASE_URL}/places/${tweet.place.id}` : undefined,
    longitude: tweet.coordinates?.coordinates[0],
    latitude: tweet.coordinates?.coordinates[1],
  };
}

function tweetKind(tweet: TwitterQuotedTweet & { retweeted_status?: unknown; quoted_status?: unknown }): string {
  if (tweet.retweeted_status) return 'retweet';
  if (tweet.in_reply_to_status_id_str) return 'reply';
  if (tweet.quoted_status) return 'quote';
  return 'tweet';
}

function objectTypeOf(tweet: TwitterQuotedTweet & { quoted_status?: unknown }): CanonicalObject['objectType'] {
  return mapSourceType('twitter', tweetKind(tweet))?.objectType ?? 'note';
}

/**
 * Map a tweet to a canonical object
 *
 * @param withAuthor - Set for tweets by someone other than the activity's actor
 */
export function tweetToObject(
  tweet: TwitterQuotedTweet & { quoted_status?: TwitterQuotedTweet | null },
  withAuthor: boolean
): CanonicalObject {
  const { content, tags } = tweetText(tweet);
  const media = tweet.extended_entities?.media ?? tweet.entities?.media ?? [];
  const attachments = media.map(mediaToAttachment);
  if (tweet.quoted_status) {
    attachments.push(tweetToObject(tweet.quoted_status, true));
  }

  return {
    objectType: objectTypeOf(tweet),
    id: tagUri(TWITTER_DOMAIN, tweet.id_str),
    url: tweetUrl(tweet.user.screen_name, tweet.id_str),
    content,
    published: tweet.created_at,
    author: withAuthor ? normalizeTwitterUser(tweet.user) : undefined,
    tags,
    attachments,
    inReplyTo: tweet.in_reply_to_status_id_str
      ? [
          {
            id: tagUri(TWITTER_DOMAIN, tweet.in_reply_to_status_id_str),
            url: tweet.in_reply_to_screen_name
              ? tweetUrl(tweet.in_reply_to_screen_name, tweet.in_reply_to_status_id_str)
              : undefined,
          },
        ]
      : undefined,
    location: tweetLocation(tweet),
  };
}

function tweetGenerator(source: string | null | undefined): Activity['generator'] {
  if (!source) {
    return undefined;
  }
  const { text, links } = htmlToText(source);
  return { displayName: text, url: links[0]?.href };
}

/**
 * Map a tweet to a canonical activity
 */
export function tweetToActivity(tweet: TwitterTweet): Activity {
  const kind = tweetKind(tweet);
  const mapping = mapSourceType('twitter', kind);
  if (!mapping) {
    throw new UpstreamFormatError(`Unrecognized twitter item kind: ${kind}`, 'twitter');
  }

  const actor = normalizeTwitterUser(tweet.user);
  const generator = tweetGenerator(tweet.source);

  if (tweet.retweeted_status) {
    return createActivity({
      verb: mapping.verb,
      id: tagUri(TWITTER_DOMAIN, tweet.id_str),
      url: tweetUrl(tweet.user.screen_name, tweet.id_str),
      published: tweet.created_at,
      actor,
      object: tweetToObject(tweet.retweeted_status, true),
      generator,
    });
  }

  const object = tweetToObject(tweet, false);
  return createActivity({
    verb: mapping.verb,
    id: object.id,
    url: object.url,
    published: object.published,
    actor,
    object,
    generator,
  });
}

function detectTwitterError(raw: unknown, status?: number): UpstreamError | null {
  if (status === TWITTER_RATE_LIMIT_STATUS) {
    return new RateLimitError('twitter rate limit exceeded', TWITTER_RATE_LIMIT_STATUS);
  }

  const parsed = TwitterErrorSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const [first] = parsed.data.errors;
  const message = `twitter error ${first.code}: ${first.message}`;
  if (TWITTER_AUTH_ERROR_CODES.has(first.code)) {
    return new AuthError(message, status === 403 ? 403 : 401);
  }
  if (TWITTER_RATE_LIMIT_ERROR_CODES.has(first.code)) {
    return new RateLimitError(message, status === TWITTER_RATE_LIMIT_STATUS ? status : 429);
  }
  if (TWITTER_NOT_FOUND_ERROR_CODES.has(first.code)) {
    return new NotFoundError(message);
  }
  return null;
}

function requireTweetId(activity: Activity): string {
  const id = nativeId(TWITTER_DOMAIN, activity.object, TWITTER_HOSTS);
  if (!id) {
    throw new EncodingError(`twitter ${activity.verb} needs an object with an id or url`);
  }
  return id;
}

/**
 * Map a canonical activity to a Twitter write request
 */
export function activityToTwitterRequest(activity: Activity): TwitterWriteRequest {
  const { object } = activity;

  switch (activity.verb) {
    case 'post': {
      if (!object.content) {
        throw new EncodingError('twitter posts need text content');
      }
      if (codepointLength(object.content) > MAX_TWEET_LENGTH) {
        throw new EncodingError(`twitter posts are limited to ${MAX_TWEET_LENGTH} characters`);
      }
      const replyTo = firstNativeId(TWITTER_DOMAIN, object.inReplyTo, TWITTER_HOSTS);
      const quoted = object.attachments?.find((attachment) => attachment.objectType === 'note' && attachment.url);
      return {
        source: 'twitter',
        method: 'POST',
        endpoint: 'statuses/update.json',
        body: {
          status: object.content,
          ...(replyTo ? { in_reply_to_status_id: replyTo } : {}),
          ...(quoted?.url ? { attachment_url: quoted.url } : {}),
        },
      };
    }
    case 'share': {
      const id = requireTweetId(activity);
      return { source: 'twitter', method: 'POST', endpoint: `statuses/retweet/${id}.json`, body: { id } };
    }
    case 'like': {
      const id = requireTweetId(activity);
      return { source: 'twitter', method: 'POST', endpoint: 'favorites/create.json', body: { id } };
    }
    default:
      return unsupported('twitter', `writing ${activity.verb} activities`);
  }
}

/**
 * Create the Twitter adapter
 */
export function createTwitterAdapter(): SourceAdapter<TwitterWriteRequest> {
  return {
    source: 'twitter',
    domain: TWITTER_DOMAIN,
    capabilities: new Set<Capability>(['search', 'write']),

    normalize(raw) {
      const error = detectTwitterError(raw);
      if (error) {
        throw error;
      }
      const items = parsePayload('twitter', TwitterTimelineSchema, raw, 'timeline');
      return normalizeBatch('twitter', items, TwitterTweetSchema, tweetToActivity);
    },

    normalizeActor(raw) {
      const error = detectTwitterError(raw);
      if (error) {
        throw error;
      }
      return createActor(normalizeTwitterUser(parsePayload('twitter', TwitterUserSchema, raw, 'user')));
    },

    denormalize: activityToTwitterRequest,
    detectError: detectTwitterError,

    totalResults() {
      return undefined;
    },
  };
}
