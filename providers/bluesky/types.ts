/**
 * Bluesky (AT Protocol) payload shapes
 *
 * Facet indices are UTF-8 byte offsets into the post text.
 * https://docs.bsky.app/docs/advanced-guides/post-richtext
 */

import { z } from 'zod';
import type { WriteRequest } from '../../normalizers/types.js';

export const BlueskyProfileSchema = z.object({
  did: z.string(),
  handle: z.string(),
  displayName: z.string().nullish(),
  description: z.string().nullish(),
  avatar: z.string().nullish(),
});

export const BlueskyFacetFeatureSchema = z.discriminatedUnion('$type', [
  z.object({ $type: z.literal('app.bsky.richtext.facet#mention'), did: z.string() }),
  z.object({ $type: z.literal('app.bsky.richtext.facet#link'), uri: z.string() }),
  z.object({ $type: z.literal('app.bsky.richtext.facet#tag'), tag: z.string() }),
]);

export const BlueskyFacetSchema = z.object({
  index: z.object({
    byteStart: z.number().int(),
    byteEnd: z.number().int(),
  }),
  /** Parsed one by one with BlueskyFacetFeatureSchema; unknown features are ignored */
  features: z.array(z.unknown()),
});

export const BlueskyStrongRefSchema = z.object({
  uri: z.string(),
  cid: z.string().optional(),
});

export const BlueskyPostRecordSchema = z.object({
  $type: z.literal('app.bsky.feed.post').optional(),
  text: z.string(),
  createdAt: z.string(),
  facets: z.array(BlueskyFacetSchema).nullish(),
  reply: z
    .object({
      root: BlueskyStrongRefSchema,
      parent: BlueskyStrongRefSchema,
    })
    .nullish(),
});

const ImagesViewSchema = z.object({
  $type: z.literal('app.bsky.embed.images#view'),
  images: z.array(
    z.object({
      thumb: z.string(),
      fullsize: z.string(),
      alt: z.string().nullish(),
    })
  ),
});

const ExternalViewSchema = z.object({
  $type: z.literal('app.bsky.embed.external#view'),
  external: z.object({
    uri: z.string(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    thumb: z.string().nullish(),
  }),
});

const ViewRecordSchema = z.object({
  $type: z.literal('app.bsky.embed.record#viewRecord'),
  uri: z.string(),
  author: BlueskyProfileSchema,
  value: BlueskyPostRecordSchema,
});

const RecordViewSchema = z.object({
  $type: z.literal('app.bsky.embed.record#view'),
  record: z.union([
    ViewRecordSchema,
    z.object({ $type: z.string(), uri: z.string() }),
  ]),
});

const RecordWithMediaViewSchema = z.object({
  $type: z.literal('app.bsky.embed.recordWithMedia#view'),
  record: RecordViewSchema,
  media: z.union([ImagesViewSchema, ExternalViewSchema]),
});

export const BlueskyEmbedViewSchema = z.discriminatedUnion('$type', [
  ImagesViewSchema,
  ExternalViewSchema,
  RecordViewSchema,
  RecordWithMediaViewSchema,
]);

export const BlueskyPostViewSchema = z.object({
  uri: z.string(),
  cid: z.string(),
  author: BlueskyProfileSchema,
  record: BlueskyPostRecordSchema,
  /** Parsed with BlueskyEmbedViewSchema; unknown embed types are ignored */
  embed: z.unknown().optional(),
  indexedAt: z.string().nullish(),
});

export const BlueskyFeedViewPostSchema = z.object({
  post: BlueskyPostViewSchema,
  reason: z
    .object({
      $type: z.literal('app.bsky.feed.defs#reasonRepost'),
      by: BlueskyProfileSchema,
      indexedAt: z.string(),
    })
    .nullish(),
});

/**
 * Timeline and author feeds carry feed view posts; search results carry bare
 * post views, which are wrapped to the same shape.
 */
export const BlueskyFeedSchema = z.union([
  z.object({ feed: z.array(z.unknown()) }).transform((timeline) => timeline.feed),
  z
    .object({ posts: z.array(z.unknown()) })
    .transform((search) => search.posts.map((post) => ({ post }))),
]);

export const BlueskyErrorSchema = z.object({
  error: z.string(),
  message: z.string().nullish(),
});

export type BlueskyProfile = z.infer<typeof BlueskyProfileSchema>;
export type BlueskyFacet = z.infer<typeof BlueskyFacetSchema>;
export type BlueskyFacetFeature = z.infer<typeof BlueskyFacetFeatureSchema>;
export type BlueskyPostRecord = z.infer<typeof BlueskyPostRecordSchema>;
export type BlueskyEmbedView = z.infer<typeof BlueskyEmbedViewSchema>;
export type BlueskyPostView = z.infer<typeof BlueskyPostViewSchema>;
export type BlueskyFeedViewPost = z.infer<typeof BlueskyFeedViewPostSchema>;

export const BLUESKY_AUTH_ERRORS: ReadonlySet<string> = new Set([
  'AuthenticationRequired',
  'ExpiredToken',
  'InvalidToken',
  'AccountTakedown',
]);
export const BLUESKY_RATE_LIMIT_ERRORS: ReadonlySet<string> = new Set(['RateLimitExceeded']);
export const BLUESKY_NOT_FOUND_ERRORS: ReadonlySet<string> = new Set(['NotFound', 'RecordNotFound', 'ProfileNotFound']);

/** Written strong refs carry an empty cid when the record was not fetched */
export interface BlueskyStrongRefWrite {
  uri: string;
  cid: string;
}

export interface BlueskyFacetWrite {
  index: { byteStart: number; byteEnd: number };
  features: BlueskyFacetFeature[];
}

export interface BlueskyPostWrite {
  collection: 'app.bsky.feed.post';
  record: {
    $type: 'app.bsky.feed.post';
    text: string;
    createdAt: string;
    facets?: BlueskyFacetWrite[];
    reply?: { root: BlueskyStrongRefWrite; parent: BlueskyStrongRefWrite };
  };
}

export interface BlueskySubjectWrite {
  collection: 'app.bsky.feed.repost' | 'app.bsky.feed.like';
  record: {
    $type: 'app.bsky.feed.repost' | 'app.bsky.feed.like';
    subject: BlueskyStrongRefWrite;
    createdAt: string;
  };
}

export type BlueskyWriteRequest = WriteRequest<BlueskyPostWrite | BlueskySubjectWrite>;
