/**
 * Twitter v1.1 API payload shapes
 *
 * Entity indices are code point positions into the tweet text as the API
 * returns it, which is HTML-escaped.
 */

import { z } from 'zod';
import type { WriteRequest } from '../../normalizers/types.js';

const IndicesSchema = z.tuple([z.number().int().nonnegative(), z.number().int().nonnegative()]);

export const TwitterUserSchema = z.object({
  id_str: z.string(),
  screen_name: z.string(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  profile_image_url_https: z.string().nullish(),
  profile_image_url: z.string().nullish(),
});

export const TwitterHashtagSchema = z.object({
  text: z.string(),
  indices: IndicesSchema,
});

export const TwitterUrlSchema = z.object({
  url: z.string(),
  expanded_url: z.string().nullish(),
  display_url: z.string().nullish(),
  indices: IndicesSchema,
});

export const TwitterMentionSchema = z.object({
  screen_name: z.string(),
  name: z.string().nullish(),
  id_str: z.string().nullish(),
  indices: IndicesSchema,
});

export const TwitterMediaSchema = z.object({
  id_str: z.string().nullish(),
  type: z.enum(['photo', 'video', 'animated_gif']),
  media_url_https: z.string(),
  url: z.string(),
  expanded_url: z.string().nullish(),
  indices: IndicesSchema,
  ext_alt_text: z.string().nullish(),
  video_info: z
    .object({
      variants: z.array(
        z.object({
          content_type: z.string(),
          url: z.string(),
          bitrate: z.number().nullish(),
        })
      ),
    })
    .nullish(),
});

export const TwitterEntitiesSchema = z.object({
  hashtags: z.array(TwitterHashtagSchema).optional(),
  urls: z.array(TwitterUrlSchema).optional(),
  user_mentions: z.array(TwitterMentionSchema).optional(),
  media: z.array(TwitterMediaSchema).optional(),
});

export const TwitterPlaceSchema = z.object({
  id: z.string(),
  full_name: z.string().nullish(),
  name: z.string().nullish(),
});

const baseTweetShape = {
  id_str: z.string(),
  created_at: z.string(),
  text: z.string().nullish(),
  full_text: z.string().nullish(),
  display_text_range: IndicesSchema.nullish(),
  user: TwitterUserSchema,
  entities: TwitterEntitiesSchema.nullish(),
  extended_entities: z.object({ media: z.array(TwitterMediaSchema).optional() }).nullish(),
  in_reply_to_status_id_str: z.string().nullish(),
  in_reply_to_screen_name: z.string().nullish(),
  source: z.string().nullish(),
  place: TwitterPlaceSchema.nullish(),
  coordinates: z
    .object({
      type: z.literal('Point'),
      coordinates: z.tuple([z.number(), z.number()]),
    })
    .nullish(),
};

const QuotedTweetSchema = z.object(baseTweetShape);

const InnerTweetSchema = z.object({
  ...baseTweetShape,
  quoted_status: QuotedTweetSchema.nullish(),
});

export const TwitterTweetSchema = z.object({
  ...baseTweetShape,
  quoted_status: QuotedTweetSchema.nullish(),
  retweeted_status: InnerTweetSchema.nullish(),
});

export const TwitterTimelineSchema = z.union([
  z.array(z.unknown()),
  z.object({ statuses: z.array(z.unknown()) }).transform((search) => search.statuses),
]);

export const TwitterErrorSchema = z.object({
  errors: z
    .array(
      z.object({
        code: z.number(),
        message: z.string(),
      })
    )
    .min(1),
});

export type TwitterUser = z.infer<typeof TwitterUserSchema>;
export type TwitterMedia = z.infer<typeof TwitterMediaSchema>;
export type TwitterEntities = z.infer<typeof TwitterEntitiesSchema>;
export type TwitterTweet = z.infer<typeof TwitterTweetSchema>;
export type TwitterQuotedTweet = z.infer<typeof QuotedTweetSchema>;

/**
 * Twitter error codes
 * https://developer.twitter.com/en/support/twitter-api/error-troubleshooting
 */
export const TWITTER_AUTH_ERROR_CODES: ReadonlySet<number> = new Set([32, 89, 135]);
export const TWITTER_RATE_LIMIT_ERROR_CODES: ReadonlySet<number> = new Set([88]);
export const TWITTER_NOT_FOUND_ERROR_CODES: ReadonlySet<number> = new Set([34, 144]);

/** Twitter's own throttling status ("Enhance Your Calm") */
export const TWITTER_RATE_LIMIT_STATUS = 420;

export type TwitterWriteBody =
  | { status: string; in_reply_to_status_id?: string; attachment_url?: string }
  | { id: string };

export type TwitterWriteRequest = WriteRequest<TwitterWriteBody>;
