/**
 * Facebook Graph API payload shapes
 *
 * `message_tags` offsets and lengths count UTF-16 code units of `message`.
 */

import { z } from 'zod';
import type { WriteRequest } from '../../normalizers/types.js';

export const FacebookProfileSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  username: z.string().nullish(),
  about: z.string().nullish(),
  link: z.string().nullish(),
  picture: z
    .object({
      data: z.object({ url: z.string() }),
    })
    .nullish(),
});

export const FacebookMessageTagSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string().nullish(),
  offset: z.number().int(),
  length: z.number().int(),
});

export const FacebookPlaceSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  location: z
    .object({
      latitude: z.number().nullish(),
      longitude: z.number().nullish(),
    })
    .nullish(),
});

export const FacebookPostSchema = z.object({
  id: z.string(),
  from: FacebookProfileSchema,
  type: z.string().nullish(),
  message: z.string().nullish(),
  message_tags: z.array(FacebookMessageTagSchema).nullish(),
  created_time: z.string(),
  updated_time: z.string().nullish(),
  permalink_url: z.string().nullish(),
  link: z.string().nullish(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  picture: z.string().nullish(),
  full_picture: z.string().nullish(),
  source: z.string().nullish(),
  place: FacebookPlaceSchema.nullish(),
  application: z
    .object({
      name: z.string(),
      link: z.string().nullish(),
    })
    .nullish(),
  parent: z.object({ id: z.string() }).nullish(),
});

export const FacebookFeedSchema = z.object({
  data: z.array(z.unknown()),
  paging: z
    .object({
      previous: z.string().nullish(),
      next: z.string().nullish(),
    })
    .nullish(),
  summary: z
    .object({
      total_count: z.number().int().nonnegative(),
    })
    .nullish(),
});

export const GraphErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().nullish(),
    code: z.number().nullish(),
    error_subcode: z.number().nullish(),
  }),
});

export type FacebookProfile = z.infer<typeof FacebookProfileSchema>;
export type FacebookMessageTag = z.infer<typeof FacebookMessageTagSchema>;
export type FacebookPost = z.infer<typeof FacebookPostSchema>;
export type GraphError = z.infer<typeof GraphErrorSchema>;

/**
 * Graph API error codes
 * https://developers.facebook.com/docs/graph-api/guides/error-handling
 */
export const GRAPH_AUTH_ERROR_CODES: ReadonlySet<number> = new Set([102, 190]);
export const GRAPH_PERMISSION_ERROR_CODES: ReadonlySet<number> = new Set([10, 200]);
export const GRAPH_RATE_LIMIT_ERROR_CODES: ReadonlySet<number> = new Set([4, 17, 32, 613]);
export const GRAPH_NOT_FOUND_ERROR_CODES: ReadonlySet<number> = new Set([803]);

export type FacebookWriteBody = { message: string; link?: string } | Record<string, never>;

export type FacebookWriteRequest = WriteRequest<FacebookWriteBody>;
