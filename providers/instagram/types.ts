/**
 * Instagram Graph API payload shapes
 */

import { z } from 'zod';

export const InstagramMediaTypeSchema = z.enum(['IMAGE', 'VIDEO', 'CAROUSEL_ALBUM']);

export const InstagramChildSchema = z.object({
  id: z.string(),
  media_type: InstagramMediaTypeSchema,
  media_url: z.string().nullish(),
  thumbnail_url: z.string().nullish(),
});

export const InstagramMediaSchema = z.object({
  id: z.string(),
  media_type: z.string(),
  caption: z.string().nullish(),
  media_url: z.string().nullish(),
  thumbnail_url: z.string().nullish(),
  permalink: z.string().nullish(),
  timestamp: z.string(),
  username: z.string(),
  owner: z.object({ id: z.string() }).nullish(),
  children: z
    .object({
      data: z.array(InstagramChildSchema),
    })
    .nullish(),
});

export const InstagramMediaListSchema = z.object({
  data: z.array(z.unknown()),
  paging: z
    .object({
      cursors: z.object({ before: z.string().nullish(), after: z.string().nullish() }).nullish(),
      next: z.string().nullish(),
    })
    .nullish(),
});

export const InstagramUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  name: z.string().nullish(),
  biography: z.string().nullish(),
  website: z.string().nullish(),
  profile_picture_url: z.string().nullish(),
});

export type InstagramChild = z.infer<typeof InstagramChildSchema>;
export type InstagramMedia = z.infer<typeof InstagramMediaSchema>;
export type InstagramUser = z.infer<typeof InstagramUserSchema>;
