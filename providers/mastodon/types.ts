/**
 * Mastodon REST API payload shapes
 * https://docs.joinmastodon.org/entities/Status/
 */

import { z } from 'zod';
import type { WriteRequest } from '../../normalizers/types.js';

export const MastodonAccountSchema = z.object({
  id: z.string(),
  username: z.string(),
  acct: z.string(),
  display_name: z.string().nullish(),
  note: z.string().nullish(),
  url: z.string(),
  avatar: z.string().nullish(),
});

export const MastodonMediaSchema = z.object({
  id: z.string(),
  type: z.enum(['image', 'gifv', 'video', 'audio', 'unknown']),
  url: z.string().nullish(),
  preview_url: z.string().nullish(),
  description: z.string().nullish(),
});

const baseStatusShape = {
  id: z.string(),
  uri: z.string(),
  url: z.string().nullish(),
  created_at: z.string(),
  edited_at: z.string().nullish(),
  account: MastodonAccountSchema,
  content: z.string(),
  spoiler_text: z.string().nullish(),
  in_reply_to_id: z.string().nullish(),
  media_attachments: z.array(MastodonMediaSchema).default([]),
  application: z
    .object({
      name: z.string(),
      website: z.string().nullish(),
    })
    .nullish(),
};

export const MastodonStatusSchema = z.object({
  ...baseStatusShape,
  reblog: z.object(baseStatusShape).nullish(),
});

export const MastodonTimelineSchema = z.union([
  z.array(z.unknown()),
  z.object({ statuses: z.array(z.unknown()) }).transform((search) => search.statuses),
]);

export const MastodonErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().nullish(),
});

export type MastodonAccount = z.infer<typeof MastodonAccountSchema>;
export type MastodonMedia = z.infer<typeof MastodonMediaSchema>;
export type MastodonStatus = z.infer<typeof MastodonStatusSchema>;
export type MastodonBaseStatus = NonNullable<MastodonStatus['reblog']>;

export type MastodonWriteBody =
  | { status: string; in_reply_to_id?: string; spoiler_text?: string }
  | Record<string, never>;

export type MastodonWriteRequest = WriteRequest<MastodonWriteBody>;
