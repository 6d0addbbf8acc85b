/**
 * JSON Feed codec (https://jsonfeed.org/version/1)
 */

import { z } from 'zod';
import type { Activity, Actor, CanonicalObject, Tag } from '../schemas/index.js';
import { createActivity, formatValidationErrors } from '../schemas/index.js';
import { htmlToText, linksToTags, renderContent } from '../normalizers/html.js';
import { DecodingError } from '../src/errors.js';
import { guessMimeType, mediaObjectType, mediaUrl } from './media.js';

export const JSON_FEED_VERSION = 'https://jsonfeed.org/version/1';

export interface JsonFeedAuthor {
  name?: string;
  url?: string;
  avatar?: string;
}

export interface JsonFeedAttachment {
  url: string;
  mime_type: string;
  title?: string;
}

export interface JsonFeedItem {
  id: string;
  url?: string;
  title?: string;
  content_html?: string;
  content_text?: string;
  summary?: string;
  image?: string;
  date_published?: string;
  date_modified?: string;
  author?: JsonFeedAuthor;
  tags?: string[];
  attachments?: JsonFeedAttachment[];
}

export interface JsonFeed {
  version: string;
  title: string;
  home_page_url?: string;
  feed_url?: string;
  author?: JsonFeedAuthor;
  items?: JsonFeedItem[];
}

export interface JsonFeedOptions {
  title?: string;
  homePageUrl?: string;
  feedUrl?: string;
  actor?: Actor;
}

function authorOf(actor: Actor | undefined): JsonFeedAuthor | undefined {
  if (!actor) return undefined;
  const author = { name: actor.displayName ?? actor.username, url: actor.url, avatar: actor.image };
  return Object.values(author).some((value) => value !== undefined) ? author : undefined;
}

function attachmentsOf(obj: CanonicalObject): JsonFeedAttachment[] {
  return (obj.attachments ?? []).flatMap((attachment) => {
    const url = mediaUrl(attachment);
    const mimeType = url ? guessMimeType(url, attachment.objectType) : undefined;
    if (!url || !mimeType || !mediaObjectType(mimeType)) return [];
    return [{ url, mime_type: mimeType, title: attachment.displayName }];
  });
}

function activityToItem(activity: Activity): JsonFeedItem | undefined {
  const { object } = activity;
  const id = object.id ?? object.url ?? activity.id ?? activity.url;
  if (object.objectType === 'person' || id === undefined) {
    return undefined;
  }

  const attachments = attachmentsOf(object);
  const tags = (object.tags ?? [])
    .filter((tag) => tag.objectType === 'hashtag' && tag.displayName)
    .map((tag) => tag.displayName ?? '');

  return {
    id,
    url: object.url ?? activity.url,
    title: object.objectType === 'article' ? object.displayName : undefined,
    ...(object.content ? { content_html: renderContent(object.content, object.tags) } : { content_text: '' }),
    summary: object.summary,
    image: object.image,
    date_published: object.published ?? activity.published,
    date_modified: object.updated ?? activity.updated,
    author: authorOf(object.author ?? activity.actor),
    tags: tags.length > 0 ? tags : undefined,
    attachments: attachments.length > 0 ? attachments : undefined,
  };
}

/**
 * Activities as a JSON Feed. People are skipped. Absent fields are left
 * undefined and vanish on serialization.
 */
export function activitiesToJsonFeed(activities: readonly Activity[], options: JsonFeedOptions = {}): JsonFeed {
  const items = activities.map(activityToItem).filter((item): item is JsonFeedItem => item !== undefined);
  return {
    version: JSON_FEED_VERSION,
    title: options.title ?? 'JSON Feed',
    home_page_url: options.homePageUrl,
    feed_url: options.feedUrl,
    author: authorOf(options.actor),
    items: items.length > 0 ? items : undefined,
  };
}

const JsonFeedAuthorSchema = z.object({
  name: z.string().optional(),
  url: z.string().optional(),
  avatar: z.string().optional(),
});

const JsonFeedItemSchema = z.object({
  id: z.union([z.string(), z.number().transform(String)]).optional(),
  url: z.string().optional(),
  title: z.string().optional(),
  content_html: z.string().optional(),
  content_text: z.string().optional(),
  summary: z.string().optional(),
  image: z.string().optional(),
  date_published: z.string().optional(),
  date_modified: z.string().optional(),
  author: JsonFeedAuthorSchema.optional(),
  authors: z.array(JsonFeedAuthorSchema).optional(),
  tags: z.array(z.string()).optional(),
  attachments: z
    .array(
      z.object({
        url: z.string(),
        mime_type: z.string().optional(),
        title: z.string().optional(),
      })
    )
    .optional(),
});

const JsonFeedSchema = z.object({
  version: z.string().optional(),
  author: JsonFeedAuthorSchema.optional(),
  items: z.array(JsonFeedItemSchema),
});

type ParsedAuthor = z.infer<typeof JsonFeedAuthorSchema>;
type ParsedItem = z.infer<typeof JsonFeedItemSchema>;

function actorOf(author: ParsedAuthor | undefined): Actor | undefined {
  return author ? { displayName: author.name, url: author.url, image: author.avatar } : undefined;
}

function contentOf(item: ParsedItem): { content?: string; tags: Tag[] } {
  const hashtags = (item.tags ?? []).map((name): Tag => ({ objectType: 'hashtag', displayName: name }));
  if (item.content_html === undefined) {
    return { content: item.content_text || undefined, tags: hashtags };
  }

  const annotated = htmlToText(item.content_html);
  const anchored = linksToTags(annotated.links);
  const floating = hashtags.filter(
    (hashtag) => !anchored.some((tag) => tag.objectType === 'hashtag' && tag.displayName === hashtag.displayName)
  );
  return { content: annotated.text || undefined, tags: [...anchored, ...floating] };
}

function itemToActivity(item: ParsedItem, feedAuthor: ParsedAuthor | undefined): Activity {
  const object: CanonicalObject = {
    objectType: item.title ? 'article' : 'note',
    id: item.id,
    url: item.url,
    displayName: item.title,
    summary: item.summary,
    ...contentOf(item),
    published: item.date_published,
    updated: item.date_modified,
    image: item.image,
    attachments: (item.attachments ?? []).map((attachment): CanonicalObject => {
      const objectType = mediaObjectType(attachment.mime_type) ?? 'image';
      return objectType === 'image'
        ? { objectType, image: attachment.url, displayName: attachment.title }
        : { objectType, stream: attachment.url, displayName: attachment.title };
    }),
  };

  return {
    verb: 'post',
    id: object.id,
    url: object.url,
    published: object.published,
    updated: object.updated,
    actor: actorOf(item.author ?? item.authors?.[0] ?? feedAuthor),
    object,
  };
}

/**
 * Decode a JSON Feed into post activities
 * @throws DecodingError when the input is not a JSON Feed
 */
export function jsonFeedToActivities(input: unknown): Activity[] {
  const feed = JsonFeedSchema.safeParse(input);
  if (!feed.success) {
    throw new DecodingError(`Invalid JSON Feed: ${formatValidationErrors(feed.error).join('; ')}`);
  }

  return feed.data.items.map((item, index) => {
    try {
      return createActivity(itemToActivity(item, feed.data.author));
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new DecodingError(
          `Invalid JSON Feed item ${index}: ${formatValidationErrors(error).join('; ')}`
        );
      }
      throw error;
    }
  });
}
