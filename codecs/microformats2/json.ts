/**
 * microformats2 JSON codec
 *
 * Each canonical field becomes an mf2 property holding an array of values.
 * Tags travel inside `content[0].html` as <a> elements around their code
 * point range, and mentions and hashtags are repeated in `category`: first
 * the anchored ones in document order, then offset-less tags. Decoding
 * recovers offsets by walking the content markup, then keeps only the
 * categories that no anchor accounts for.
 */

import { z } from 'zod';
import type { Activity, Actor, CanonicalObject, Location, ObjectReference, ObjectType, Tag, Verb } from '../../schemas/index.js';
import { createActivity, createActor, formatValidationErrors } from '../../schemas/index.js';
import type { TextLink } from '../../normalizers/html.js';
import { escapeMarkup, htmlToText, linksToTags, partitionTags, renderContent } from '../../normalizers/html.js';
import { sliceCodepoints } from '../../normalizers/offsets.js';
import { DecodingError, EncodingError } from '../../src/errors.js';

export interface Mf2Embedded {
  html: string;
  value: string;
}

export interface Mf2Image {
  value: string;
  alt: string;
}

export type Mf2Property = string | Mf2Item | Mf2Embedded | Mf2Image;

export interface Mf2Item {
  type: string[];
  properties: Record<string, Mf2Property[]>;
  id?: string;
  value?: string | Mf2Embedded;
  children?: Mf2Item[];
}

export interface Mf2Document {
  items: Mf2Item[];
}

const Mf2EmbeddedSchema = z.object({ html: z.string(), value: z.string() });
const Mf2ImageSchema = z.object({ value: z.string(), alt: z.string() });

export const Mf2ItemSchema: z.ZodType<Mf2Item> = z.lazy(() =>
  z.object({
    type: z.array(z.string()),
    properties: z.record(z.array(Mf2PropertySchema)),
    id: z.string().optional(),
    value: z.union([z.string(), Mf2EmbeddedSchema]).optional(),
    children: z.array(Mf2ItemSchema).optional(),
  })
);

const Mf2PropertySchema: z.ZodType<Mf2Property> = z.lazy(() =>
  z.union([z.string(), Mf2ItemSchema, Mf2EmbeddedSchema, Mf2ImageSchema])
);

export const Mf2DocumentSchema = z.object({
  items: z.array(Mf2ItemSchema),
});

/**
 * Activity verbs carried by a dedicated h-entry property
 */
export const VERB_PROPERTIES: ReadonlyArray<readonly [Verb, string]> = [
  ['share', 'repost-of'],
  ['like', 'like-of'],
  ['follow', 'follow-of'],
  ['tag', 'tag-of'],
];

const RSVP_VALUES: ReadonlyArray<readonly [Verb, string]> = [
  ['rsvp-yes', 'yes'],
  ['rsvp-no', 'no'],
  ['rsvp-maybe', 'maybe'],
  ['rsvp-interested', 'interested'],
];

function isItem(value: Mf2Property): value is Mf2Item {
  return typeof value !== 'string' && 'type' in value;
}

function isEmbedded(value: Mf2Property): value is Mf2Embedded {
  return typeof value !== 'string' && 'html' in value;
}

function isAbsoluteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

// Encoding

function one<T extends Mf2Property>(value: T | undefined): T[] | undefined {
  return value === undefined || value === '' ? undefined : [value];
}

function properties(entries: Record<string, Mf2Property[] | undefined>): Record<string, Mf2Property[]> {
  const result: Record<string, Mf2Property[]> = {};
  for (const [name, values] of Object.entries(entries)) {
    if (values && values.length > 0) {
      result[name] = values;
    }
  }
  return result;
}

export function actorToMf2(actor: Actor): Mf2Item {
  return {
    type: ['h-card'],
    properties: properties({
      uid: one(actor.id),
      name: one(actor.displayName),
      nickname: one(actor.username),
      url: one(actor.url),
      photo: one(actor.image),
      note: one(actor.description),
    }),
  };
}

function personToMf2(obj: CanonicalObject): Mf2Item {
  return actorToMf2({
    id: obj.id,
    displayName: obj.displayName,
    url: obj.url,
    image: obj.image,
    description: obj.summary,
  });
}

function locationToMf2(location: Location): Mf2Item {
  return {
    type: ['h-card'],
    properties: properties({
      name: one(location.displayName),
      url: one(location.url),
      latitude: one(location.latitude?.toString()),
      longitude: one(location.longitude?.toString()),
    }),
  };
}

function anchoredCategory(tag: Tag, content: string): Mf2Property | undefined {
  const start = tag.startIndex ?? 0;
  const text = sliceCodepoints(content, start, start + (tag.length ?? 0));
  switch (tag.objectType) {
    case 'mention':
      return {
        type: ['h-card'],
        properties: properties({ name: one(text), url: one(tag.url) }),
        ...(tag.url ? { value: tag.url } : {}),
      };
    case 'hashtag':
      return text;
    case 'article':
      return undefined;
  }
}

function floatingCategory(tag: Tag): Mf2Property | undefined {
  switch (tag.objectType) {
    case 'mention':
      return { type: ['h-card'], properties: properties({ name: one(tag.displayName), url: one(tag.url) }) };
    case 'hashtag':
      return tag.displayName ?? tag.url;
    case 'article':
      return tag.displayName
        ? { type: ['h-cite'], properties: properties({ name: one(tag.displayName), url: one(tag.url) }) }
        : tag.url;
  }
}

function categories(obj: ObjectReference): Mf2Property[] {
  const { anchored, floating } = partitionTags(obj.tags);
  const values = [
    ...(obj.content === undefined ? [] : anchored.map((tag) => anchoredCategory(tag, obj.content ?? ''))),
    ...(obj.content === undefined ? anchored : floating).map(floatingCategory),
  ];
  return values.filter((value): value is Mf2Property => value !== undefined);
}

/**
 * A video or audio URL, or an h-cite when it also has a poster or a name
 */
function mediaProperty(kind: 'video' | 'audio', media: string, attachment: CanonicalObject): Mf2Property {
  if (!attachment.image && !attachment.displayName) {
    return media;
  }
  return {
    type: ['h-cite'],
    properties: properties({
      [kind]: [media],
      featured: one(attachment.image),
      name: one(attachment.displayName),
    }),
  };
}

function attachmentProperties(attachments: CanonicalObject[] = []): Record<string, Mf2Property[]> {
  const photo: Mf2Property[] = [];
  const video: Mf2Property[] = [];
  const audio: Mf2Property[] = [];
  const quotations: Mf2Property[] = [];

  for (const attachment of attachments) {
    const media = attachment.stream ?? attachment.url;
    if (attachment.objectType === 'image' && (attachment.image ?? attachment.url)) {
      const src = attachment.image ?? attachment.url ?? '';
      photo.push(attachment.displayName ? { value: src, alt: attachment.displayName } : src);
    } else if (attachment.objectType === 'video' && media) {
      video.push(mediaProperty('video', media, attachment));
    } else if (attachment.objectType === 'audio' && media) {
      audio.push(mediaProperty('audio', media, attachment));
    } else {
      quotations.push(objectToMf2(attachment, 'h-cite'));
    }
  }

  return { photo, video, audio, 'quotation-of': quotations };
}

export function referenceToMf2(ref: ObjectReference): Mf2Property {
  const { url, ...rest } = ref;
  if (url && Object.keys(rest).length === 0) {
    return url;
  }
  return objectToMf2(ref, 'h-cite');
}

/**
 * An object as an h-entry or h-cite
 *
 * @param author - overrides `obj.author`; set for the actor of a post
 */
export function objectToMf2(obj: ObjectReference, type: 'h-entry' | 'h-cite', author?: Actor): Mf2Item {
  if (obj.objectType === 'person') {
    return personToMf2({ ...obj, objectType: 'person' });
  }

  const byline = author ?? obj.author;
  return {
    type: [type],
    properties: properties({
      uid: one(obj.id),
      url: one(obj.url),
      name: one(obj.displayName),
      summary: one(obj.summary),
      content: obj.content === undefined ? undefined : [{ html: renderContent(obj.content, obj.tags), value: obj.content }],
      published: one(obj.published),
      updated: one(obj.updated),
      author: byline ? [actorToMf2(byline)] : undefined,
      featured: one(obj.image),
      category: categories(obj),
      ...attachmentProperties(obj.attachments),
      'in-reply-to': obj.inReplyTo?.map(referenceToMf2),
      location: obj.location ? [locationToMf2(obj.location)] : undefined,
    }),
  };
}

function requireTarget(activity: Activity): void {
  if (!activity.object.url && !activity.object.id) {
    throw new EncodingError(`A ${activity.verb} needs an object with a url or id`);
  }
}

/**
 * An activity as an h-entry
 * @throws EncodingError when a response activity has nothing to point at
 */
export function activityToMf2(activity: Activity): Mf2Item {
  const { verb, object } = activity;

  if (verb === 'post' || verb === 'update' || verb === 'delete') {
    return objectToMf2(
      {
        ...object,
        id: object.id ?? activity.id,
        url: object.url ?? activity.url,
        published: object.published ?? activity.published,
        updated: object.updated ?? activity.updated,
      },
      'h-entry',
      activity.actor ?? object.author
    );
  }

  const rsvp = RSVP_VALUES.find(([candidate]) => candidate === verb)?.[1];
  const property = VERB_PROPERTIES.find(([candidate]) => candidate === verb)?.[1];
  requireTarget(activity);

  const cited: Record<string, Mf2Property[] | undefined> =
    rsvp !== undefined
      ? { rsvp: [rsvp], 'in-reply-to': [objectToMf2(object, 'h-cite')] }
      : property !== undefined
        ? { [property]: [objectToMf2(object, 'h-cite')] }
        : { 'in-reply-to': [objectToMf2(object, 'h-cite')] };

  return {
    type: ['h-entry'],
    properties: properties({
      uid: one(activity.id),
      url: one(activity.url),
      published: one(activity.published),
      updated: one(activity.updated),
      author: activity.actor ? [actorToMf2(activity.actor)] : undefined,
      content:
        activity.content === undefined
          ? undefined
          : [{ html: escapeMarkup(activity.content), value: activity.content }],
      ...cited,
    }),
  };
}

/**
 * Activities as an mf2 document holding one h-feed
 */
export function activitiesToMf2(activities: readonly Activity[], name?: string): Mf2Document {
  return {
    items: [
      {
        type: ['h-feed'],
        properties: properties({ name: one(name) }),
        children: activities.map(activityToMf2),
      },
    ],
  };
}

// Decoding

function values(item: Mf2Item, name: string): Mf2Property[] {
  return item.properties[name] ?? [];
}

function textOf(value: Mf2Property | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (isItem(value)) {
    if (typeof value.value === 'string') return value.value;
    return textOf(value.properties.url?.[0] ?? value.properties.name?.[0]);
  }
  return value.value;
}

function firstText(item: Mf2Item, name: string): string | undefined {
  const text = textOf(values(item, name)[0]);
  return text === '' ? undefined : text;
}

function firstUrl(item: Mf2Item, name: string): string | undefined {
  for (const value of values(item, name)) {
    const url = isItem(value) ? firstText(value, 'url') : textOf(value);
    if (url) return url;
  }
  return undefined;
}

/**
 * Parsers imply a name from the element text; a name equal to the url is
 * not a real display name
 */
function explicitName(item: Mf2Item): string | undefined {
  const name = firstText(item, 'name')?.trim();
  return name && name !== firstText(item, 'url') ? name : undefined;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseItem(input: unknown, what: string): Mf2Item {
  const result = Mf2ItemSchema.safeParse(input);
  if (!result.success) {
    throw new DecodingError(`Invalid microformats2 ${what}: ${formatValidationErrors(result.error).join('; ')}`);
  }
  return result.data;
}

function itemToActor(value: Mf2Property): Actor {
  if (!isItem(value)) {
    const text = textOf(value);
    return text && isAbsoluteUrl(text) ? { url: text } : { displayName: text };
  }
  return {
    id: firstText(value, 'uid'),
    displayName: explicitName(value),
    username: firstText(value, 'nickname'),
    url: firstText(value, 'url'),
    image: firstText(value, 'photo'),
    description: firstText(value, 'note'),
  };
}

/**
 * Decode an h-card
 * @throws DecodingError when the input is not an mf2 item
 */
export function mf2ToActor(input: unknown): Actor {
  return createActor(itemToActor(parseItem(input, 'h-card')));
}

function itemToLocation(value: Mf2Property): Location {
  if (!isItem(value)) {
    return { displayName: textOf(value) };
  }
  return {
    displayName: explicitName(value),
    url: firstText(value, 'url'),
    latitude: parseNumber(firstText(value, 'latitude')),
    longitude: parseNumber(firstText(value, 'longitude')),
  };
}

function categoryToTag(value: Mf2Property): Tag | undefined {
  if (typeof value === 'string') {
    if (value === '') return undefined;
    return isAbsoluteUrl(value) ? { objectType: 'article', url: value } : { objectType: 'hashtag', displayName: value };
  }
  if (!isItem(value)) {
    return undefined;
  }
  return {
    objectType: value.type.includes('h-card') ? 'mention' : 'article',
    displayName: explicitName(value),
    url: firstText(value, 'url'),
  };
}

function matchesAnchor(category: Mf2Property, link: TextLink): boolean {
  if (link.classes.includes('h-card')) {
    return isItem(category) && category.type.includes('h-card') && (firstText(category, 'url') ?? category.value) === link.href;
  }
  if (link.classes.includes('p-category')) {
    return textOf(category) === link.text;
  }
  return false;
}

function contentAndTags(item: Mf2Item): { content?: string; tags: Tag[] } {
  const first = values(item, 'content')[0];
  const floating = [...values(item, 'category')];
  let content: string | undefined;
  let anchored: Tag[] = [];

  if (first !== undefined && isEmbedded(first)) {
    const annotated = htmlToText(first.html);
    content = annotated.text;
    anchored = linksToTags(annotated.links);
    for (const link of annotated.links) {
      const index = floating.findIndex((category) => matchesAnchor(category, link));
      if (index >= 0) {
        floating.splice(index, 1);
      }
    }
  } else if (first !== undefined) {
    content = textOf(first);
  }

  const tags = [...anchored, ...floating.map(categoryToTag).filter((tag): tag is Tag => tag !== undefined)];
  return { content: content === '' ? undefined : content, tags };
}

function attachmentsOf(item: Mf2Item): CanonicalObject[] {
  const photos = values(item, 'photo').map((value): CanonicalObject => {
    const alt = typeof value !== 'string' && !isItem(value) && !isEmbedded(value) ? value.alt : undefined;
    return { objectType: 'image', image: textOf(value), displayName: alt || undefined };
  });
  const media = (kind: 'video' | 'audio') =>
    values(item, kind).map((value): CanonicalObject =>
      isItem(value)
        ? {
            objectType: kind,
            stream: firstText(value, kind) ?? firstText(value, 'url'),
            image: firstText(value, 'featured'),
            displayName: explicitName(value),
          }
        : { objectType: kind, stream: textOf(value) }
    );
  const videos = media('video');
  const audios = media('audio');
  const quotations = values(item, 'quotation-of').map((value) => itemToObject(value));
  return [...photos, ...videos, ...audios, ...quotations];
}

function objectTypeOf(item: Mf2Item, fallback: ObjectType): ObjectType {
  if (item.type.includes('h-card')) return 'person';
  if (item.type.includes('h-event')) return 'event';
  // The citing property already says what the object is
  if (fallback !== 'note') return fallback;
  if (values(item, 'in-reply-to').length > 0) return 'comment';
  if (explicitName(item) !== undefined) return 'article';
  return fallback;
}

function itemToReference(value: Mf2Property): ObjectReference {
  if (!isItem(value)) {
    return { url: textOf(value) };
  }
  const { objectType: _objectType, ...reference } = itemToObject(value);
  return reference;
}

function itemToObject(value: Mf2Property, fallback: ObjectType = 'note'): CanonicalObject {
  if (!isItem(value)) {
    const text = textOf(value);
    return { objectType: fallback, url: text && isAbsoluteUrl(text) ? text : undefined };
  }

  const objectType = objectTypeOf(value, fallback);
  if (objectType === 'person') {
    const actor = itemToActor(value);
    return {
      objectType,
      id: actor.id,
      displayName: actor.displayName,
      url: actor.url,
      image: actor.image,
      summary: actor.description,
    };
  }

  const author = values(value, 'author')[0];
  const location = values(value, 'location')[0];
  return {
    objectType,
    id: firstText(value, 'uid'),
    url: firstText(value, 'url'),
    displayName: explicitName(value),
    summary: firstText(value, 'summary'),
    ...contentAndTags(value),
    published: firstText(value, 'published'),
    updated: firstText(value, 'updated'),
    author: author === undefined ? undefined : itemToActor(author),
    image: firstText(value, 'featured'),
    attachments: attachmentsOf(value),
    inReplyTo: values(value, 'in-reply-to').map(itemToReference),
    location: location === undefined ? undefined : itemToLocation(location),
  };
}

function decodeEntry(item: Mf2Item): Activity {
  if (!item.type.some((type) => type === 'h-entry' || type === 'h-cite' || type === 'h-event')) {
    throw new DecodingError(`Expected an h-entry, got ${item.type.join(' ') || 'an untyped item'}`);
  }

  const author = values(item, 'author')[0];
  const actor = author === undefined ? undefined : itemToActor(author);
  const envelope = {
    id: firstText(item, 'uid'),
    url: firstText(item, 'url'),
    published: firstText(item, 'published'),
    updated: firstText(item, 'updated'),
    actor,
  };

  const rsvp = firstText(item, 'rsvp')?.toLowerCase();
  const rsvpVerb = RSVP_VALUES.find(([, value]) => value === rsvp)?.[0];
  const target = values(item, 'in-reply-to')[0];
  if (rsvpVerb !== undefined && target !== undefined) {
    return { verb: rsvpVerb, ...envelope, object: itemToObject(target, 'event') };
  }

  for (const [verb, property] of VERB_PROPERTIES) {
    const cited = values(item, property)[0];
    if (cited !== undefined) {
      return { verb, ...envelope, object: itemToObject(cited, verb === 'follow' ? 'person' : 'note') };
    }
  }

  const object = itemToObject(item);
  return {
    verb: 'post',
    ...envelope,
    object: { ...object, author: undefined },
  };
}

/**
 * Decode one h-entry
 * @throws DecodingError for anything but a valid h-entry
 */
export function mf2ToActivity(input: unknown): Activity {
  const activity = decodeEntry(parseItem(input, 'h-entry'));
  try {
    return createActivity(activity);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new DecodingError(`Invalid h-entry: ${formatValidationErrors(error).join('; ')}`);
    }
    throw error;
  }
}

function collectEntries(items: readonly Mf2Item[]): Mf2Item[] {
  return items.flatMap((item) =>
    item.type.includes('h-entry') ? [item] : item.type.includes('h-feed') ? collectEntries(item.children ?? []) : []
  );
}

/**
 * Decode every h-entry of a document, including those inside h-feeds
 * @throws DecodingError when the document holds no h-entry
 */
export function mf2ToActivities(input: unknown): Activity[] {
  const document = Mf2DocumentSchema.safeParse(input);
  if (!document.success) {
    throw new DecodingError(`Invalid microformats2 document: ${formatValidationErrors(document.error).join('; ')}`);
  }

  const entries = collectEntries(document.data.items);
  if (entries.length === 0) {
    throw new DecodingError('No h-entry found');
  }
  return entries.map((entry) => mf2ToActivity(entry));
}
