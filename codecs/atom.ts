/**
 * Atom codec
 *
 * Entries carry the activity verb and object type as Activity Streams 1
 * extension elements. Content is the rendered HTML of the object's text,
 * escaped into `<content type="html">`; tag offsets are recovered on decode
 * from the links in that markup. Every tag is also listed as a
 * `<category>`, and envelope paging metadata goes in OpenSearch elements.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type {
  Activity,
  Actor,
  CanonicalObject,
  Envelope,
  Location,
  ObjectReference,
  ObjectType,
  Tag,
  TagType,
  Verb,
} from '../schemas/index.js';
import {
  ObjectTypeSchema,
  VerbSchema,
  createActivity,
  createEnvelope,
  formatValidationErrors,
} from '../schemas/index.js';
import { escapeMarkup, htmlToText, linksToTags, renderContent } from '../normalizers/html.js';
import { extractFirstLine } from '../normalizers/utils.js';
import { DecodingError, EncodingError } from '../src/errors.js';
import { guessMimeType, mediaObjectType, mediaUrl } from './media.js';

export const ATOM_CONTENT_TYPE = 'application/atom+xml; charset=utf-8';

const SCHEMA_BASE = 'http://activitystrea.ms/schema/1.0/';

const NAMESPACES = [
  'xmlns="http://www.w3.org/2005/Atom"',
  'xmlns:activity="http://activitystrea.ms/spec/1.0/"',
  'xmlns:georss="http://www.georss.org/georss"',
  'xmlns:os="http://a9.com/-/spec/opensearch/1.1/"',
  'xmlns:thr="http://purl.org/syndication/thread/1.0"',
].join(' ');

const TAG_TYPES: readonly TagType[] = ['mention', 'hashtag', 'article'];

/**
 * Category schemes marking the kind of a tag
 */
const TAG_SCHEMES: Record<TagType, string> = {
  mention: `${SCHEMA_BASE}person`,
  hashtag: `${SCHEMA_BASE}hashtag`,
  article: `${SCHEMA_BASE}article`,
};

const POST_VERBS = new Set<Verb>(['post', 'update', 'delete']);

export interface AtomFeedOptions {
  title?: string;
  /** Home URL of the feed; used for its id and alternate link */
  hostUrl?: string;
  /** URL the feed was requested from; used for the self link */
  requestUrl?: string;
  /** Author of the feed */
  actor?: Actor;
}

// Encoding

function element(name: string, value: string | undefined): string[] {
  return value === undefined ? [] : [`<${name}>${escapeMarkup(value)}</${name}>`];
}

function attributes(values: Record<string, string | undefined>): string {
  return Object.entries(values)
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([name, value]) => ` ${name}="${escapeMarkup(value)}"`)
    .join('');
}

function indent(lines: string[]): string[] {
  return lines.map((line) => `  ${line}`);
}

function authorElement(actor: Actor | undefined): string[] {
  if (!actor) return [];
  return [
    '<author>',
    ...indent([
      `<activity:object-type>${SCHEMA_BASE}person</activity:object-type>`,
      ...element('id', actor.id),
      ...element('name', actor.displayName ?? actor.username),
      ...element('uri', actor.url),
      ...(actor.image ? [`<link rel="avatar" href="${escapeMarkup(actor.image)}" />`] : []),
    ]),
    '</author>',
  ];
}

function titleOf(obj: ObjectReference): string {
  return obj.displayName ?? extractFirstLine(obj.content) ?? extractFirstLine(obj.summary) ?? 'Untitled';
}

function categoryElements(tags: Tag[] = []): string[] {
  return tags.map((tag) => {
    const term = tag.url ?? tag.displayName ?? '';
    return `<category${attributes({
      term,
      scheme: TAG_SCHEMES[tag.objectType],
      label: tag.displayName !== undefined && tag.displayName !== term ? tag.displayName : undefined,
    })} />`;
  });
}

function attachmentLinks(attachments: CanonicalObject[] = []): string[] {
  return attachments.flatMap((attachment) => {
    const url = mediaUrl(attachment);
    if (!url) return [];
    const media = attachment.objectType === 'image' || attachment.objectType === 'video' || attachment.objectType === 'audio';
    return [
      `<link${attributes({
        rel: media ? 'enclosure' : 'related',
        type: media ? guessMimeType(url, attachment.objectType) : 'text/html',
        href: url,
        title: attachment.displayName,
      })} />`,
    ];
  });
}

function locationElements(location: Location | undefined): string[] {
  if (!location) return [];
  const point =
    location.latitude !== undefined && location.longitude !== undefined
      ? [`<georss:point>${location.latitude} ${location.longitude}</georss:point>`]
      : [];
  return [...point, ...element('georss:featureName', location.displayName)];
}

function objectElements(obj: ObjectReference): string[] {
  return [
    ...(obj.objectType ? [`<activity:object-type>${SCHEMA_BASE}${obj.objectType}</activity:object-type>`] : []),
    ...element('summary', obj.summary),
    ...(obj.content === undefined
      ? []
      : [`<content type="html">${escapeMarkup(renderContent(obj.content, obj.tags))}</content>`]),
    ...categoryElements(obj.tags),
    ...attachmentLinks(obj.attachments),
    ...(obj.inReplyTo ?? []).map((ref) => `<thr:in-reply-to${attributes({ ref: ref.id ?? ref.url, href: ref.url })} />`),
    ...locationElements(obj.location),
  ];
}

function alternateLink(url: string | undefined): string[] {
  return url ? [`<link rel="alternate" type="text/html" href="${escapeMarkup(url)}" />`] : [];
}

function entryLines(activity: Activity, namespaces = false): string[] {
  const { object } = activity;
  const post = POST_VERBS.has(activity.verb);
  const id = activity.id ?? activity.url ?? (post ? object.id ?? object.url : undefined) ?? object.id ?? object.url;
  if (!id) {
    throw new EncodingError('An Atom entry needs an id or url');
  }

  const url = activity.url ?? (post ? object.url : undefined);
  const published = activity.published ?? (post ? object.published : undefined);
  const updated = activity.updated ?? (post ? object.updated : undefined) ?? published;
  const verb = `<activity:verb>${SCHEMA_BASE}${activity.verb}</activity:verb>`;

  const body = post
    ? [verb, ...objectElements(object)]
    : [
        verb,
        ...(activity.content === undefined ? [] : [`<content type="html">${escapeMarkup(renderContent(activity.content))}</content>`]),
        '<activity:object>',
        ...indent([
          ...element('id', object.id),
          ...element('title', object.displayName),
          ...authorElement(object.author),
          ...alternateLink(object.url),
          ...element('published', object.published),
          ...element('updated', object.updated),
          ...objectElements(object),
        ]),
        '</activity:object>',
      ];

  return [
    namespaces ? `<entry ${NAMESPACES}>` : '<entry>',
    ...indent([
      ...element('id', id),
      ...element('title', post ? titleOf(object) : `${activity.verb}: ${titleOf(object)}`),
      ...authorElement(activity.actor ?? (post ? object.author : undefined)),
      ...alternateLink(url),
      ...element('published', published),
      ...element('updated', updated),
      ...body,
    ]),
    '</entry>',
  ];
}

/**
 * A single activity as a standalone Atom entry document
 * @throws EncodingError when the activity has no id or url
 */
export function activityToAtom(activity: Activity): string {
  return ['<?xml version="1.0" encoding="UTF-8"?>', ...entryLines(activity, true), ''].join('\n');
}

function newestTimestamp(items: readonly Activity[]): string | undefined {
  const stamps = items
    .flatMap((item) => [item.updated, item.published, item.object.updated, item.object.published])
    .filter((stamp): stamp is string => stamp !== undefined)
    .sort();
  return stamps[stamps.length - 1];
}

/**
 * An envelope as an Atom feed
 * @throws EncodingError when no feed id can be determined
 */
export function activitiesToAtom(envelope: Envelope, options: AtomFeedOptions = {}): string {
  const hostUrl = options.hostUrl ?? options.actor?.url ?? envelope.items[0]?.actor?.url;
  if (!hostUrl) {
    throw new EncodingError('An Atom feed needs a hostUrl for its id and link');
  }

  const title = options.title ?? `Feed for ${options.actor?.displayName ?? options.actor?.username ?? hostUrl}`;

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<feed ${NAMESPACES}>`,
    ...indent([
      ...element('id', hostUrl),
      ...element('title', title),
      ...element('updated', newestTimestamp(envelope.items)),
      ...alternateLink(hostUrl),
      ...(options.requestUrl ? [`<link rel="self" type="application/atom+xml" href="${escapeMarkup(options.requestUrl)}" />`] : []),
      ...authorElement(options.actor),
      `<os:startIndex>${envelope.startIndex}</os:startIndex>`,
      `<os:itemsPerPage>${envelope.itemsPerPage}</os:itemsPerPage>`,
      `<os:totalResults>${envelope.totalResults}</os:totalResults>`,
      ...envelope.items.flatMap((activity) => entryLines(activity)),
    ]),
    '</feed>',
    '',
  ].join('\n');
}

// Decoding

const ARRAY_ELEMENTS = new Set(['entry', 'link', 'category', 'thr:in-reply-to']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  // Content keeps its edges; AtomTextSchema trims the other elements
  trimValues: false,
  isArray: (name) => ARRAY_ELEMENTS.has(name),
});

const AtomTextSchema = z
  .union([z.string(), z.object({ '#text': z.string().optional() }).transform((node) => node['#text'] ?? '')])
  .transform((text) => text.trim());

const AtomContentSchema = z.union([
  z.string().transform((text) => ({ text, type: 'text' })),
  z
    .object({ '#text': z.string().optional(), '@_type': z.string().optional() })
    .transform((node) => ({ text: node['#text'] ?? '', type: node['@_type'] ?? 'text' })),
]);

const AtomLinkSchema = z.object({
  '@_href': z.string(),
  '@_rel': z.string().optional(),
  '@_type': z.string().optional(),
  '@_title': z.string().optional(),
});

const AtomPersonSchema = z.object({
  id: AtomTextSchema.optional(),
  name: AtomTextSchema.optional(),
  uri: AtomTextSchema.optional(),
  link: z.array(AtomLinkSchema).optional(),
});

const AtomCategorySchema = z.object({
  '@_term': z.string(),
  '@_scheme': z.string().optional(),
  '@_label': z.string().optional(),
});

const AtomReplySchema = z.object({
  '@_ref': z.string().optional(),
  '@_href': z.string().optional(),
});

const atomObjectShape = {
  id: AtomTextSchema.optional(),
  title: AtomTextSchema.optional(),
  summary: AtomTextSchema.optional(),
  published: AtomTextSchema.optional(),
  updated: AtomTextSchema.optional(),
  author: AtomPersonSchema.optional(),
  link: z.array(AtomLinkSchema).optional(),
  content: AtomContentSchema.optional(),
  category: z.array(AtomCategorySchema).optional(),
  'activity:object-type': AtomTextSchema.optional(),
  'thr:in-reply-to': z.array(AtomReplySchema).optional(),
  'georss:point': AtomTextSchema.optional(),
  'georss:featureName': AtomTextSchema.optional(),
};

const AtomObjectSchema = z.object(atomObjectShape);

const AtomEntrySchema = z.object({
  ...atomObjectShape,
  'activity:verb': AtomTextSchema.optional(),
  'activity:object': AtomObjectSchema.optional(),
});

const AtomFeedSchema = z.object({
  entry: z.array(AtomEntrySchema).optional(),
  'os:startIndex': AtomTextSchema.optional(),
  'os:totalResults': AtomTextSchema.optional(),
});

type AtomObject = z.infer<typeof AtomObjectSchema>;
type AtomEntry = z.infer<typeof AtomEntrySchema>;
type AtomCategory = z.infer<typeof AtomCategorySchema>;

function lastSegment(uri: string | undefined): string | undefined {
  return uri?.split('/').pop();
}

function verbOf(uri: string | undefined): Verb {
  const result = VerbSchema.safeParse(lastSegment(uri));
  return result.success ? result.data : 'post';
}

function objectTypeOf(uri: string | undefined, fallback: ObjectType): ObjectType {
  const result = ObjectTypeSchema.safeParse(lastSegment(uri));
  return result.success ? result.data : fallback;
}

function isAbsoluteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

function categoryToTag(category: AtomCategory): Tag {
  const term = category['@_term'];
  const url = isAbsoluteUrl(term) ? term : undefined;
  const kind = TAG_TYPES.find((type) => TAG_SCHEMES[type] === category['@_scheme']);
  return {
    objectType: kind ?? (url ? 'article' : 'hashtag'),
    url,
    displayName: category['@_label'] ?? (url ? undefined : term),
  };
}

function contentAndTags(node: AtomObject): { content?: string; tags: Tag[] } {
  const floating = (node.category ?? []).map(categoryToTag);
  if (!node.content) {
    return { tags: floating };
  }

  if (node.content.type !== 'html') {
    return { content: node.content.text || undefined, tags: floating };
  }

  const annotated = htmlToText(node.content.text);
  const anchored = linksToTags(annotated.links);
  for (const tag of anchored) {
    const index = floating.findIndex(
      (candidate) =>
        candidate.objectType === tag.objectType &&
        candidate.url === tag.url &&
        (candidate.displayName === undefined || candidate.displayName === tag.displayName)
    );
    if (index >= 0) {
      floating.splice(index, 1);
    }
  }
  return { content: annotated.text || undefined, tags: [...anchored, ...floating] };
}

function alternateHref(node: AtomObject): string | undefined {
  return node.link?.find((link) => (link['@_rel'] ?? 'alternate') === 'alternate')?.['@_href'];
}

function linkAttachments(node: AtomObject): CanonicalObject[] {
  return (node.link ?? []).flatMap((link): CanonicalObject[] => {
    const href = link['@_href'];
    if (link['@_rel'] === 'enclosure') {
      const objectType = mediaObjectType(link['@_type']) ?? 'image';
      return [
        objectType === 'image'
          ? { objectType, image: href, displayName: link['@_title'] }
          : { objectType, stream: href, displayName: link['@_title'] },
      ];
    }
    if (link['@_rel'] === 'related') {
      return [{ objectType: 'note', url: href, displayName: link['@_title'] }];
    }
    return [];
  });
}

function locationOf(node: AtomObject): Location | undefined {
  const [latitude, longitude] = (node['georss:point'] ?? '').split(/\s+/).map(Number.parseFloat);
  const location: Location = {
    displayName: node['georss:featureName'],
    latitude: Number.isFinite(latitude) ? latitude : undefined,
    longitude: Number.isFinite(longitude) ? longitude : undefined,
  };
  return Object.values(location).some((value) => value !== undefined) ? location : undefined;
}

function personToActor(person: AtomObject['author']): Actor | undefined {
  if (!person) return undefined;
  return {
    id: person.id,
    displayName: person.name,
    url: person.uri,
    image: person.link?.find((link) => link['@_rel'] === 'avatar')?.['@_href'],
  };
}

function nodeToObject(node: AtomObject, titleIsName: boolean): CanonicalObject {
  const objectType = objectTypeOf(node['activity:object-type'], 'note');
  return {
    objectType,
    displayName: titleIsName || objectType === 'article' ? node.title : undefined,
    summary: node.summary,
    ...contentAndTags(node),
    attachments: linkAttachments(node),
    inReplyTo: (node['thr:in-reply-to'] ?? []).map((ref) => ({
      id: ref['@_ref'] === ref['@_href'] ? undefined : ref['@_ref'],
      url: ref['@_href'],
    })),
    location: locationOf(node),
  };
}

function entryToActivity(entry: AtomEntry): Activity {
  const verb = verbOf(entry['activity:verb']);
  const inner = entry['activity:object'];
  const common = {
    verb,
    id: entry.id,
    url: alternateHref(entry),
    published: entry.published,
    // <updated> is required, so encoders repeat the published time
    updated: entry.updated === entry.published ? undefined : entry.updated,
    actor: personToActor(entry.author),
  };

  if (inner) {
    return {
      ...common,
      content: entry.content?.text ? htmlToText(entry.content.text).text : undefined,
      object: {
        ...nodeToObject(inner, true),
        id: inner.id,
        url: alternateHref(inner),
        published: inner.published,
        updated: inner.updated,
        author: personToActor(inner.author),
      },
    };
  }

  return {
    ...common,
    object: {
      ...nodeToObject(entry, false),
      id: entry.id,
      url: common.url,
      published: common.published,
      updated: common.updated,
    },
  };
}

function parseDocument(xml: string): Record<string, unknown> {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new DecodingError(`Invalid XML at line ${valid.err.line}: ${valid.err.msg}`);
  }
  const parsed: unknown = parser.parse(xml);
  return z.record(z.unknown()).parse(parsed);
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DecodingError(`Invalid Atom ${what}: ${formatValidationErrors(result.error).join('; ')}`);
  }
  return result.data;
}

function build(activity: Activity): Activity {
  try {
    return createActivity(activity);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new DecodingError(`Invalid Atom entry: ${formatValidationErrors(error).join('; ')}`);
    }
    throw error;
  }
}

function rootName(document: Record<string, unknown>): string {
  return Object.keys(document).find((key) => !key.startsWith('?') && !key.startsWith('#')) ?? 'nothing';
}

function parseFeed(xml: string): z.infer<typeof AtomFeedSchema> {
  const document = parseDocument(xml);
  if (!('feed' in document)) {
    throw new DecodingError(`Expected root feed element; got ${rootName(document)}`);
  }
  // A feed without child elements parses as its text
  return decode(AtomFeedSchema, typeof document.feed === 'string' ? {} : document.feed, 'feed');
}

/**
 * Decode every entry of an Atom feed
 * @throws DecodingError for invalid XML or a root other than feed
 */
export function atomToActivities(xml: string): Activity[] {
  return (parseFeed(xml).entry ?? []).map((entry) => build(entryToActivity(entry)));
}

/**
 * Decode an Atom feed into an envelope, reading OpenSearch paging elements
 */
export function atomToEnvelope(xml: string): Envelope {
  const feed = parseFeed(xml);
  const items = (feed.entry ?? []).map((entry) => build(entryToActivity(entry)));
  const startIndex = Number.parseInt(feed['os:startIndex'] ?? '0', 10);
  const totalResults = Number.parseInt(feed['os:totalResults'] ?? `${items.length}`, 10);
  return createEnvelope({
    items,
    startIndex: Number.isInteger(startIndex) && startIndex >= 0 ? startIndex : 0,
    itemsPerPage: items.length,
    totalResults: Number.isInteger(totalResults) && totalResults >= 0 ? totalResults : items.length,
  });
}

/**
 * Decode a standalone Atom entry
 * @throws DecodingError for invalid XML or a root other than entry
 */
export function atomToActivity(xml: string): Activity {
  const document = parseDocument(xml);
  if (!('entry' in document)) {
    throw new DecodingError(`Expected root entry element; got ${rootName(document)}`);
  }
  const entries = decode(
    z.union([z.array(AtomEntrySchema), AtomEntrySchema.transform((entry) => [entry])]),
    document.entry,
    'entry'
  );
  const [entry] = entries;
  if (!entry) {
    throw new DecodingError('Expected root entry element; got nothing');
  }
  return build(entryToActivity(entry));
}
