/**
 * microformats2 HTML codec
 *
 * Encoding renders the mf2 JSON tree of an activity as class-annotated
 * markup, one element per property value. Decoding runs the markup through
 * microformats-parser and hands the parsed document to the mf2 JSON decoder.
 */

import { mf2 } from 'microformats-parser';
import type { Activity, Actor } from '../../schemas/index.js';
import { formatValidationErrors } from '../../schemas/index.js';
import { escapeMarkup, htmlToText } from '../../normalizers/html.js';
import { DecodingError } from '../../src/errors.js';
import type { Mf2Item, Mf2Property } from './json.js';
import { Mf2DocumentSchema, activitiesToMf2, activityToMf2, actorToMf2, mf2ToActivities, mf2ToActor } from './json.js';

export interface HtmlDecodeOptions {
  /** Base for resolving relative URLs */
  baseUrl?: string;
}

export interface HtmlDocumentOptions {
  title?: string;
}

const DEFAULT_BASE_URL = 'http://localhost/';

const URL_PROPERTIES = new Set([
  'url',
  'photo',
  'video',
  'audio',
  'featured',
  'in-reply-to',
  'repost-of',
  'like-of',
  'follow-of',
  'tag-of',
  'quotation-of',
]);
const DATE_PROPERTIES = new Set(['published', 'updated']);
const DATA_PROPERTIES = new Set(['uid', 'rsvp', 'latitude', 'longitude']);
const IMAGE_PROPERTIES = new Set(['photo', 'featured']);

function propertyClass(name: string): string {
  if (name === 'content') return `e-${name}`;
  if (URL_PROPERTIES.has(name)) return `u-${name}`;
  if (DATE_PROPERTIES.has(name)) return `dt-${name}`;
  return `p-${name}`;
}

function renderText(cls: string, name: string, value: string): string {
  const escaped = escapeMarkup(value);
  if (cls.startsWith('u-')) {
    if (IMAGE_PROPERTIES.has(name)) return `<img class="${cls}" src="${escaped}" />`;
    if (name === 'video') return `<video class="${cls}" src="${escaped}" controls></video>`;
    if (name === 'audio') return `<audio class="${cls}" src="${escaped}" controls></audio>`;
    return `<a class="${cls}" href="${escaped}">${escaped}</a>`;
  }
  if (cls.startsWith('dt-')) {
    return `<time class="${cls}" datetime="${escaped}"></time>`;
  }
  if (DATA_PROPERTIES.has(name)) {
    return `<data class="${cls}" value="${escaped}"></data>`;
  }
  return `<div class="${cls}">${escaped}</div>`;
}

function renderValue(name: string, value: Mf2Property): string {
  const cls = propertyClass(name);
  if (typeof value === 'string') {
    return renderText(cls, name, value);
  }
  if ('type' in value) {
    return renderItem(value, [cls]);
  }
  if ('html' in value) {
    return `<div class="${cls}">${value.html}</div>`;
  }
  return `<img class="${cls}" src="${escapeMarkup(value.value)}" alt="${escapeMarkup(value.alt)}" />`;
}

/**
 * Categories repeated from anchors inside e-content are already in the
 * markup
 */
function anchoredCount(item: Mf2Item): number {
  const content = item.properties.content?.[0];
  if (content === undefined || typeof content === 'string' || !('html' in content)) {
    return 0;
  }
  return htmlToText(content.html).links.filter(
    (link) => link.classes.includes('h-card') || link.classes.includes('p-category')
  ).length;
}

function renderItem(item: Mf2Item, propertyClasses: string[] = []): string {
  const element = item.type.includes('h-entry') && propertyClasses.length === 0 ? 'article' : 'div';
  const skip = anchoredCount(item);

  const parts = Object.entries(item.properties).flatMap(([name, values]) =>
    (name === 'category' ? values.slice(skip) : values).map((value) => renderValue(name, value))
  );
  for (const child of item.children ?? []) {
    parts.push(renderItem(child));
  }

  const classes = [...propertyClasses, ...item.type].join(' ');
  return `<${element} class="${classes}">\n${parts.join('\n')}\n</${element}>`;
}

/**
 * An activity as an h-entry element
 */
export function activityToHtml(activity: Activity): string {
  return renderItem(activityToMf2(activity));
}

export function actorToHtml(actor: Actor): string {
  return renderItem(actorToMf2(actor));
}

/**
 * A complete HTML document holding an h-feed of activities
 */
export function activitiesToHtml(activities: readonly Activity[], options: HtmlDocumentOptions = {}): string {
  const [feed] = activitiesToMf2(activities, options.title).items;
  const title = options.title ? `<title>${escapeMarkup(options.title)}</title>\n` : '';
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    `<meta charset="utf-8">\n${title}</head>`,
    '<body>',
    feed ? renderItem(feed) : '',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

/**
 * Embedded markup comes back with a decoded &#13; as a bare CR, which the
 * next HTML parse would read as LF
 */
function restoreCarriageReturns(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(restoreCarriageReturns);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [
        key,
        key === 'html' && typeof inner === 'string' ? inner.replace(/\r/g, '&#13;') : restoreCarriageReturns(inner),
      ])
    );
  }
  return value;
}

function parse(html: string, options: HtmlDecodeOptions): unknown {
  try {
    return restoreCarriageReturns(mf2(html, { baseUrl: options.baseUrl ?? DEFAULT_BASE_URL }));
  } catch (error) {
    throw new DecodingError(`Could not parse microformats2 HTML: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Decode every h-entry in a document
 * @throws DecodingError when the document holds no h-entry
 */
export function htmlToActivities(html: string, options: HtmlDecodeOptions = {}): Activity[] {
  return mf2ToActivities(parse(html, options));
}

/**
 * Decode the first h-entry in a document
 */
export function htmlToActivity(html: string, options: HtmlDecodeOptions = {}): Activity {
  const [first] = htmlToActivities(html, options);
  if (!first) {
    throw new DecodingError('No h-entry found');
  }
  return first;
}

/**
 * Decode the first top-level h-card in a document
 */
export function htmlToActor(html: string, options: HtmlDecodeOptions = {}): Actor {
  const document = Mf2DocumentSchema.safeParse(parse(html, options));
  if (!document.success) {
    throw new DecodingError(`Invalid microformats2 document: ${formatValidationErrors(document.error).join('; ')}`);
  }
  const card = document.data.items.find((item) => item.type.includes('h-card'));
  if (!card) {
    throw new DecodingError('No h-card found');
  }
  return mf2ToActor(card);
}
