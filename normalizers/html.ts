/**
 * Conversion between HTML and plain text with offset-annotated links
 *
 * `htmlToText` walks markup and reports every <a> element as a code point
 * range in the resulting text. `renderContent` is its inverse for the
 * markup it produces: plain text is escaped, newlines become <br />, and
 * each positioned tag is wrapped in an <a> element. Leading and trailing
 * whitespace is wrapped in a <span> so that parsers which trim markup keep
 * it.
 */

import { defaultTreeAdapter, parseFragment } from 'parse5';
import type { DefaultTreeAdapterMap } from 'parse5';
import { stringifyEntities } from 'stringify-entities';
import type { Tag } from '../schemas/types.js';
import { codepointLength, sliceCodepoints } from './offsets.js';

type ParentNode = DefaultTreeAdapterMap['parentNode'];
type Element = DefaultTreeAdapterMap['element'];

/**
 * An <a> element found while converting HTML to text
 */
export interface TextLink {
  /** Code point offset of the link text */
  start: number;
  /** Code point length of the link text */
  length: number;
  text: string;
  href?: string;
  title?: string;
  classes: string[];
}

export interface AnnotatedText {
  text: string;
  links: TextLink[];
}

const SKIPPED_ELEMENTS = new Set(['script', 'style', 'template']);
const PARAGRAPH_ELEMENTS = new Set(['p']);
const LINE_ELEMENTS = new Set(['div', 'li', 'blockquote', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'pre', 'ul', 'ol']);

/**
 * Escape text for HTML or XML element content and double-quoted attributes
 */
export function escapeMarkup(value: string): string {
  return stringifyEntities(value, {
    subset: ['&', '<', '>', '"'],
    useNamedReferences: true,
  });
}

function attribute(element: Element, name: string): string | undefined {
  return defaultTreeAdapter.getAttrList(element).find((attr) => attr.name === name)?.value;
}

/**
 * Class names of an element
 */
export function classList(element: Element): string[] {
  return (attribute(element, 'class') ?? '').split(/\s+/).filter(Boolean);
}

/**
 * Convert HTML to plain text, recording the position of every link
 */
export function htmlToText(html: string): AnnotatedText {
  let text = '';
  let length = 0;
  const links: TextLink[] = [];

  const append = (value: string) => {
    text += value;
    length += codepointLength(value);
  };

  const ensureTrailingNewlines = (count: number) => {
    if (length === 0) return;
    let existing = 0;
    while (existing < count && text.endsWith('\n'.repeat(existing + 1))) {
      existing++;
    }
    append('\n'.repeat(count - existing));
  };

  const walk = (parent: ParentNode) => {
    for (const node of defaultTreeAdapter.getChildNodes(parent)) {
      if (defaultTreeAdapter.isTextNode(node)) {
        append(defaultTreeAdapter.getTextNodeContent(node));
        continue;
      }
      if (!defaultTreeAdapter.isElementNode(node)) {
        continue;
      }

      const tagName = defaultTreeAdapter.getTagName(node);
      if (SKIPPED_ELEMENTS.has(tagName)) {
        continue;
      }
      if (tagName === 'br') {
        append('\n');
        continue;
      }
      if (PARAGRAPH_ELEMENTS.has(tagName)) {
        ensureTrailingNewlines(2);
      } else if (LINE_ELEMENTS.has(tagName)) {
        ensureTrailingNewlines(1);
      }

      if (tagName === 'a') {
        const start = length;
        const before = text;
        walk(node);
        links.push({
          start,
          length: length - start,
          text: text.slice(before.length),
          href: attribute(node, 'href'),
          title: attribute(node, 'title'),
          classes: classList(node),
        });
        continue;
      }

      walk(node);
    }
  };

  walk(parseFragment(html));
  return { text, links };
}

/**
 * Split tags into those that can be rendered inline and the rest.
 * A positioned tag overlapping an earlier one cannot be anchored.
 */
export function partitionTags(tags: Tag[] = []): { anchored: Tag[]; floating: Tag[] } {
  const anchored: Tag[] = [];
  const floating: Tag[] = [];
  let end = 0;

  const positioned = tags
    .filter((tag) => tag.startIndex !== undefined && tag.length !== undefined)
    .sort((a, b) => (a.startIndex ?? 0) - (b.startIndex ?? 0));

  for (const tag of positioned) {
    const start = tag.startIndex ?? 0;
    if (start >= end) {
      anchored.push(tag);
      end = start + (tag.length ?? 0);
    } else {
      floating.push(tag);
    }
  }

  for (const tag of tags) {
    if (tag.startIndex === undefined || tag.length === undefined) {
      floating.push(tag);
    }
  }

  return { anchored, floating };
}

/**
 * CSS classes marking a tag's type in rendered markup
 */
export function tagClasses(tag: Tag): string[] {
  switch (tag.objectType) {
    case 'mention':
      return ['u-category', 'h-card'];
    case 'hashtag':
      return ['p-category'];
    case 'article':
      return [];
  }
}

/**
 * HTML parsers turn a bare CR into LF, a character reference survives
 */
function escapeText(value: string): string {
  return escapeMarkup(value).replace(/\r/g, '&#13;').replace(/\n/g, '<br />');
}

function renderSegment(value: string, leading: boolean, trailing: boolean): string {
  const head = leading ? (/^\s*/.exec(value)?.[0] ?? '') : '';
  const rest = value.slice(head.length);
  const tail = trailing ? (/\s*$/.exec(rest)?.[0] ?? '') : '';
  const body = rest.slice(0, rest.length - tail.length);
  const guard = (space: string) => (space ? `<span>${escapeText(space)}</span>` : '');
  return guard(head) + escapeText(body) + guard(tail);
}

/**
 * Render plain text as HTML, wrapping each anchored tag in a link
 */
export function renderContent(content: string, tags: Tag[] = []): string {
  const { anchored } = partitionTags(tags);
  let html = '';
  let cursor = 0;

  for (const tag of anchored) {
    const start = tag.startIndex ?? 0;
    const end = start + (tag.length ?? 0);
    const linked = sliceCodepoints(content, start, end);

    html += renderSegment(sliceCodepoints(content, cursor, start), cursor === 0, false);

    const attrs: string[] = [];
    const classes = tagClasses(tag);
    if (classes.length > 0) {
      attrs.push(`class="${classes.join(' ')}"`);
    }
    if (tag.url) {
      attrs.push(`href="${escapeMarkup(tag.url)}"`);
    }
    if (tag.displayName !== undefined && tag.displayName !== linked) {
      attrs.push(`title="${escapeMarkup(tag.displayName)}"`);
    }

    html += `<a${attrs.map((attr) => ` ${attr}`).join('')}>${escapeText(linked)}</a>`;
    cursor = end;
  }

  html += renderSegment(sliceCodepoints(content, cursor), cursor === 0, true);
  return html;
}

/**
 * Rebuild tags from the links found by htmlToText
 *
 * The inverse of the anchors written by renderContent: link classes give the
 * tag type, a title attribute overrides the linked text as display name.
 */
export function linksToTags(links: TextLink[]): Tag[] {
  return links.map((link) => {
    const objectType = link.classes.includes('h-card') || link.classes.includes('mention') && !link.classes.includes('hashtag')
      ? 'mention'
      : link.classes.includes('p-category') || link.classes.includes('hashtag')
        ? 'hashtag'
        : 'article';

    return {
      objectType,
      url: link.href || undefined,
      displayName: link.title ?? link.text,
      startIndex: link.start,
      length: link.length,
    };
  });
}
