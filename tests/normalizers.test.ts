import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  normalizeToUTC,
  tagUri,
  parseTagUri,
  truncateText,
  extractFirstLine,
  compact,
  deepFreeze,
  nativeId,
  firstNativeId,
  getSourceTypeMappings,
  mapSourceType,
  normalizeBatch,
  parsePayload,
  escapeMarkup,
  htmlToText,
  linksToTags,
  partitionTags,
  renderContent,
} from '../normalizers/index.js';
import type { Tag } from '../schemas/index.js';
import { createActivity } from '../schemas/index.js';
import { UpstreamFormatError } from '../src/errors.js';

describe('Normalization Utility Functions', () => {
  describe('normalizeToUTC', () => {
    it('should pass through already UTC timestamps', () => {
      expect(normalizeToUTC('2024-01-15T10:30:00Z')).toBe('2024-01-15T10:30:00Z');
      expect(normalizeToUTC('2024-01-15T10:30:00.123Z')).toBe('2024-01-15T10:30:00.123Z');
    });

    it('should convert timezone offset to UTC', () => {
      expect(normalizeToUTC('2024-01-15T10:00:00-08:00')).toBe('2024-01-15T18:00:00.000Z');
    });

    it('should accept offsets without a colon', () => {
      expect(normalizeToUTC('2024-01-15T10:00:00+0200')).toBe('2024-01-15T08:00:00.000Z');
    });

    it('should read timestamps without a zone as UTC', () => {
      expect(normalizeToUTC('2024-01-15T10:30:00')).toBe('2024-01-15T10:30:00.000Z');
    });

    it('should handle date-only input with noon UTC', () => {
      expect(normalizeToUTC('2024-01-15')).toBe('2024-01-15T12:00:00Z');
    });

    it('should return undefined for invalid input', () => {
      expect(normalizeToUTC('invalid-timestamp')).toBeUndefined();
    });
  });

  describe('tag URIs', () => {
    it('should build and parse tag URIs', () => {
      expect(tagUri('twitter.com', '123')).toBe('tag:twitter.com:123');
      expect(parseTagUri('twitter.com', 'tag:twitter.com:123')).toBe('123');
    });

    it('should not parse URIs of another domain', () => {
      expect(parseTagUri('twitter.com', 'tag:facebook.com:123')).toBeUndefined();
    });
  });

  describe('nativeId', () => {
    it('should prefer the tag URI', () => {
      expect(nativeId('twitter.com', { id: 'tag:twitter.com:123', url: 'https://twitter.com/a/status/456' })).toBe('123');
    });

    it('should fall back to the last URL segment', () => {
      expect(nativeId('twitter.com', { url: 'https://twitter.com/a/status/456' })).toBe('456');
      expect(nativeId('twitter.com', { id: 'tag:facebook.com:1', url: 'https://twitter.com/a/status/789' })).toBe('789');
    });

    it('should return undefined without a usable reference', () => {
      expect(nativeId('twitter.com', { id: 'tag:facebook.com:1' })).toBeUndefined();
      expect(nativeId('twitter.com', undefined)).toBeUndefined();
    });

    it('should ignore URLs on other hosts', () => {
      expect(nativeId('twitter.com', { url: 'https://example.com/blog/my-post' })).toBeUndefined();
      expect(nativeId('twitter.com', { url: 'https://nottwitter.com/a/status/1' })).toBeUndefined();
      expect(nativeId('twitter.com', { url: 'not a url' })).toBeUndefined();
    });

    it('should accept subdomains and extra hosts', () => {
      expect(nativeId('facebook.com', { url: 'https://www.facebook.com/ann/posts/12' })).toBe('12');
      expect(nativeId('twitter.com', { url: 'https://x.com/a/status/7' }, ['twitter.com', 'x.com'])).toBe('7');
    });
  });

  describe('firstNativeId', () => {
    it('should skip references that do not resolve', () => {
      expect(
        firstNativeId('twitter.com', [{ url: 'http://example.com/post' }, { url: 'https://twitter.com/bob/status/123' }])
      ).toBe('123');
      expect(firstNativeId('twitter.com', [{ url: 'http://example.com/post' }])).toBeUndefined();
      expect(firstNativeId('twitter.com', undefined)).toBeUndefined();
    });
  });

  describe('truncateText', () => {
    it('should return undefined for null/undefined/empty', () => {
      expect(truncateText(null)).toBeUndefined();
      expect(truncateText(undefined)).toBeUndefined();
      expect(truncateText('')).toBeUndefined();
      expect(truncateText('   ')).toBeUndefined();
    });

    it('should pass through short text', () => {
      expect(truncateText('Short text')).toBe('Short text');
    });

    it('should truncate long text with an ellipsis', () => {
      expect(truncateText('abcdef', 4)).toBe('abc…');
    });

    it('should not split astral characters', () => {
      expect(truncateText('😀😀😀😀', 3)).toBe('😀😀…');
    });
  });

  describe('extractFirstLine', () => {
    it('should return the first line', () => {
      expect(extractFirstLine('  Title\nbody text')).toBe('Title');
    });

    it('should return undefined for empty input', () => {
      expect(extractFirstLine('')).toBeUndefined();
      expect(extractFirstLine(undefined)).toBeUndefined();
    });
  });

  describe('compact', () => {
    it('should drop empty values recursively', () => {
      expect(compact({ a: '', b: [], c: { d: undefined }, e: 0, f: [null, 'x'], g: false })).toEqual({
        e: 0,
        f: ['x'],
        g: false,
      });
    });

    it('should return undefined for an object left empty', () => {
      expect(compact({ a: { b: '' } })).toBeUndefined();
    });
  });

  describe('deepFreeze', () => {
    it('should freeze nested objects and arrays', () => {
      const value = deepFreeze({ a: { b: [1, 2] } });
      expect(Object.isFrozen(value)).toBe(true);
      expect(Object.isFrozen(value.a)).toBe(true);
      expect(Object.isFrozen(value.a.b)).toBe(true);
    });
  });
});

describe('Type mappings', () => {
  it('should map every source', () => {
    for (const source of ['twitter', 'facebook', 'instagram', 'mastodon', 'bluesky'] as const) {
      expect(getSourceTypeMappings(source).length).toBeGreaterThan(0);
    }
  });

  it('should map reposts to share', () => {
    expect(mapSourceType('twitter', 'retweet')?.verb).toBe('share');
    expect(mapSourceType('mastodon', 'reblog')?.verb).toBe('share');
    expect(mapSourceType('bluesky', 'repost')?.verb).toBe('share');
  });

  it('should map replies to comments', () => {
    expect(mapSourceType('twitter', 'reply')?.objectType).toBe('comment');
    expect(mapSourceType('facebook', 'comment')?.objectType).toBe('comment');
  });

  it('should return null for unknown kinds', () => {
    expect(mapSourceType('twitter', 'direct_message')).toBeNull();
    expect(mapSourceType('instagram', 'REEL')).toBeNull();
  });
});

describe('normalizeBatch', () => {
  const ItemSchema = z.object({ n: z.number() });
  const convert = (item: { n: number }) =>
    createActivity({ verb: 'post', object: { objectType: 'note', content: `item ${item.n}` } });

  it('should skip malformed items and keep the rest', () => {
    const result = normalizeBatch('twitter', [{ n: 1 }, { n: 'x' }, { n: 3 }, null], ItemSchema, convert);

    expect(result.source).toBe('twitter');
    expect(result.activities.map((activity) => activity.object.content)).toEqual(['item 1', 'item 3']);
    expect(result.warnings.map((warning) => warning.itemIndex)).toEqual([1, 3]);
    expect(result.warnings[0].error).toBeInstanceOf(UpstreamFormatError);
    expect(result.warnings[0].error.source).toBe('twitter');
    expect(result.warnings[0].error.itemIndex).toBe(1);
  });

  it('should record conversion failures as warnings', () => {
    const result = normalizeBatch('mastodon', [{ n: 1 }, { n: 2 }], ItemSchema, (item) => {
      if (item.n === 2) {
        throw new UpstreamFormatError('Unrecognized mastodon item kind: poll', 'mastodon');
      }
      return convert(item);
    });

    expect(result.activities).toHaveLength(1);
    expect(result.warnings[0].itemIndex).toBe(1);
    expect(result.warnings[0].error.message).toBe('Unrecognized mastodon item kind: poll');
  });

  it('should fail when every item is malformed', () => {
    expect(() => normalizeBatch('twitter', [{}, { n: 'x' }], ItemSchema, convert)).toThrow(
      /^All 2 twitter items failed to normalize \(first: n: Required\)$/
    );
  });

  it('should accept an empty batch', () => {
    const result = normalizeBatch('bluesky', [], ItemSchema, convert);
    expect(result.activities).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('should not swallow programming errors', () => {
    expect(() =>
      normalizeBatch('twitter', [{ n: 1 }], ItemSchema, () => {
        throw new TypeError('boom');
      })
    ).toThrow(TypeError);
  });

  it('should reject a malformed payload as a whole', () => {
    expect(() => parsePayload('facebook', z.object({ data: z.array(z.unknown()) }), { data: 'x' }, 'feed')).toThrow(
      'facebook feed is malformed: data: Expected array, received string'
    );
  });
});

describe('HTML and annotated text', () => {
  describe('escapeMarkup', () => {
    it('should escape markup characters with named references', () => {
      expect(escapeMarkup('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
    });

    it('should leave other characters alone', () => {
      expect(escapeMarkup("it's 😀")).toBe("it's 😀");
    });
  });

  describe('htmlToText', () => {
    it('should record link positions', () => {
      const result = htmlToText('<p>Hello <a href="https://example.com/bob" class="h-card">@bob</a></p><p>Bye</p>');

      expect(result.text).toBe('Hello @bob\n\nBye');
      expect(result.links).toEqual([
        { start: 6, length: 4, text: '@bob', href: 'https://example.com/bob', title: undefined, classes: ['h-card'] },
      ]);
    });

    it('should decode entities and line breaks', () => {
      expect(htmlToText('a &amp; b<br>c').text).toBe('a & b\nc');
    });

    it('should count positions in code points', () => {
      const result = htmlToText('😀 <a href="https://example.com/t">#t</a>');
      expect(result.links[0].start).toBe(2);
      expect(result.links[0].length).toBe(2);
    });

    it('should skip scripts', () => {
      expect(htmlToText('a<script>alert(1)</script>b').text).toBe('ab');
    });
  });

  describe('renderContent', () => {
    const content = 'hi @bob & #tag';
    const tags: Tag[] = [
      { objectType: 'mention', url: 'https://example.com/bob', displayName: 'Bob', startIndex: 3, length: 4 },
      { objectType: 'hashtag', displayName: 'tag', startIndex: 10, length: 4 },
    ];

    it('should wrap anchored tags in links', () => {
      expect(renderContent(content, tags)).toBe(
        'hi <a class="u-category h-card" href="https://example.com/bob" title="Bob">@bob</a> &amp; ' +
          '<a class="p-category" title="tag">#tag</a>'
      );
    });

    it('should render newlines as line breaks', () => {
      expect(renderContent('a\nb')).toBe('a<br />b');
    });

    it('should wrap leading and trailing whitespace in spans', () => {
      expect(renderContent('  hi Bob ', [{ objectType: 'mention', displayName: 'Bob', startIndex: 5, length: 3 }])).toBe(
        '<span>  </span>hi <a class="u-category h-card">Bob</a><span> </span>'
      );
      expect(renderContent(' a b\n')).toBe('<span> </span>a b<span><br /></span>');
    });

    it('should write carriage returns as character references', () => {
      expect(renderContent('a\r\nb')).toBe('a&#13;<br />b');
      expect(htmlToText(renderContent('a\r\nb')).text).toBe('a\r\nb');
    });

    it('should be reversed by htmlToText and linksToTags', () => {
      const annotated = htmlToText(renderContent(content, tags));
      expect(annotated.text).toBe(content);
      expect(linksToTags(annotated.links)).toEqual(tags);
    });
  });

  describe('partitionTags', () => {
    it('should float overlapping and offset-less tags', () => {
      const first: Tag = { objectType: 'article', url: 'https://example.com/a', startIndex: 0, length: 5 };
      const overlapping: Tag = { objectType: 'hashtag', displayName: 'b', startIndex: 2, length: 2 };
      const floating: Tag = { objectType: 'hashtag', displayName: 'c' };

      expect(partitionTags([overlapping, floating, first])).toEqual({
        anchored: [first],
        floating: [overlapping, floating],
      });
    });
  });

  describe('linksToTags', () => {
    it('should read Mastodon link classes', () => {
      const tags = linksToTags([
        { start: 0, length: 4, text: '@bob', href: 'https://example.com/@bob', classes: ['u-url', 'mention'] },
        { start: 5, length: 4, text: '#fun', href: 'https://example.com/tags/fun', classes: ['mention', 'hashtag'] },
        { start: 10, length: 3, text: 'web', href: 'https://example.com/', classes: [] },
      ]);

      expect(tags.map((tag) => tag.objectType)).toEqual(['mention', 'hashtag', 'article']);
      expect(tags[1].displayName).toBe('#fun');
    });
  });
});
