import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import type { Tag } from '../schemas/index.js';
import {
  ActorSchema,
  SourceIdSchema,
  VerbSchema,
  createActivity,
  createActor,
  createEnvelope,
  createObject,
  formatValidationErrors,
  orderTags,
  safeValidateActivity,
} from '../schemas/index.js';

describe('Canonical model enums', () => {
  it('should accept every source', () => {
    for (const source of ['twitter', 'facebook', 'instagram', 'mastodon', 'bluesky']) {
      expect(SourceIdSchema.safeParse(source).success).toBe(true);
    }
  });

  it('should reject unknown verbs', () => {
    expect(VerbSchema.safeParse('retweet').success).toBe(false);
    expect(VerbSchema.safeParse('rsvp-interested').success).toBe(true);
  });
});

describe('createActivity', () => {
  it('should build a frozen activity', () => {
    const activity = createActivity({ verb: 'post', object: { objectType: 'note', content: 'hi' } });

    expect(activity).toEqual({ verb: 'post', object: { objectType: 'note', content: 'hi' } });
    expect(Object.isFrozen(activity)).toBe(true);
    expect(Object.isFrozen(activity.object)).toBe(true);
  });

  it('should normalize timestamps to UTC', () => {
    const activity = createActivity({
      verb: 'post',
      published: '2024-01-15T10:00:00-08:00',
      object: { objectType: 'note', published: '2024-01-15' },
    });

    expect(activity.published).toBe('2024-01-15T18:00:00.000Z');
    expect(activity.object.published).toBe('2024-01-15T12:00:00Z');
  });

  it('should drop empty optional fields', () => {
    const activity = createActivity({
      verb: 'post',
      object: { objectType: 'note', content: '', tags: [], attachments: [] },
    });

    expect(activity.object).toEqual({ objectType: 'note' });
    expect('content' in activity.object).toBe(false);
  });

  it('should reject an invalid verb', () => {
    const result = safeValidateActivity({ verb: 'jump', object: { objectType: 'note' } });
    expect(result.success).toBe(false);
  });

  it('should reject unparseable timestamps', () => {
    const result = safeValidateActivity({ verb: 'post', published: 'yesterday', object: { objectType: 'note' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual([
        'published: Timestamp must be parseable (e.g., 2024-01-15T10:30:00Z)',
      ]);
    }
  });

  it('should accept reply references without an object type', () => {
    const activity = createActivity({
      verb: 'post',
      object: { objectType: 'comment', inReplyTo: [{ url: 'https://example.com/notes/1' }] },
    });

    expect(activity.object.inReplyTo).toEqual([{ url: 'https://example.com/notes/1' }]);
  });
});

describe('Tag invariants', () => {
  it('should reject a tag range past the end of the content', () => {
    const result = safeValidateActivity({
      verb: 'post',
      object: {
        objectType: 'note',
        content: 'abc',
        tags: [{ objectType: 'hashtag', displayName: 'x', startIndex: 2, length: 2 }],
      },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual([
        'object.tags.0: Tag range [2, 4) exceeds content length 3',
      ]);
    }
  });

  it('should measure content in code points', () => {
    const object = createObject({
      objectType: 'note',
      content: '😀😀',
      tags: [{ objectType: 'hashtag', displayName: 'x', startIndex: 1, length: 1 }],
    });

    expect(object.tags?.[0].startIndex).toBe(1);
  });

  it('should require startIndex and length together', () => {
    const result = safeValidateActivity({
      verb: 'post',
      object: { objectType: 'note', content: 'abc', tags: [{ objectType: 'hashtag', startIndex: 0 }] },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toContain(
        'object.tags.0: startIndex and length must be given together'
      );
    }
  });

  it('should order positioned tags first', () => {
    const floating: Tag = { objectType: 'hashtag', displayName: 'later' };
    const second: Tag = { objectType: 'hashtag', displayName: 'b', startIndex: 5, length: 1 };
    const first: Tag = { objectType: 'hashtag', displayName: 'a', startIndex: 1, length: 1 };

    expect(orderTags([floating, second, first])).toEqual([first, second, floating]);
  });

  it('should order tags on construction', () => {
    const object = createObject({
      objectType: 'note',
      content: 'a b',
      tags: [
        { objectType: 'hashtag', displayName: 'b', startIndex: 2, length: 1 },
        { objectType: 'hashtag', displayName: 'a', startIndex: 0, length: 1 },
      ],
    });

    expect(object.tags?.map((tag) => tag.displayName)).toEqual(['a', 'b']);
  });
});

describe('createActor', () => {
  it('should reject an invalid url', () => {
    expect(ActorSchema.safeParse({ url: 'not a url' }).success).toBe(false);
    expect(() => createActor({ url: 'not a url' })).toThrow(ZodError);
  });

  it('should accept an actor with only a name', () => {
    expect(createActor({ displayName: 'Ann' })).toEqual({ displayName: 'Ann' });
  });
});

describe('createEnvelope', () => {
  const item = createActivity({ verb: 'post', object: { objectType: 'note', content: 'hi' } });

  it('should build a frozen envelope', () => {
    const envelope = createEnvelope({ items: [item], startIndex: 0, itemsPerPage: 1, totalResults: 5 });

    expect(envelope.totalResults).toBe(5);
    expect(Object.isFrozen(envelope.items)).toBe(true);
  });

  it('should keep an empty page', () => {
    expect(createEnvelope({ items: [], startIndex: 3, itemsPerPage: 0, totalResults: 0 })).toEqual({
      items: [],
      startIndex: 3,
      itemsPerPage: 0,
      totalResults: 0,
    });
  });

  it('should require itemsPerPage to match the items', () => {
    expect(() => createEnvelope({ items: [item], startIndex: 0, itemsPerPage: 2, totalResults: 2 })).toThrow(
      ZodError
    );
  });
});
