import { describe, it, expect } from 'vitest';
import type { Tag } from '../schemas/index.js';
import {
  atUriToWebUrl,
  createBlueskyAdapter,
  facetsToTags,
  postAtUri,
  tagsToFacets,
} from '../providers/bluesky/index.js';
import { AuthError, EncodingError, UnsupportedOperationError, UpstreamFormatError } from '../src/errors.js';

const ann = { did: 'did:plc:ann', handle: 'ann.test', displayName: 'Ann' };
const bob = { did: 'did:plc:bob', handle: 'bob.test' };

const annActor = {
  id: 'did:plc:ann',
  username: 'ann.test',
  displayName: 'Ann',
  url: 'https://bsky.app/profile/ann.test',
};
const bobActor = { id: 'did:plc:bob', username: 'bob.test', url: 'https://bsky.app/profile/bob.test' };

// "✨" is three UTF-8 bytes
const TEXT = 'Hi ✨ @bob.test #fun';
const FACETS = [
  {
    index: { byteStart: 7, byteEnd: 16 },
    features: [{ $type: 'app.bsky.richtext.facet#mention', did: 'did:plc:bob' }],
  },
  {
    index: { byteStart: 17, byteEnd: 21 },
    features: [{ $type: 'app.bsky.richtext.facet#tag', tag: 'fun' }],
  },
];
const TAGS: Tag[] = [
  {
    objectType: 'mention',
    url: 'https://bsky.app/profile/did:plc:bob',
    displayName: '@bob.test',
    startIndex: 5,
    length: 9,
  },
  {
    objectType: 'hashtag',
    url: 'https://bsky.app/hashtag/fun',
    displayName: 'fun',
    startIndex: 15,
    length: 4,
  },
];

function postView(overrides: Record<string, unknown> = {}, record: Record<string, unknown> = {}) {
  return {
    uri: 'at://did:plc:ann/app.bsky.feed.post/3k1',
    cid: 'bafy1',
    author: ann,
    record: { $type: 'app.bsky.feed.post', text: 'hello', createdAt: '2024-01-15T10:30:00.000Z', ...record },
    ...overrides,
  };
}

describe('Bluesky Adapter', () => {
  const adapter = createBlueskyAdapter({ appHost: 'bsky.app' });

  describe('URIs', () => {
    it('should map post URIs to web URLs', () => {
      expect(atUriToWebUrl('at://did:plc:ann/app.bsky.feed.post/3k1', 'bsky.app')).toBe(
        'https://bsky.app/profile/did:plc:ann/post/3k1'
      );
      expect(atUriToWebUrl('at://did:plc:ann/app.bsky.feed.like/3k1', 'bsky.app')).toBeUndefined();
    });

    it('should recover post URIs from ids and URLs', () => {
      expect(postAtUri({ id: 'at://did:plc:ann/app.bsky.feed.post/3k1' }, 'bsky.app')).toBe(
        'at://did:plc:ann/app.bsky.feed.post/3k1'
      );
      expect(postAtUri({ url: 'https://bsky.app/profile/ann.test/post/3k2' }, 'bsky.app')).toBe(
        'at://ann.test/app.bsky.feed.post/3k2'
      );
      expect(postAtUri({ url: 'https://bsky.app/profile/ann.test' }, 'bsky.app')).toBeUndefined();
    });

    it('should ignore post URLs on other hosts', () => {
      expect(postAtUri({ url: 'https://example.com/profile/ann.test/post/3k2' }, 'bsky.app')).toBeUndefined();
    });
  });

  describe('facets', () => {
    it('should convert byte ranges to code point offsets', () => {
      expect(facetsToTags(TEXT, FACETS, 'bsky.app')).toEqual(TAGS);
    });

    it('should convert code point offsets back to byte ranges', () => {
      expect(tagsToFacets(TEXT, TAGS)).toEqual(FACETS);
    });

    it('should drop offsets that split a character', () => {
      const tags = facetsToTags(
        TEXT,
        [{ index: { byteStart: 4, byteEnd: 6 }, features: [{ $type: 'app.bsky.richtext.facet#link', uri: 'https://example.com/' }] }],
        'bsky.app'
      );

      expect(tags).toEqual([{ objectType: 'article', url: 'https://example.com/', displayName: 'https://example.com/' }]);
    });

    it('should ignore unknown features', () => {
      expect(
        facetsToTags(TEXT, [{ index: { byteStart: 0, byteEnd: 2 }, features: [{ $type: 'app.example.bold' }] }], 'bsky.app')
      ).toEqual([]);
    });
  });

  describe('normalize', () => {
    it('should map a post with facets', () => {
      const { activities } = adapter.normalize({
        feed: [{ post: postView({}, { text: TEXT, facets: FACETS }) }],
      });

      expect(activities).toEqual([
        {
          verb: 'post',
          id: 'at://did:plc:ann/app.bsky.feed.post/3k1',
          url: 'https://bsky.app/profile/did:plc:ann/post/3k1',
          published: '2024-01-15T10:30:00.000Z',
          actor: annActor,
          object: {
            objectType: 'note',
            id: 'at://did:plc:ann/app.bsky.feed.post/3k1',
            url: 'https://bsky.app/profile/did:plc:ann/post/3k1',
            content: TEXT,
            published: '2024-01-15T10:30:00.000Z',
            tags: TAGS,
          },
        },
      ]);
    });

    it('should map a repost to a share by the reposter', () => {
      const { activities } = adapter.normalize({
        feed: [
          {
            post: postView(),
            reason: { $type: 'app.bsky.feed.defs#reasonRepost', by: bob, indexedAt: '2024-01-16T00:00:00.000Z' },
          },
        ],
      });

      expect(activities[0]).toEqual({
        verb: 'share',
        published: '2024-01-16T00:00:00.000Z',
        actor: bobActor,
        object: {
          objectType: 'note',
          id: 'at://did:plc:ann/app.bsky.feed.post/3k1',
          url: 'https://bsky.app/profile/did:plc:ann/post/3k1',
          content: 'hello',
          published: '2024-01-15T10:30:00.000Z',
          author: annActor,
        },
      });
    });

    it('should map a reply', () => {
      const parent = { uri: 'at://did:plc:bob/app.bsky.feed.post/1', cid: 'bafy0' };
      const { activities } = adapter.normalize({
        feed: [{ post: postView({}, { reply: { root: parent, parent } }) }],
      });

      expect(activities[0].object.objectType).toBe('comment');
      expect(activities[0].object.inReplyTo).toEqual([
        { id: 'at://did:plc:bob/app.bsky.feed.post/1', url: 'https://bsky.app/profile/did:plc:bob/post/1' },
      ]);
    });

    it('should attach media before the quoted post', () => {
      const { activities } = adapter.normalize({
        feed: [
          {
            post: postView({
              embed: {
                $type: 'app.bsky.embed.recordWithMedia#view',
                media: {
                  $type: 'app.bsky.embed.images#view',
                  images: [{ thumb: 'https://cdn.example/t.jpg', fullsize: 'https://cdn.example/f.jpg', alt: 'pic' }],
                },
                record: {
                  $type: 'app.bsky.embed.record#view',
                  record: {
                    $type: 'app.bsky.embed.record#viewRecord',
                    uri: 'at://did:plc:bob/app.bsky.feed.post/9',
                    author: bob,
                    value: { text: 'quoted', createdAt: '2024-01-14T09:00:00.000Z' },
                  },
                },
              },
            }),
          },
        ],
      });

      expect(activities[0].object.attachments).toEqual([
        { objectType: 'image', image: 'https://cdn.example/f.jpg', displayName: 'pic' },
        {
          objectType: 'note',
          id: 'at://did:plc:bob/app.bsky.feed.post/9',
          url: 'https://bsky.app/profile/did:plc:bob/post/9',
          content: 'quoted',
          published: '2024-01-14T09:00:00.000Z',
          author: bobActor,
        },
      ]);
    });

    it('should ignore unknown embeds', () => {
      const { activities } = adapter.normalize({
        feed: [{ post: postView({ embed: { $type: 'app.example.embed#view' } }) }],
      });

      expect(activities[0].object.attachments).toBeUndefined();
    });

    it('should wrap search results', () => {
      const { activities } = adapter.normalize({ posts: [postView()] });
      expect(activities.map((activity) => activity.id)).toEqual(['at://did:plc:ann/app.bsky.feed.post/3k1']);
    });

    it('should isolate malformed feed items', () => {
      const result = adapter.normalize({ feed: [{ post: postView() }, { post: { uri: 'x' } }] });

      expect(result.activities).toHaveLength(1);
      expect(result.warnings[0].itemIndex).toBe(1);
    });
  });

  describe('detectError', () => {
    it('should label XRPC errors', () => {
      const error = adapter.detectError({ error: 'ExpiredToken', message: 'Token has expired' });
      expect(error).toBeInstanceOf(AuthError);
      expect(error?.message).toBe('bluesky ExpiredToken: Token has expired');
    });

    it('should treat other errors as malformed payloads', () => {
      expect(adapter.detectError({ error: 'InternalServerError' })).toBeNull();
      expect(() => adapter.normalize({ error: 'InternalServerError' })).toThrow(UpstreamFormatError);
    });
  });

  describe('normalizeActor', () => {
    it('should map a profile', () => {
      expect(adapter.normalizeActor({ ...ann, avatar: 'https://cdn.example/ann.jpg' })).toEqual({
        ...annActor,
        image: 'https://cdn.example/ann.jpg',
      });
    });
  });

  describe('denormalize', () => {
    const published = '2024-01-15T10:30:00.000Z';

    it('should build a post record with facets', () => {
      expect(
        adapter.denormalize({ verb: 'post', published, object: { objectType: 'note', content: TEXT, tags: TAGS } })
      ).toEqual({
        source: 'bluesky',
        method: 'POST',
        endpoint: 'com.atproto.repo.createRecord',
        body: {
          collection: 'app.bsky.feed.post',
          record: { $type: 'app.bsky.feed.post', text: TEXT, createdAt: published, facets: FACETS },
        },
      });
    });

    it('should build a reply', () => {
      const request = adapter.denormalize({
        verb: 'post',
        published,
        object: { objectType: 'comment', content: 'yes', inReplyTo: [{ id: 'at://did:plc:bob/app.bsky.feed.post/1' }] },
      });

      expect(request.body).toEqual({
        collection: 'app.bsky.feed.post',
        record: {
          $type: 'app.bsky.feed.post',
          text: 'yes',
          createdAt: published,
          reply: {
            root: { uri: 'at://did:plc:bob/app.bsky.feed.post/1', cid: '' },
            parent: { uri: 'at://did:plc:bob/app.bsky.feed.post/1', cid: '' },
          },
        },
      });
    });

    it('should reply to the Bluesky post among the reply targets', () => {
      const request = adapter.denormalize({
        verb: 'post',
        published,
        object: {
          objectType: 'comment',
          content: 'yes',
          inReplyTo: [
            { url: 'http://example.com/post' },
            { url: 'https://mastodon.example/@alice/post' },
            { url: 'https://bsky.app/profile/did:plc:alice/post/parent-tid' },
          ],
        },
      });

      const parent = { uri: 'at://did:plc:alice/app.bsky.feed.post/parent-tid', cid: '' };
      expect(request.body).toEqual({
        collection: 'app.bsky.feed.post',
        record: { $type: 'app.bsky.feed.post', text: 'yes', createdAt: published, reply: { root: parent, parent } },
      });
    });

    it('should build a like from a post URL', () => {
      expect(
        adapter.denormalize({
          verb: 'like',
          published,
          object: { objectType: 'note', url: 'https://bsky.app/profile/did:plc:bob/post/9' },
        }).body
      ).toEqual({
        collection: 'app.bsky.feed.like',
        record: {
          $type: 'app.bsky.feed.like',
          subject: { uri: 'at://did:plc:bob/app.bsky.feed.post/9', cid: '' },
          createdAt: published,
        },
      });
    });

    it('should reject a repost of a page on another site', () => {
      expect(() =>
        adapter.denormalize({ verb: 'share', object: { objectType: 'note', url: 'https://example.com/blog/my-post' } })
      ).toThrow(new EncodingError('bluesky share needs a post with an at:// id or post url'));
    });

    it('should reject posts without text', () => {
      expect(() => adapter.denormalize({ verb: 'post', object: { objectType: 'note' } })).toThrow(EncodingError);
    });

    it('should not support RSVPs', () => {
      expect(() => adapter.denormalize({ verb: 'rsvp-no', object: { objectType: 'event' } })).toThrow(
        UnsupportedOperationError
      );
    });
  });
});
