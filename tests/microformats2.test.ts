import { describe, it, expect } from 'vitest';
import type { Activity } from '../schemas/index.js';
import { createActivity } from '../schemas/index.js';
import {
  activitiesToHtml,
  activitiesToMf2,
  activityToHtml,
  activityToMf2,
  actorToHtml,
  htmlToActivities,
  htmlToActivity,
  htmlToActor,
  mf2ToActivities,
  mf2ToActivity,
  mf2ToActor,
} from '../codecs/microformats2/index.js';
import { createBlueskyAdapter } from '../providers/bluesky/index.js';
import { createFacebookAdapter } from '../providers/facebook/index.js';
import { createInstagramAdapter } from '../providers/instagram/index.js';
import { createMastodonAdapter } from '../providers/mastodon/index.js';
import { DecodingError, EncodingError } from '../src/errors.js';
import { ann, likeActivity, taggedNote } from './fixtures.js';

function noteWithFloatingTag(): Activity {
  return createActivity({
    verb: 'post',
    id: 'tag:example.com:1',
    url: 'https://example.com/notes/1',
    published: '2024-01-15T10:30:00Z',
    actor: { ...ann, username: 'ann' },
    object: {
      objectType: 'note',
      id: 'tag:example.com:1',
      url: 'https://example.com/notes/1',
      content: 'Hi @bob #fun',
      published: '2024-01-15T10:30:00Z',
      tags: [
        { objectType: 'mention', url: 'https://example.com/bob', displayName: '@bob', startIndex: 3, length: 4 },
        { objectType: 'hashtag', displayName: 'fun', startIndex: 8, length: 4 },
        { objectType: 'hashtag', displayName: 'extra' },
      ],
    },
  });
}

describe('microformats2 JSON', () => {
  describe('activityToMf2', () => {
    it('should render a post as an h-entry', () => {
      expect(activityToMf2(noteWithFloatingTag())).toEqual({
        type: ['h-entry'],
        properties: {
          uid: ['tag:example.com:1'],
          url: ['https://example.com/notes/1'],
          content: [
            {
              html:
                'Hi <a class="u-category h-card" href="https://example.com/bob">@bob</a> ' +
                '<a class="p-category" title="fun">#fun</a>',
              value: 'Hi @bob #fun',
            },
          ],
          published: ['2024-01-15T10:30:00Z'],
          author: [
            {
              type: ['h-card'],
              properties: {
                uid: ['tag:example.com:ann'],
                name: ['Ann'],
                nickname: ['ann'],
                url: ['https://example.com/ann'],
              },
            },
          ],
          category: [
            {
              type: ['h-card'],
              properties: { name: ['@bob'], url: ['https://example.com/bob'] },
              value: 'https://example.com/bob',
            },
            '#fun',
            'extra',
          ],
        },
      });
    });

    it('should cite the object of a like', () => {
      expect(activityToMf2(likeActivity()).properties['like-of']).toEqual([
        {
          type: ['h-cite'],
          properties: {
            uid: ['tag:example.com:9'],
            url: ['https://example.com/notes/9'],
            content: [{ html: 'Nice', value: 'Nice' }],
          },
        },
      ]);
    });

    it('should require a target for responses', () => {
      expect(() => activityToMf2(createActivity({ verb: 'like', object: { objectType: 'note' } }))).toThrow(
        new EncodingError('A like needs an object with a url or id')
      );
    });

    it('should wrap activities in an h-feed', () => {
      const document = activitiesToMf2([taggedNote()], 'Notes');

      expect(document.items).toHaveLength(1);
      expect(document.items[0].type).toEqual(['h-feed']);
      expect(document.items[0].properties).toEqual({ name: ['Notes'] });
      expect(document.items[0].children).toHaveLength(1);
    });
  });

  describe('round trips', () => {
    it('should recover anchored and floating tags', () => {
      const activity = noteWithFloatingTag();
      expect(mf2ToActivity(activityToMf2(activity))).toEqual(activity);
    });

    it('should recover a like', () => {
      const activity = likeActivity();
      expect(mf2ToActivity(activityToMf2(activity))).toEqual(activity);
    });

    it('should recover an RSVP to a named event', () => {
      const activity = createActivity({
        verb: 'rsvp-yes',
        id: 'tag:example.com:r1',
        object: { objectType: 'event', displayName: 'Party', url: 'https://example.com/events/1' },
      });

      expect(activityToMf2(activity).properties.rsvp).toEqual(['yes']);
      expect(mf2ToActivity(activityToMf2(activity))).toEqual(activity);
    });

    it('should recover a reply with media', () => {
      const activity = createActivity({
        verb: 'post',
        id: 'tag:example.com:7',
        object: {
          objectType: 'comment',
          id: 'tag:example.com:7',
          content: 'Look',
          inReplyTo: [{ url: 'https://example.com/notes/6' }],
          attachments: [
            { objectType: 'image', image: 'https://example.com/a.png', displayName: 'A dog' },
            { objectType: 'video', stream: 'https://example.com/v.mp4' },
          ],
        },
      });

      expect(mf2ToActivity(activityToMf2(activity))).toEqual(activity);
    });

    it('should cite video posters and named audio', () => {
      const activity = createActivity({
        verb: 'post',
        id: 'tag:example.com:8',
        object: {
          objectType: 'note',
          id: 'tag:example.com:8',
          content: 'Clips',
          attachments: [
            { objectType: 'video', stream: 'https://example.com/v.mp4', image: 'https://example.com/v.jpg' },
            { objectType: 'audio', stream: 'https://example.com/a.mp3', displayName: 'Song' },
          ],
        },
      });

      const { properties } = activityToMf2(activity);
      expect(properties.video).toEqual([
        { type: ['h-cite'], properties: { video: ['https://example.com/v.mp4'], featured: ['https://example.com/v.jpg'] } },
      ]);
      expect(properties.audio).toEqual([
        { type: ['h-cite'], properties: { audio: ['https://example.com/a.mp3'], name: ['Song'] } },
      ]);
      expect(mf2ToActivity(activityToMf2(activity))).toEqual(activity);
    });

    it('should recover Mastodon statuses', () => {
      const mastodon = createMastodonAdapter({ instance: 'https://mastodon.example' });
      const { activities } = mastodon.normalize([
        {
          id: '109',
          uri: 'https://mastodon.example/users/ann/statuses/109',
          url: 'https://mastodon.example/@ann/109',
          created_at: '2024-01-15T10:30:00.000Z',
          account: {
            id: '1',
            username: 'ann',
            acct: 'ann',
            display_name: 'Ann',
            note: '<p>Hi there</p>',
            url: 'https://mastodon.example/@ann',
            avatar: 'https://mastodon.example/avatars/ann.png',
          },
          content:
            '<p>Hey <span class="h-card"><a href="https://mastodon.example/@bob" class="u-url mention">@<span>bob</span></a></span> ' +
            '<a href="https://mastodon.example/tags/fun" class="mention hashtag" rel="tag">#<span>fun</span></a></p>',
          media_attachments: [],
        },
      ]);

      expect(mf2ToActivities(activitiesToMf2(activities))).toEqual(activities);
    });
  });

  describe('decoding', () => {
    it('should decode an h-card', () => {
      expect(
        mf2ToActor({
          type: ['h-card'],
          properties: { name: ['Ann'], url: ['https://example.com/ann'], photo: [{ value: 'https://example.com/a.png', alt: 'Ann' }] },
        })
      ).toEqual({ displayName: 'Ann', url: 'https://example.com/ann', image: 'https://example.com/a.png' });
    });

    it('should ignore a name implied from the url', () => {
      expect(
        mf2ToActor({ type: ['h-card'], properties: { name: ['https://example.com/ann'], url: ['https://example.com/ann'] } })
      ).toEqual({ url: 'https://example.com/ann' });
    });

    it('should treat a named entry as an article', () => {
      const activity = mf2ToActivity({
        type: ['h-entry'],
        properties: { name: ['Title'], content: ['Body'], url: ['https://example.com/a/1'] },
      });

      expect(activity.object).toEqual({
        objectType: 'article',
        url: 'https://example.com/a/1',
        displayName: 'Title',
        content: 'Body',
      });
    });

    it('should reject items that are not entries', () => {
      expect(() => mf2ToActivity({ type: ['h-card'], properties: {} })).toThrow(
        new DecodingError('Expected an h-entry, got h-card')
      );
      expect(() => mf2ToActivities({ items: [{ type: ['h-card'], properties: {} }] })).toThrow('No h-entry found');
      expect(() => mf2ToActivity({ type: 'h-entry' })).toThrow(DecodingError);
    });
  });
});

describe('microformats2 HTML', () => {
  it('should render an h-entry', () => {
    const activity = createActivity({
      verb: 'post',
      id: 'tag:example.com:2',
      url: 'https://example.com/notes/2',
      published: '2024-01-15T10:30:00Z',
      actor: { displayName: 'Ann', url: 'https://example.com/ann' },
      object: { objectType: 'note', content: 'a < b' },
    });

    expect(activityToHtml(activity)).toBe(
      [
        '<article class="h-entry">',
        '<data class="p-uid" value="tag:example.com:2"></data>',
        '<a class="u-url" href="https://example.com/notes/2">https://example.com/notes/2</a>',
        '<div class="e-content">a &lt; b</div>',
        '<time class="dt-published" datetime="2024-01-15T10:30:00Z"></time>',
        '<div class="p-author h-card">',
        '<div class="p-name">Ann</div>',
        '<a class="u-url" href="https://example.com/ann">https://example.com/ann</a>',
        '</div>',
        '</article>',
      ].join('\n')
    );
  });

  it('should render only floating categories outside the content', () => {
    const html = activityToHtml(noteWithFloatingTag());

    expect(html).toContain('<div class="p-category">extra</div>');
    expect(html).not.toContain('<div class="p-category">#fun</div>');
  });

  it('should round-trip a tagged post', () => {
    const activity = noteWithFloatingTag();
    expect(htmlToActivity(activityToHtml(activity))).toEqual(activity);
  });

  it('should round-trip a document of activities', () => {
    const activities = [taggedNote(), likeActivity()];
    const html = activitiesToHtml(activities, { title: 'Notes' });

    expect(html.startsWith('<!DOCTYPE html>\n<html>\n<head>\n<meta charset="utf-8">\n<title>Notes</title>\n</head>')).toBe(
      true
    );
    expect(htmlToActivities(html)).toEqual(activities);
  });

  it('should round-trip an actor', () => {
    const actor = { ...ann, username: 'ann', description: 'Writes notes' };
    expect(htmlToActor(actorToHtml(actor))).toEqual(actor);
  });

  it('should reject documents without entries', () => {
    expect(() => htmlToActivity('<p>nothing here</p>')).toThrow(new DecodingError('No h-entry found'));
    expect(() => htmlToActor('<p>nothing here</p>')).toThrow('No h-card found');
  });
});

describe('microformats2 HTML over adapter output', () => {
  const facebook = createFacebookAdapter();
  const dana = { id: '111', name: 'Dana' };

  function facebookPost(overrides: Record<string, unknown>): Activity {
    const { activities } = facebook.normalize({
      data: [{ id: '111_222', from: dana, type: 'status', created_time: '2024-01-15T10:30:00+0000', ...overrides }],
    });
    expect(activities).toHaveLength(1);
    return activities[0];
  }

  it('should keep leading whitespace and the offsets after it', () => {
    const activity = facebookPost({
      message: '  hi Bob',
      message_tags: [{ id: '333', name: 'Bob', type: 'user', offset: 5, length: 3 }],
    });
    const decoded = htmlToActivity(activityToHtml(activity));

    expect(decoded.object.content).toBe('  hi Bob');
    expect(decoded.object.tags?.[0].startIndex).toBe(5);
    expect(decoded).toEqual(activity);
  });

  it('should keep trailing whitespace', () => {
    const activity = facebookPost({ message: 'hello \t' });
    expect(htmlToActivity(activityToHtml(activity))).toEqual(activity);
  });

  it('should keep carriage returns', () => {
    const activity = facebookPost({ message: 'Bob\r\nsays hi\n' });
    const decoded = htmlToActivity(activityToHtml(activity));

    expect(decoded.object.content).toBe('Bob\r\nsays hi\n');
    expect(decoded).toEqual(activity);
  });

  it('should recover a Facebook link post with a place and emoji offsets', () => {
    const activity = facebookPost({
      type: 'link',
      message: 'hi 😀 Eve',
      message_tags: [{ id: '333', name: 'Eve', type: 'user', offset: 6, length: 3 }],
      link: 'https://example.com/article',
      name: 'Article',
      description: 'About things',
      full_picture: 'https://example.com/preview.jpg',
      place: { id: '555', name: 'Cafe', location: { latitude: 52.5, longitude: 13.4 } },
    });

    expect(htmlToActivity(activityToHtml(activity))).toEqual(activity);
  });

  it('should recover an Instagram carousel with a video poster', () => {
    const { activities } = createInstagramAdapter().normalize({
      data: [
        {
          id: '17',
          media_type: 'CAROUSEL_ALBUM',
          caption: 'Sunset #beach',
          permalink: 'https://www.instagram.com/p/abc/',
          timestamp: '2024-01-15T10:30:00+0000',
          username: 'kim',
          children: {
            data: [
              { id: '18', media_type: 'IMAGE', media_url: 'https://cdn.example.com/18.jpg' },
              {
                id: '19',
                media_type: 'VIDEO',
                media_url: 'https://cdn.example.com/19.mp4',
                thumbnail_url: 'https://cdn.example.com/19.jpg',
              },
            ],
          },
        },
      ],
    });
    const decoded = htmlToActivity(activityToHtml(activities[0]));

    expect(decoded.object.attachments?.[1]).toEqual({
      objectType: 'video',
      stream: 'https://cdn.example.com/19.mp4',
      image: 'https://cdn.example.com/19.jpg',
    });
    expect(decoded).toEqual(activities[0]);
  });

  it('should recover a Bluesky post with multi-byte facets', () => {
    const text = 'Hi ✨ @bob.test #fun';
    const { activities } = createBlueskyAdapter({ appHost: 'bsky.app' }).normalize({
      feed: [
        {
          post: {
            uri: 'at://did:plc:ann/app.bsky.feed.post/3k1',
            cid: 'bafy1',
            author: { did: 'did:plc:ann', handle: 'ann.test', displayName: 'Ann' },
            record: {
              $type: 'app.bsky.feed.post',
              text,
              createdAt: '2024-01-15T10:30:00.000Z',
              facets: [
                {
                  index: { byteStart: 7, byteEnd: 16 },
                  features: [{ $type: 'app.bsky.richtext.facet#mention', did: 'did:plc:bob' }],
                },
                { index: { byteStart: 17, byteEnd: 21 }, features: [{ $type: 'app.bsky.richtext.facet#tag', tag: 'fun' }] },
              ],
            },
          },
        },
      ],
    });

    expect(activities[0].object.tags).toHaveLength(2);
    expect(htmlToActivity(activityToHtml(activities[0]))).toEqual(activities[0]);
  });
});
