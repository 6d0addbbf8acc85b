import type { Activity, Actor } from '../schemas/index.js';
import { createActivity } from '../schemas/index.js';

export const ann: Actor = {
  id: 'tag:example.com:ann',
  displayName: 'Ann',
  url: 'https://example.com/ann',
};

/**
 * A note by Ann with an anchored mention and hashtag
 */
export function taggedNote(actor: Actor = ann): Activity {
  return createActivity({
    verb: 'post',
    id: 'tag:example.com:1',
    url: 'https://example.com/notes/1',
    published: '2024-01-15T10:30:00Z',
    actor,
    object: {
      objectType: 'note',
      id: 'tag:example.com:1',
      url: 'https://example.com/notes/1',
      content: 'Hi @bob #fun',
      published: '2024-01-15T10:30:00Z',
      tags: [
        { objectType: 'mention', url: 'https://example.com/bob', displayName: '@bob', startIndex: 3, length: 4 },
        {
          objectType: 'hashtag',
          url: 'https://example.com/tags/fun',
          displayName: 'fun',
          startIndex: 8,
          length: 4,
        },
      ],
    },
  });
}

export function likeActivity(): Activity {
  return createActivity({
    verb: 'like',
    id: 'tag:example.com:like1',
    actor: ann,
    object: { objectType: 'note', id: 'tag:example.com:9', url: 'https://example.com/notes/9', content: 'Nice' },
  });
}
