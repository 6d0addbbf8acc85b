/**
 * Source networks with an adapter
 */
export type SourceId = 'twitter' | 'facebook' | 'instagram' | 'mastodon' | 'bluesky';

/**
 * Activity verbs shared by every source and codec
 */
export type Verb =
  | 'post'
  | 'share'
  | 'like'
  | 'react'
  | 'follow'
  | 'tag'
  | 'update'
  | 'delete'
  | 'rsvp-yes'
  | 'rsvp-no'
  | 'rsvp-maybe'
  | 'rsvp-interested';

/**
 * Object types that can appear as an activity's object, an attachment or a reply context
 */
export type ObjectType =
  | 'note'
  | 'article'
  | 'comment'
  | 'image'
  | 'video'
  | 'audio'
  | 'event'
  | 'person'
  | 'place'
  | 'collection';

/**
 * Kinds of inline tag annotations
 */
export type TagType = 'mention' | 'hashtag' | 'article';

/**
 * Operations a source may support beyond plain normalization
 */
export type Capability = 'search' | 'paging' | 'write';

/**
 * Group selector of an activities request
 */
export type GroupSelector = '@all' | '@friends' | '@self' | '@search';

/**
 * A person or page
 */
export interface Actor {
  /** Source-namespaced identifier */
  id?: string;
  username?: string;
  displayName?: string;
  /** Plain-text profile description */
  description?: string;
  url?: string;
  /** Avatar URL */
  image?: string;
}

/**
 * Inline annotation over an object's content.
 *
 * `startIndex` and `length` are Unicode code point positions into the
 * unescaped plain-text content of the annotated object. They are either
 * both present or both absent.
 */
export interface Tag {
  objectType: TagType;
  url?: string;
  displayName?: string;
  startIndex?: number;
  length?: number;
}

export interface Location {
  displayName?: string;
  url?: string;
  latitude?: number;
  longitude?: number;
}

/**
 * Note, article, media item or any other activity object
 */
export interface CanonicalObject {
  objectType: ObjectType;
  id?: string;
  url?: string;
  /** Title or name */
  displayName?: string;
  summary?: string;
  /** Plain text; tag offsets index into it */
  content?: string;
  /** ISO8601 UTC timestamp */
  published?: string;
  /** ISO8601 UTC timestamp */
  updated?: string;
  /** Author, when it differs from the activity's actor */
  author?: Actor;
  /** Preview or thumbnail URL */
  image?: string;
  /** Media URL of a video or audio object */
  stream?: string;
  tags?: Tag[];
  attachments?: CanonicalObject[];
  inReplyTo?: ObjectReference[];
  location?: Location;
}

/**
 * Reply context: an object that may be known only by id or url
 */
export type ObjectReference = Omit<CanonicalObject, 'objectType'> & {
  objectType?: ObjectType;
};

/**
 * Application that produced an activity
 */
export interface Generator {
  displayName?: string;
  url?: string;
}

/**
 * Canonical activity normalized from any source
 */
export interface Activity {
  verb: Verb;
  /** Source-namespaced, stable identifier */
  id?: string;
  url?: string;
  /** ISO8601 UTC timestamp */
  published?: string;
  /** ISO8601 UTC timestamp */
  updated?: string;
  actor?: Actor;
  object: CanonicalObject;
  target?: CanonicalObject;
  generator?: Generator;
  /** Reaction content, e.g. an emoji for `react` */
  content?: string;
}

/**
 * Result set wrapper with paging metadata
 */
export interface Envelope {
  items: Activity[];
  startIndex: number;
  /** Always equal to `items.length` */
  itemsPerPage: number;
  /** Source-reported count, else `itemsPerPage` */
  totalResults: number;
}
