/**
 * Zod schemas for runtime validation of the canonical model
 *
 * These schemas enforce the data contracts at construction time: every
 * tree an adapter or codec produces goes through one of the `create*`
 * functions below, which validate, normalize and freeze it.
 */

import { z } from 'zod';
import type {
  Activity,
  Actor,
  CanonicalObject,
  Envelope,
  ObjectReference,
  Tag,
} from './types.js';
import { codepointLength } from '../normalizers/offsets.js';
import { compact, deepFreeze, normalizeToUTC } from '../normalizers/utils.js';

export const SourceIdSchema = z.enum(['twitter', 'facebook', 'instagram', 'mastodon', 'bluesky']);

export const VerbSchema = z.enum([
  'post',
  'share',
  'like',
  'react',
  'follow',
  'tag',
  'update',
  'delete',
  'rsvp-yes',
  'rsvp-no',
  'rsvp-maybe',
  'rsvp-interested',
]);

export const ObjectTypeSchema = z.enum([
  'note',
  'article',
  'comment',
  'image',
  'video',
  'audio',
  'event',
  'person',
  'place',
  'collection',
]);

export const TagTypeSchema = z.enum(['mention', 'hashtag', 'article']);

export const CapabilitySchema = z.enum(['search', 'paging', 'write']);

export const GroupSelectorSchema = z.enum(['@all', '@friends', '@self', '@search']);

/**
 * Timestamp schema: accepts anything normalizeToUTC understands and
 * outputs ISO8601 UTC
 */
export const TimestampSchema = z.string().transform((value, ctx) => {
  const utc = normalizeToUTC(value);
  if (!utc) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Timestamp must be parseable (e.g., 2024-01-15T10:30:00Z)',
    });
    return z.NEVER;
  }
  return utc;
});

const UrlSchema = z.string().url();

export const ActorSchema: z.ZodType<Actor> = z.object({
  id: z.string().min(1).optional(),
  username: z.string().optional(),
  displayName: z.string().optional(),
  description: z.string().optional(),
  url: UrlSchema.optional(),
  image: UrlSchema.optional(),
});

export const TagSchema: z.ZodType<Tag> = z
  .object({
    objectType: TagTypeSchema,
    url: UrlSchema.optional(),
    displayName: z.string().optional(),
    startIndex: z.number().int().nonnegative().optional(),
    length: z.number().int().nonnegative().optional(),
  })
  .refine((tag) => (tag.startIndex === undefined) === (tag.length === undefined), {
    message: 'startIndex and length must be given together',
  });

export const LocationSchema = z.object({
  displayName: z.string().optional(),
  url: UrlSchema.optional(),
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
});

/**
 * Tags with offsets first, by position; offset-less tags keep their order
 */
export function orderTags(tags: Tag[]): Tag[] {
  const positioned = tags
    .filter((tag) => tag.startIndex !== undefined)
    .sort((a, b) => (a.startIndex ?? 0) - (b.startIndex ?? 0));
  const floating = tags.filter((tag) => tag.startIndex === undefined);
  return [...positioned, ...floating];
}

interface TaggedFields {
  content?: string;
  tags?: Tag[];
}

function checkTagBounds(fields: TaggedFields, ctx: z.RefinementCtx): void {
  const length = codepointLength(fields.content ?? '');
  fields.tags?.forEach((tag, index) => {
    if (tag.startIndex === undefined || tag.length === undefined) {
      return;
    }
    if (tag.startIndex + tag.length > length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tags', index],
        message: `Tag range [${tag.startIndex}, ${tag.startIndex + tag.length}) exceeds content length ${length}`,
      });
    }
  });
}

const objectFields = {
  id: z.string().min(1).optional(),
  url: UrlSchema.optional(),
  displayName: z.string().optional(),
  summary: z.string().optional(),
  content: z.string().optional(),
  published: TimestampSchema.optional(),
  updated: TimestampSchema.optional(),
  author: ActorSchema.optional(),
  image: UrlSchema.optional(),
  stream: UrlSchema.optional(),
  tags: z.array(TagSchema).optional(),
  location: LocationSchema.optional(),
};

export const ObjectReferenceSchema: z.ZodType<ObjectReference> = z.lazy(() =>
  z
    .object({
      ...objectFields,
      objectType: ObjectTypeSchema.optional(),
      attachments: z.array(CanonicalObjectSchema).optional(),
      inReplyTo: z.array(ObjectReferenceSchema).optional(),
    })
    .superRefine(checkTagBounds)
    .transform((ref) => (ref.tags ? { ...ref, tags: orderTags(ref.tags) } : ref))
);

export const CanonicalObjectSchema: z.ZodType<CanonicalObject> = z.lazy(() =>
  z
    .object({
      ...objectFields,
      objectType: ObjectTypeSchema,
      attachments: z.array(CanonicalObjectSchema).optional(),
      inReplyTo: z.array(ObjectReferenceSchema).optional(),
    })
    .superRefine(checkTagBounds)
    .transform((obj) => (obj.tags ? { ...obj, tags: orderTags(obj.tags) } : obj))
);

export const GeneratorSchema = z.object({
  displayName: z.string().optional(),
  url: UrlSchema.optional(),
});

export const ActivitySchema: z.ZodType<Activity> = z.object({
  verb: VerbSchema,
  id: z.string().min(1).optional(),
  url: UrlSchema.optional(),
  published: TimestampSchema.optional(),
  updated: TimestampSchema.optional(),
  actor: ActorSchema.optional(),
  object: CanonicalObjectSchema,
  target: CanonicalObjectSchema.optional(),
  generator: GeneratorSchema.optional(),
  content: z.string().optional(),
});

export const EnvelopeSchema: z.ZodType<Envelope> = z
  .object({
    items: z.array(ActivitySchema),
    startIndex: z.number().int().nonnegative(),
    itemsPerPage: z.number().int().nonnegative(),
    totalResults: z.number().int().nonnegative(),
  })
  .refine((envelope) => envelope.itemsPerPage === envelope.items.length, {
    message: 'itemsPerPage must equal the number of items',
    path: ['itemsPerPage'],
  });

function construct<T>(schema: z.ZodType<T>, input: unknown): T {
  return deepFreeze(schema.parse(compact(input) ?? {}));
}

/**
 * Build a validated, frozen activity
 * @throws ZodError with actionable error messages if validation fails
 */
export function createActivity(input: Activity): Activity {
  return construct(ActivitySchema, input);
}

/**
 * Build a validated, frozen object
 * @throws ZodError with actionable error messages if validation fails
 */
export function createObject(input: CanonicalObject): CanonicalObject {
  return construct(CanonicalObjectSchema, input);
}

/**
 * Build a validated, frozen actor
 * @throws ZodError with actionable error messages if validation fails
 */
export function createActor(input: Actor): Actor {
  return construct(ActorSchema, input);
}

/**
 * Build a validated, frozen envelope. Empty item lists are kept.
 * @throws ZodError with actionable error messages if validation fails
 */
export function createEnvelope(input: Envelope): Envelope {
  const items = input.items.map((item) => createActivity(item));
  return deepFreeze(
    EnvelopeSchema.parse({
      items,
      startIndex: input.startIndex,
      itemsPerPage: input.itemsPerPage,
      totalResults: input.totalResults,
    })
  );
}

/**
 * Validate an activity safely (returns result object)
 */
export function safeValidateActivity(data: unknown): z.SafeParseReturnType<unknown, Activity> {
  return ActivitySchema.safeParse(compact(data) ?? {});
}

/**
 * Format Zod errors into actionable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
