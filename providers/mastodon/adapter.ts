/**
 * Mastodon adapter
 *
 * Normalizes timeline and search payloads of one instance. Status content is
 * HTML; it is converted to plain text and its mention, hashtag and link
 * anchors become offset tags.
 */

import type { Activity, Actor, Capability, CanonicalObject } from '../../schemas/index.js';
import { createActivity, createActor } from '../../schemas/index.js';
import type { SourceAdapter } from '../../normalizers/types.js';
import { mapSourceType } from '../../normalizers/mappings.js';
import { normalizeBatch, parsePayload } from '../../normalizers/batch.js';
import { htmlToText, linksToTags } from '../../normalizers/html.js';
import { firstNativeId, nativeId, tagUri } from '../../normalizers/utils.js';
import {
  AuthError,
  EncodingError,
  NotFoundError,
  RateLimitError,
  UpstreamFormatError,
  unsupported,
} from '../../src/errors.js';
import type { UpstreamError } from '../../src/errors.js';
import type {
  MastodonAccount,
  MastodonBaseStatus,
  MastodonMedia,
  MastodonStatus,
  MastodonWriteRequest,
} from './types.js';
import {
  MastodonAccountSchema,
  MastodonErrorSchema,
  MastodonStatusSchema,
  MastodonTimelineSchema,
} from './types.js';

export interface MastodonAdapterOptions {
  /** Instance base URL, e.g. https://mastodon.social */
  instance: string;
}

function mediaToAttachment(media: MastodonMedia): CanonicalObject | undefined {
  if (!media.url) {
    return undefined;
  }
  const displayName = media.description ?? undefined;
  switch (media.type) {
    case 'image':
      return { objectType: 'image', image: media.url, displayName };
    case 'gifv':
    case 'video':
      return { objectType: 'video', stream: media.url, image: media.preview_url ?? undefined, displayName };
    case 'audio':
      return { objectType: 'audio', stream: media.url, displayName };
    default:
      return undefined;
  }
}

function errorFromMessage(message: string, status?: number): UpstreamError | null {
  if (/token|unauthori[sz]ed|authenticat|forbidden/i.test(message)) {
    return new AuthError(message, status === 403 ? 403 : 401);
  }
  if (/rate limit|too many requests|throttled/i.test(message)) {
    return new RateLimitError(message, 429);
  }
  if (/not found/i.test(message)) {
    return new NotFoundError(message);
  }
  return null;
}

/**
 * Create a Mastodon adapter for one instance
 */
export function createMastodonAdapter(options: MastodonAdapterOptions): SourceAdapter<MastodonWriteRequest> {
  const domain = new URL(options.instance).host;

  const normalizeAccount = (account: MastodonAccount): Actor => ({
    id: tagUri(domain, account.acct),
    username: account.username,
    displayName: account.display_name ?? undefined,
    description: account.note ? htmlToText(account.note).text : undefined,
    url: account.url,
    image: account.avatar ?? undefined,
  });

  const kindOf = (status: MastodonBaseStatus & { reblog?: unknown }): string => {
    if (status.reblog) return 'reblog';
    if (status.in_reply_to_id) return 'reply';
    return 'status';
  };

  const statusToObject = (status: MastodonBaseStatus, withAuthor: boolean): CanonicalObject => {
    const { text, links } = htmlToText(status.content);
    const mapping = mapSourceType('mastodon', kindOf(status));

    return {
      objectType: mapping?.objectType ?? 'note',
      id: tagUri(domain, status.id),
      url: status.url ?? status.uri,
      content: text,
      summary: status.spoiler_text ?? undefined,
      published: status.created_at,
      updated: status.edited_at ?? undefined,
      author: withAuthor ? normalizeAccount(status.account) : undefined,
      tags: linksToTags(links),
      attachments: status.media_attachments
        .map(mediaToAttachment)
        .filter((attachment): attachment is CanonicalObject => attachment !== undefined),
      inReplyTo: status.in_reply_to_id ? [{ id: tagUri(domain, status.in_reply_to_id) }] : undefined,
    };
  };

  const statusToActivity = (status: MastodonStatus): Activity => {
    const kind = kindOf(status);
    const mapping = mapSourceType('mastodon', kind);
    if (!mapping) {
      throw new UpstreamFormatError(`Unrecognized mastodon item kind: ${kind}`, 'mastodon');
    }

    const actor = normalizeAccount(status.account);
    const generator = status.application
      ? { displayName: status.application.name, url: status.application.website ?? undefined }
      : undefined;

    if (status.reblog) {
      return createActivity({
        verb: mapping.verb,
        id: tagUri(domain, status.id),
        url: status.url ?? undefined,
        published: status.created_at,
        actor,
        object: statusToObject(status.reblog, true),
        generator,
      });
    }

    const object = statusToObject(status, false);
    return createActivity({
      verb: mapping.verb,
      id: object.id,
      url: object.url,
      published: object.published,
      updated: object.updated,
      actor,
      object,
      generator,
    });
  };

  const detectError = (raw: unknown, status?: number): UpstreamError | null => {
    const parsed = MastodonErrorSchema.safeParse(raw);
    if (!parsed.success) {
      return null;
    }
    return errorFromMessage(parsed.data.error, status);
  };

  const requireStatusId = (activity: Activity): string => {
    const id = nativeId(domain, activity.object);
    if (!id) {
      throw new EncodingError(`mastodon ${activity.verb} needs an object with an id or url`);
    }
    return id;
  };

  const denormalize = (activity: Activity): MastodonWriteRequest => {
    const { object } = activity;
    switch (activity.verb) {
      case 'post': {
        if (!object.content) {
          throw new EncodingError('mastodon posts need text content');
        }
        const replyTo = firstNativeId(domain, object.inReplyTo);
        return {
          source: 'mastodon',
          method: 'POST',
          endpoint: 'api/v1/statuses',
          body: {
            status: object.content,
            ...(replyTo ? { in_reply_to_id: replyTo } : {}),
            ...(object.summary ? { spoiler_text: object.summary } : {}),
          },
        };
      }
      case 'share':
        return { source: 'mastodon', method: 'POST', endpoint: `api/v1/statuses/${requireStatusId(activity)}/reblog`, body: {} };
      case 'like':
        return { source: 'mastodon', method: 'POST', endpoint: `api/v1/statuses/${requireStatusId(activity)}/favourite`, body: {} };
      default:
        return unsupported('mastodon', `writing ${activity.verb} activities`);
    }
  };

  return {
    source: 'mastodon',
    domain,
    capabilities: new Set<Capability>(['search', 'write']),

    normalize(raw) {
      const error = detectError(raw);
      if (error) {
        throw error;
      }
      const items = parsePayload('mastodon', MastodonTimelineSchema, raw, 'timeline');
      return normalizeBatch('mastodon', items, MastodonStatusSchema, statusToActivity);
    },

    normalizeActor(raw) {
      const error = detectError(raw);
      if (error) {
        throw error;
      }
      return createActor(normalizeAccount(parsePayload('mastodon', MastodonAccountSchema, raw, 'account')));
    },

    denormalize,
    detectError,

    totalResults() {
      return undefined;
    },
  };
}
