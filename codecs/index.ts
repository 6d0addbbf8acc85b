/**
 * Format codecs
 *
 * Each codec converts between canonical activities and one wire format:
 * - activitystreams: canonical JSON, the reference format
 * - microformats2: mf2 JSON and HTML
 * - atom: Atom feeds and entries with Activity Streams extensions
 * - jsonfeed: JSON Feed version 1
 */

import type { Actor, Envelope } from '../schemas/index.js';
import type { OutputFormat } from '../schemas/config.js';
import { envelopeToJson } from './activitystreams.js';
import { ATOM_CONTENT_TYPE, activitiesToAtom } from './atom.js';
import { activitiesToJsonFeed } from './jsonfeed.js';
import { activitiesToHtml, activitiesToMf2 } from './microformats2/index.js';

export * from './activitystreams.js';
export * from './atom.js';
export * from './jsonfeed.js';
export * from './microformats2/index.js';

export interface RenderOptions {
  title?: string;
  /** Home URL of the feed */
  hostUrl?: string;
  /** URL the output was requested from */
  requestUrl?: string;
  /** Owner of the feed */
  actor?: Actor;
}

export interface RenderedOutput {
  contentType: string;
  body: string;
}

/**
 * Serialize an envelope in the requested format
 * @throws EncodingError when the envelope lacks what the format requires
 */
export function renderEnvelope(
  envelope: Envelope,
  format: OutputFormat = 'json',
  options: RenderOptions = {}
): RenderedOutput {
  switch (format) {
    case 'json':
      return { contentType: 'application/json; charset=utf-8', body: envelopeToJson(envelope) };
    case 'atom':
    case 'xml':
      return { contentType: ATOM_CONTENT_TYPE, body: activitiesToAtom(envelope, options) };
    case 'mf2-html':
      return {
        contentType: 'text/html; charset=utf-8',
        body: activitiesToHtml(envelope.items, { title: options.title }),
      };
    case 'mf2-json':
      return {
        contentType: 'application/mf2+json; charset=utf-8',
        body: JSON.stringify(activitiesToMf2(envelope.items, options.title), null, 2),
      };
    case 'jsonfeed':
      return {
        contentType: 'application/feed+json; charset=utf-8',
        body: JSON.stringify(
          activitiesToJsonFeed(envelope.items, {
            title: options.title,
            homePageUrl: options.hostUrl,
            feedUrl: options.requestUrl,
            actor: options.actor,
          }),
          null,
          2
        ),
      };
  }
}
