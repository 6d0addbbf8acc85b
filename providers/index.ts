/**
 * Source adapters for normalizing social network payloads
 *
 * Each adapter module exports a factory that:
 * - Declares the source's capabilities (search, paging, write)
 * - Normalizes raw payloads into canonical activities
 * - Recognizes the source's error payloads
 * - Maps canonical activities back to native write requests
 */

import type { SourceId } from '../schemas/index.js';
import type { Config } from '../schemas/config.js';
import type { SourceAdapter } from '../normalizers/types.js';
import { createTwitterAdapter } from './twitter/index.js';
import { createFacebookAdapter } from './facebook/index.js';
import { createInstagramAdapter } from './instagram/index.js';
import { createMastodonAdapter } from './mastodon/index.js';
import { createBlueskyAdapter } from './bluesky/index.js';

export type AdapterRegistry = ReadonlyMap<SourceId, SourceAdapter>;

/**
 * Build the adapter for every source once. The registry is never mutated
 * afterwards.
 */
export function createAdapterRegistry(config: Pick<Config, 'sources'>): AdapterRegistry {
  const adapters: SourceAdapter[] = [
    createTwitterAdapter(),
    createFacebookAdapter(),
    createInstagramAdapter(),
    createMastodonAdapter({ instance: config.sources.mastodon.instance }),
    createBlueskyAdapter({ appHost: config.sources.bluesky.appHost }),
  ];

  return new Map(adapters.map((adapter): [SourceId, SourceAdapter] => [adapter.source, adapter]));
}
