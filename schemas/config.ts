/**
 * Configuration file schema
 */

import { z } from 'zod';

export const OutputFormatSchema = z.enum(['json', 'atom', 'xml', 'mf2-html', 'mf2-json', 'jsonfeed']);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const ConfigSchema = z.object({
  defaultFormat: OutputFormatSchema.default('json'),
  /** Default page size when a request gives no count */
  pageSize: z.number().int().positive().optional(),
  atom: z
    .object({
      title: z.string().min(1).default('Activity feed'),
      /** Base URL of the feed's own site, used for feed id and links */
      hostUrl: z.string().url().optional(),
    })
    .default({}),
  sources: z
    .object({
      mastodon: z
        .object({
          instance: z.string().url().default('https://mastodon.social'),
        })
        .default({}),
      bluesky: z
        .object({
          appHost: z.string().min(1).default('bsky.app'),
        })
        .default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration used when no config file exists
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
