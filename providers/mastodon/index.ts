/**
 * Mastodon adapter
 *
 * Works against any instance; the instance URL comes from configuration.
 */

export * from './types.js';
export * from './adapter.js';
