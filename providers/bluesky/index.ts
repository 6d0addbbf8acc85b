/**
 * Bluesky adapter
 *
 * Ids stay at:// URIs; URLs point at the configured web app host.
 */

export * from './types.js';
export * from './adapter.js';
