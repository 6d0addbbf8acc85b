/**
 * Twitter adapter
 *
 * Normalizes v1.1 home timeline, user timeline and search payloads, and maps
 * posts, retweets and likes back to v1.1 write requests.
 */

export * from './types.js';
export * from './adapter.js';
