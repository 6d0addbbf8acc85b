/**
 * Facebook adapter
 *
 * Normalizes Graph API feed and comment payloads and maps posts, comments,
 * likes and RSVPs back to Graph API write requests.
 */

export * from './types.js';
export * from './adapter.js';
