/**
 * Instagram adapter
 *
 * Read only: normalizes Graph API media lists and user profiles.
 */

export * from './types.js';
export * from './adapter.js';
