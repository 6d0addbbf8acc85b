/**
 * activity-codec
 *
 * Main exports: canonical model, source adapters, request pipeline and
 * format codecs.
 */

// Canonical model types and validation
export * from '../schemas/index.js';

// Shared normalization helpers and adapter contract
export * from '../normalizers/index.js';

// Source adapters
export * from '../providers/index.js';
export * from '../providers/twitter/index.js';
export * from '../providers/facebook/index.js';
export * from '../providers/instagram/index.js';
export * from '../providers/mastodon/index.js';
export * from '../providers/bluesky/index.js';

// Format codecs
export * from '../codecs/index.js';

// Paging, pipeline, errors, configuration
export * from './envelope.js';
export * from './activities.js';
export * from './errors.js';
export * from './config.js';
