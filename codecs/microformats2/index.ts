/**
 * microformats2 codecs: JSON and HTML
 */

export * from './json.js';
export * from './html.js';
