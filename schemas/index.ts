/**
 * Canonical model: types and runtime validation
 */

export * from './types.js';
export * from './validation.js';
export * from './config.js';
