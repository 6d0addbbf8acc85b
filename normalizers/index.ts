/**
 * Shared normalization helpers used by every source adapter
 *
 * - Adapter contract and fetch collaborator types
 * - Item kind mapping tables
 * - Code point offset arithmetic
 * - HTML to annotated text conversion
 */

// Types
export * from './types.js';

// Mapping tables
export * from './mappings.js';

// Utility functions
export * from './utils.js';
export * from './offsets.js';
export * from './html.js';

// Batch handling
export * from './batch.js';
