/**
 * JSON-LD module exports.
 */

export * from './types.js';
export * from './canonical.js';
export * from './ContextComposer.js';
