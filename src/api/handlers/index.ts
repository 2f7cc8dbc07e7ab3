/**
 * Handler exports for the API layer.
 */

export * from './VocabHandlers.js';
