/**
 * Vocabulary registry and collision resolution exports.
 */

export * from './errors.js';
export * from './types.js';
export * from './builtins.js';
export * from './ByteFetcher.js';
export * from './TurtleParser.js';
export * from './VocabRegistry.js';
export * from './CollisionResolver.js';
export * from './RegistryDataLoader.js';
