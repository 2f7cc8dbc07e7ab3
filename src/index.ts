/**
 * vocab-bridge — Vocabulary registry and JSON-LD collision resolution.
 *
 * This is the main entry point for the library.
 */

// Logging contract
export * from './logging.js';

// Bounded caches
export * from './cache/BoundedCache.js';

// Context payload types, canonical hashing and composition
export * from './jsonld/index.js';

// Registry, resolver and their errors
export * from './vocab/index.js';

// Configuration
export * from './config/types.js';
export { loadConfig, validateConfig, applyDefaults, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions, PartialAppConfig } from './config/loader.js';

// HTTP API
export * from './api/index.js';

// Server
export { initializeApp, createServer, startServer, createAppContext } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
