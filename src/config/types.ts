/**
 * Configuration types for the vocab-bridge server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server and registry configuration.
 */

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  vocab: VocabConfig;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** Whether CORS is enabled (default: true) */
  cors: boolean;
}

export type AliasCollisionMode = 'last-write-wins' | 'error';

/**
 * Vocabulary registry settings.
 */
export interface VocabConfig {
  /** Bundled data file; relative paths resolve against the base path */
  dataPath: string;
  /** Timeout for each remote context fetch in ms (default: 10000) */
  fetchTimeoutMs: number;
  /** Enable the Turtle parser for `derivesFrom` sources (default: true) */
  turtle: boolean;
  /** What to do when two vocabularies claim the same alias URI */
  aliasCollisions: AliasCollisionMode;
  /** Cache sizes per namespace */
  cache: CacheConfig;
}

export interface CacheConfig {
  http: number;
  context: number;
  overlap: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: true,
  },
  vocab: {
    dataPath: 'data/registry-data.json',
    fetchTimeoutMs: 10_000,
    turtle: true,
    aliasCollisions: 'last-write-wins',
    cache: {
      http: 256,
      context: 256,
      overlap: 128,
    },
  },
};
