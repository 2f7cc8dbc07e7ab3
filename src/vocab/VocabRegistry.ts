/**
 * VocabRegistry — Authoritative prefix → vocabulary mapping.
 *
 * This module handles:
 * - Lookup by prefix, and by any alias URI listed in an entry's `uris`
 * - Lazy loading of `@context` payloads (inline, remote JSON-LD, derived from Turtle)
 * - Memoization per (prefix, version), with a content hash stored once per key
 *
 * Entries are immutable after construction. Payload and byte caches are
 * bounded and never invalidated: a remote document that changes after its
 * first fetch is served stale until the caches are cleared.
 */

import { BoundedCache, DEFAULT_CACHE_SIZE, type CacheStats } from '../cache/BoundedCache.js';
import { contentHash, deepFreeze } from '../jsonld/canonical.js';
import { JsonObjectSchema, type JsonObject } from '../jsonld/types.js';
import type { Logger } from '../logging.js';
import { withFetchCache, type ByteFetcher } from './ByteFetcher.js';
import {
  CapabilityUnavailableError,
  InvalidConfigurationError,
  RetrievalFailureError,
  VocabNotFoundError,
} from './errors.js';
import type { NamespaceBinding, TurtleParser } from './TurtleParser.js';
import { entryUris, type VocabEntry } from './types.js';

/**
 * How to treat two vocabularies claiming the same normalized alias URI.
 */
export type AliasCollisionPolicy = 'last-write-wins' | 'error';

export interface VocabRegistryOptions {
  /** Raw-byte fetch capability for `url` and `derivesFrom` sources */
  fetcher?: ByteFetcher;
  /** Optional Turtle capability for `derivesFrom` sources */
  turtleParser?: TurtleParser;
  aliasCollisions?: AliasCollisionPolicy;
  cacheSize?: {
    http?: number;
    context?: number;
  };
  logger?: Logger;
}

/**
 * Normalize a URI for alias comparison: scheme and host lower-cased,
 * trailing slashes stripped, query and fragment dropped.
 * Strings that do not parse as absolute URIs only lose trailing slashes.
 */
export function normalizeAliasUri(uri: string): string {
  let parsed: URL;
  try {
    parsed = new URL(uri.trim());
  } catch {
    return uri.trim().replace(/\/+$/, '');
  }
  const path = parsed.pathname.replace(/\/+$/, '');
  return parsed.host
    ? `${parsed.protocol}//${parsed.host}${path}`
    : `${parsed.protocol}${path}`;
}

export class VocabRegistry {
  private readonly entries: Map<string, VocabEntry> = new Map();
  private readonly aliases: Map<string, string> = new Map();
  private readonly hashes: Map<string, string> = new Map();
  private readonly payloads: BoundedCache<JsonObject>;
  private readonly httpCache: BoundedCache<Uint8Array>;
  private readonly fetcher: ByteFetcher | undefined;
  private readonly turtleParser: TurtleParser | undefined;
  private readonly logger: Logger;

  constructor(entries: Iterable<VocabEntry>, options: VocabRegistryOptions = {}) {
    this.logger = options.logger ?? console;
    this.turtleParser = options.turtleParser;
    this.payloads = new BoundedCache('context', options.cacheSize?.context ?? DEFAULT_CACHE_SIZE);
    this.httpCache = new BoundedCache('http', options.cacheSize?.http ?? DEFAULT_CACHE_SIZE);
    this.fetcher = options.fetcher ? withFetchCache(options.fetcher, this.httpCache) : undefined;

    // Later entries replace earlier ones with the same prefix
    for (const entry of entries) {
      this.entries.set(entry.prefix, entry);
    }

    this.buildAliasIndex(options.aliasCollisions ?? 'last-write-wins');
  }

  private buildAliasIndex(policy: AliasCollisionPolicy): void {
    for (const [prefix, entry] of this.entries) {
      for (const uri of entryUris(entry)) {
        const alias = normalizeAliasUri(uri);
        const existing = this.aliases.get(alias);
        if (existing !== undefined && existing !== prefix) {
          if (policy === 'error') {
            throw new InvalidConfigurationError(
              `alias '${alias}' is claimed by both '${existing}' and '${prefix}'`,
              `${prefix}.uris`
            );
          }
          this.logger.warn(`Alias '${alias}' moves from '${existing}' to '${prefix}'`);
        }
        this.aliases.set(alias, prefix);
      }
    }
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  /**
   * Direct prefix lookup.
   */
  get(prefix: string): VocabEntry {
    const entry = this.entries.get(prefix);
    if (entry === undefined) {
      throw new VocabNotFoundError(prefix);
    }
    return entry;
  }

  has(prefix: string): boolean {
    return this.entries.has(prefix);
  }

  /**
   * Accept a prefix or any URI that normalizes to a known alias.
   */
  resolve(identifier: string): VocabEntry {
    const direct = this.entries.get(identifier);
    if (direct !== undefined) {
      return direct;
    }
    const prefix = this.aliases.get(normalizeAliasUri(identifier));
    if (prefix === undefined) {
      throw new VocabNotFoundError(identifier);
    }
    return this.get(prefix);
  }

  list(): VocabEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  // ==========================================================================
  // Context payloads
  // ==========================================================================

  /**
   * The vocabulary's `@context` payload, loaded once per (prefix, version).
   * The returned object is frozen.
   */
  async contextPayload(prefix: string): Promise<JsonObject> {
    const entry = this.get(prefix);
    const key = payloadKey(entry);

    const payload = await this.payloads.getOrLoad(key, async () => deepFreeze(await this.loadPayload(entry)));
    // Only the payload the cache holds is hashed; a load outlived by clearCaches() is not
    if (!this.hashes.has(key) && this.payloads.peek(key) === payload) {
      this.hashes.set(key, contentHash(payload));
    }
    return payload;
  }

  /**
   * SHA-256 of the canonical payload for the entry's current version,
   * or undefined before the first successful load.
   */
  contentHash(prefix: string): string | undefined {
    return this.hashes.get(payloadKey(this.get(prefix)));
  }

  private async loadPayload(entry: VocabEntry): Promise<JsonObject> {
    const source = entry.context;
    switch (source.mode) {
      case 'inline':
        return source.inline;

      case 'url': {
        const bytes = await this.fetchBytes(entry.prefix, source.url);
        return parseJsonPayload(source.url, bytes);
      }

      case 'derivesFrom': {
        if (this.turtleParser === undefined) {
          throw new CapabilityUnavailableError(
            'turtle-parser',
            `Deriving a context for '${entry.prefix}' requires an RDF Turtle parser, and none is configured`
          );
        }
        const bytes = await this.fetchBytes(entry.prefix, source.derivesFrom);
        return deriveContext(source.derivesFrom, bytes, this.turtleParser);
      }
    }
  }

  private fetchBytes(prefix: string, url: string): Promise<Uint8Array> {
    if (this.fetcher === undefined) {
      throw new CapabilityUnavailableError(
        'http-fetch',
        `Loading the context for '${prefix}' requires a fetcher, and none is configured`
      );
    }
    return this.fetcher.fetch(url);
  }

  // ==========================================================================
  // Cache management
  // ==========================================================================

  /**
   * Drop memoized payloads, fetched bytes and recorded hashes.
   */
  clearCaches(): void {
    this.payloads.clear();
    this.httpCache.clear();
    this.hashes.clear();
  }

  cacheStats(): CacheStats[] {
    return [this.httpCache.stats(), this.payloads.stats()];
  }
}

function payloadKey(entry: VocabEntry): string {
  return `${entry.prefix}@${entry.versions.current}`;
}

function parseJsonPayload(url: string, bytes: Uint8Array): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(bytes));
  } catch (err) {
    throw new RetrievalFailureError(url, 'response is not valid JSON', { cause: err });
  }
  const result = JsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new RetrievalFailureError(url, 'response is not a JSON object');
  }
  return result.data;
}

async function deriveContext(url: string, bytes: Uint8Array, parser: TurtleParser): Promise<JsonObject> {
  let bindings: NamespaceBinding[];
  try {
    bindings = await parser.parseNamespaces(new TextDecoder().decode(bytes));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RetrievalFailureError(url, `response is not valid Turtle: ${message}`, { cause: err });
  }

  const context: JsonObject = {};
  for (const { prefix, iri } of bindings) {
    // The default (empty) prefix cannot be a JSON-LD term
    if (prefix !== '') {
      context[prefix] = iri;
    }
  }
  return { '@context': context };
}
