/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 * They carry no resolution logic; handlers delegate to the registry,
 * resolver and composer.
 */

import type { ContextDocument, JsonObject, JsonValue } from '../jsonld/types.js';
import type { DecisionRule } from '../vocab/CollisionResolver.js';
import type { Plan, VocabEntry } from '../vocab/types.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Vocabulary Endpoints
// ============================================================================

/**
 * JSON view of a registry entry. Sets become arrays; the context source
 * reports its mode and location, not the payload.
 */
export interface VocabSummary {
  prefix: string;
  uris: Record<string, string | string[]>;
  context: { mode: 'inline' } | { mode: 'url'; url: string } | { mode: 'derivesFrom'; derivesFrom: string };
  versions: { current: string; supported: string[] };
  features: string[];
  tags: string[];
  strategyDefaults: Record<string, { strategy: string; details: Record<string, JsonValue> }>;
  meta: Record<string, JsonValue>;
}

export interface ListVocabResponse {
  vocabularies: VocabSummary[];
  total: number;
}

export interface VocabContextResponse {
  prefix: string;
  version: string;
  /** SHA-256 of the canonical payload */
  sha256: string | undefined;
  payload: JsonObject;
}

// ============================================================================
// Collision Endpoints
// ============================================================================

export interface CollisionResponse {
  a: string;
  b: string;
  rule: DecisionRule;
  plan: Plan;
}

export interface ComposeRequest {
  /** Prefixes in priority order; the first is primary */
  prefixes: string[];
  propagate?: boolean;
}

export interface ComposeResponse {
  document: ContextDocument;
  plans: Array<{ prefix: string; plan: Plan }>;
}

// ============================================================================
// Health
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'degraded' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Component statuses */
  components?: {
    vocabularies?: { loaded: number };
  };
}

/**
 * Convert an entry to its JSON view.
 */
export function toVocabSummary(entry: VocabEntry): VocabSummary {
  const uris: Record<string, string | string[]> = {};
  for (const [role, value] of Object.entries(entry.uris)) {
    uris[role] = typeof value === 'string' ? value : [...value];
  }

  const strategyDefaults: VocabSummary['strategyDefaults'] = {};
  for (const [other, hint] of Object.entries(entry.strategyDefaults)) {
    strategyDefaults[other] = { strategy: hint.strategy, details: { ...hint.details } };
  }

  const source = entry.context;
  const context: VocabSummary['context'] =
    source.mode === 'inline'
      ? { mode: 'inline' }
      : source.mode === 'url'
        ? { mode: 'url', url: source.url }
        : { mode: 'derivesFrom', derivesFrom: source.derivesFrom };

  return {
    prefix: entry.prefix,
    uris,
    context,
    versions: { current: entry.versions.current, supported: [...entry.versions.supported] },
    features: [...entry.features],
    tags: [...entry.tags],
    strategyDefaults,
    meta: { ...entry.meta },
  };
}
