/**
 * Vocabulary data model.
 *
 * Raw input (built-ins, bundled data file) is validated with zod and
 * normalized into immutable entries. Content hashes are not stored on
 * entries; the registry keeps them in its own store.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema } from '../jsonld/types.js';
import type { JsonObject, JsonValue } from '../jsonld/types.js';
import { InvalidConfigurationError } from './errors.js';

// ============================================================================
// Strategies and plans
// ============================================================================

export const STRATEGIES = [
  'property_scoped',
  'graph_partition',
  'nested_contexts',
  'context_versioning',
  'separate_graphs',
] as const;

export const StrategySchema = z.enum(STRATEGIES);

export type Strategy = (typeof STRATEGIES)[number];

export function isStrategy(value: unknown): value is Strategy {
  return StrategySchema.safeParse(value).success;
}

/**
 * Resolver decision: a strategy plus informational details.
 */
export interface Plan {
  readonly strategy: Strategy;
  readonly details: Readonly<Record<string, JsonValue>>;
}

export function createPlan(strategy: Strategy, details: Record<string, JsonValue> = {}): Plan {
  return Object.freeze({ strategy, details: Object.freeze({ ...details }) });
}

/**
 * A strategy one vocabulary nominates for coexisting with another.
 */
export interface StrategyHint {
  readonly strategy: Strategy;
  readonly details: Readonly<Record<string, JsonValue>>;
}

// ============================================================================
// Context sources
// ============================================================================

/**
 * Where a vocabulary's `@context` comes from. Exactly one mode.
 */
export type ContextSource =
  | { readonly mode: 'inline'; readonly inline: JsonObject }
  | { readonly mode: 'url'; readonly url: string }
  | { readonly mode: 'derivesFrom'; readonly derivesFrom: string };

export interface ContextSourceInput {
  inline?: JsonObject | undefined;
  url?: string | undefined;
  derivesFrom?: string | undefined;
}

const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' });

/**
 * Build a context source, failing unless exactly one of
 * `inline`, `url`, `derivesFrom` is set.
 */
export function createContextSource(input: ContextSourceInput, path = 'context'): ContextSource {
  const provided = (['inline', 'url', 'derivesFrom'] as const).filter((key) => input[key] !== undefined);
  if (provided.length !== 1) {
    const found = provided.length === 0 ? 'none' : provided.join(', ');
    throw new InvalidConfigurationError(
      `provide exactly one of inline / url / derivesFrom (got ${found})`,
      path
    );
  }

  let source: ContextSource;
  if (input.inline !== undefined) {
    source = { mode: 'inline', inline: input.inline };
  } else if (input.url !== undefined) {
    source = { mode: 'url', url: parseHttpUrl(input.url, `${path}.url`) };
  } else {
    source = { mode: 'derivesFrom', derivesFrom: parseHttpUrl(input.derivesFrom ?? '', `${path}.derivesFrom`) };
  }
  return Object.freeze(source);
}

function parseHttpUrl(value: string, path: string): string {
  const result = HttpUrlSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidConfigurationError(`'${value}' is not a valid http(s) URL`, path);
  }
  return result.data;
}

// ============================================================================
// Vocabulary entries
// ============================================================================

const UriListSchema = z.union([z.string().min(1), z.array(z.string().min(1))]);

const StrategyHintInputSchema = z.union([
  StrategySchema,
  z.object({ strategy: StrategySchema }).catchall(JsonValueSchema),
]);

export const VocabEntryInputSchema = z.object({
  prefix: z.string().min(1),
  uris: z.record(z.string(), UriListSchema).default({}),
  context: z.object({
    inline: JsonObjectSchema.optional(),
    url: z.string().optional(),
    derivesFrom: z.string().optional(),
  }),
  versions: z
    .object({
      current: z.string().min(1),
      supported: z.array(z.string()).default([]),
    })
    .default({ current: 'latest', supported: ['latest'] }),
  features: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  strategyDefaults: z.record(z.string(), StrategyHintInputSchema).default({}),
  meta: z.record(z.string(), JsonValueSchema).default({}),
});

export type VocabEntryInput = z.input<typeof VocabEntryInputSchema>;

/**
 * One registered vocabulary.
 */
export interface VocabEntry {
  readonly prefix: string;
  /** Role ("primary", "alternates", ...) to one or many URIs */
  readonly uris: Readonly<Record<string, string | readonly string[]>>;
  readonly context: ContextSource;
  readonly versions: { readonly current: string; readonly supported: readonly string[] };
  readonly features: ReadonlySet<string>;
  readonly tags: ReadonlySet<string>;
  /** Other vocabulary's prefix to the strategy this one nominates for it */
  readonly strategyDefaults: Readonly<Record<string, StrategyHint>>;
  readonly meta: Readonly<Record<string, JsonValue>>;
}

/**
 * Validate raw input and build an immutable entry.
 */
export function defineVocabEntry(input: unknown, path = 'vocabulary'): VocabEntry {
  const result = VocabEntryInputSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const issuePath = issue && issue.path.length > 0 ? `${path}.${issue.path.join('.')}` : path;
    throw new InvalidConfigurationError(issue?.message ?? 'invalid vocabulary entry', issuePath);
  }
  const data = result.data;

  const strategyDefaults: Record<string, StrategyHint> = {};
  for (const [other, hint] of Object.entries(data.strategyDefaults)) {
    if (typeof hint === 'string') {
      strategyDefaults[other] = Object.freeze({ strategy: hint, details: Object.freeze({}) });
    } else {
      const { strategy, ...details } = hint;
      strategyDefaults[other] = Object.freeze({ strategy, details: Object.freeze(details) });
    }
  }

  return Object.freeze({
    prefix: data.prefix,
    uris: Object.freeze({ ...data.uris }),
    context: createContextSource(data.context, `${path}.context`),
    versions: Object.freeze({
      current: data.versions.current,
      supported: Object.freeze([...data.versions.supported]),
    }),
    features: new Set(data.features),
    tags: new Set(data.tags),
    strategyDefaults: Object.freeze(strategyDefaults),
    meta: Object.freeze({ ...data.meta }),
  });
}

/**
 * Every URI an entry lists, flattened across roles.
 */
export function entryUris(entry: VocabEntry): string[] {
  const uris: string[] = [];
  for (const value of Object.values(entry.uris)) {
    if (typeof value === 'string') {
      uris.push(value);
    } else {
      uris.push(...value);
    }
  }
  return uris;
}

// ============================================================================
// Bundled collision rules
// ============================================================================

export const CollisionRuleInputSchema = z.object({
  pair: z.tuple([z.string().min(1), z.string().min(1)]),
  strategy: StrategySchema,
  details: z.record(z.string(), JsonValueSchema).default({}),
});

export type CollisionRuleInput = z.input<typeof CollisionRuleInputSchema>;

/**
 * A known relationship between two vocabularies, order-insensitive.
 */
export interface CollisionRule {
  readonly pair: readonly [string, string];
  readonly strategy: Strategy;
  readonly details: Readonly<Record<string, JsonValue>>;
}

export function defineCollisionRule(input: unknown, path = 'collisionRule'): CollisionRule {
  const result = CollisionRuleInputSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const issuePath = issue && issue.path.length > 0 ? `${path}.${issue.path.join('.')}` : path;
    throw new InvalidConfigurationError(issue?.message ?? 'invalid collision rule', issuePath);
  }
  const { pair, strategy, details } = result.data;
  return Object.freeze({
    pair: Object.freeze([pair[0], pair[1]] as const),
    strategy,
    details: Object.freeze({ ...details }),
  });
}
