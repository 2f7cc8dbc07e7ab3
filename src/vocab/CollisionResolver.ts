/**
 * CollisionResolver — Decide how two vocabularies coexist in one JSON-LD document.
 *
 * Rules, first match wins:
 *   1. identity          a === b                     → separate_graphs
 *   2. hint              a or b nominates a strategy → that strategy
 *   3. bundled           known pair (either order)   → rule's strategy
 *   4. protected-overlap @protected terms on either side
 *   5. default                                       → separate_graphs
 *
 * Decisions use vocabulary metadata only, never document content.
 */

import { BoundedCache } from '../cache/BoundedCache.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../jsonld/types.js';
import type { Logger } from '../logging.js';
import { builtinCollisionRules } from './builtins.js';
import { createPlan, type CollisionRule, type Plan, type StrategyHint } from './types.js';
import type { VocabRegistry } from './VocabRegistry.js';

export const DEFAULT_OVERLAP_CACHE_SIZE = 128;

export const OVERLAPPING_PROTECTED_TERMS = 'overlapping protected terms';

export type DecisionRule = 'identity' | 'hint' | 'bundled' | 'protected-overlap' | 'protected-one-way' | 'default';

/**
 * A plan together with the rule that produced it.
 */
export interface CollisionDecision {
  rule: DecisionRule;
  plan: Plan;
}

/**
 * Protected-term analysis for one pair, oriented as (a, b).
 */
export interface ProtectedOverlap {
  aHasProtected: boolean;
  bHasProtected: boolean;
  overlap: boolean;
}

export interface CollisionResolverOptions {
  /** Defaults to the built-in rules */
  rules?: readonly CollisionRule[];
  overlapCacheSize?: number;
  logger?: Logger;
}

/**
 * Terms whose definitions are protected from redefinition.
 *
 * A term is protected when its definition sets `"@protected": true`, or when
 * its context sets `"@protected": true` and the definition does not opt out.
 * Accepts a bare context or a document with an `@context` key; array contexts
 * are unioned and remote references contribute nothing.
 */
export function protectedTerms(payload: JsonObject): Set<string> {
  const terms = new Set<string>();
  const context = '@context' in payload ? payload['@context'] : payload;
  collectProtected(context, terms);
  return terms;
}

function collectProtected(context: JsonValue | undefined, terms: Set<string>): void {
  if (Array.isArray(context)) {
    for (const item of context) {
      collectProtected(item, terms);
    }
    return;
  }
  if (!isJsonObject(context)) {
    return;
  }

  const contextWide = context['@protected'] === true;
  for (const [term, definition] of Object.entries(context)) {
    if (term.startsWith('@')) {
      continue;
    }
    const explicit = isJsonObject(definition) ? definition['@protected'] : undefined;
    if (explicit === true || (contextWide && explicit !== false && definition !== null)) {
      terms.add(term);
    }
  }
}

function pairKey(a: string, b: string): string {
  return a <= b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

export class CollisionResolver {
  private readonly rules: Map<string, CollisionRule> = new Map();
  private readonly overlaps: BoundedCache<ProtectedOverlap>;
  private readonly logger: Logger;

  constructor(
    private readonly registry: VocabRegistry,
    options: CollisionResolverOptions = {}
  ) {
    this.logger = options.logger ?? console;
    this.overlaps = new BoundedCache('overlap', options.overlapCacheSize ?? DEFAULT_OVERLAP_CACHE_SIZE);
    for (const rule of options.rules ?? builtinCollisionRules()) {
      this.rules.set(pairKey(rule.pair[0], rule.pair[1]), rule);
    }
  }

  /**
   * Return the plan for merging vocabularies `a` and `b`.
   */
  async choose(a: string, b: string): Promise<Plan> {
    const { plan } = await this.decide(a, b);
    return plan;
  }

  /**
   * Like `choose`, also reporting which rule fired.
   */
  async decide(a: string, b: string): Promise<CollisionDecision> {
    const decision = await this.evaluate(a, b);
    this.logger.debug(`[collision] ${decision.rule} (${a}, ${b}) → ${decision.plan.strategy}`);
    return decision;
  }

  private async evaluate(a: string, b: string): Promise<CollisionDecision> {
    if (a === b) {
      return { rule: 'identity', plan: createPlan('separate_graphs') };
    }

    const hint = this.registryHint(a, b);
    if (hint !== undefined) {
      return { rule: 'hint', plan: createPlan(hint.strategy, { ...hint.details }) };
    }

    const rule = this.bundledRule(a, b);
    if (rule !== undefined) {
      return { rule: 'bundled', plan: createPlan(rule.strategy, { ...rule.details }) };
    }

    const { aHasProtected, bHasProtected, overlap } = await this.protectedOverlap(a, b);
    if (aHasProtected || bHasProtected) {
      if (aHasProtected && bHasProtected && overlap) {
        return {
          rule: 'protected-overlap',
          plan: createPlan('separate_graphs', { reason: OVERLAPPING_PROTECTED_TERMS }),
        };
      }
      const [outer, inner] = aHasProtected ? [a, b] : [b, a];
      return { rule: 'protected-one-way', plan: createPlan('nested_contexts', { outer, inner }) };
    }

    return { rule: 'default', plan: createPlan('separate_graphs') };
  }

  /**
   * Strategy nominated by `a` for `b`, else by `b` for `a`.
   * A prefix missing from the registry nominates nothing.
   */
  registryHint(a: string, b: string): StrategyHint | undefined {
    return this.nominated(a, b) ?? this.nominated(b, a);
  }

  private nominated(from: string, to: string): StrategyHint | undefined {
    if (!this.registry.has(from)) {
      return undefined;
    }
    const defaults = this.registry.get(from).strategyDefaults;
    return Object.prototype.hasOwnProperty.call(defaults, to) ? defaults[to] : undefined;
  }

  /**
   * Bundled rule for the unordered pair, if any.
   */
  bundledRule(a: string, b: string): CollisionRule | undefined {
    return this.rules.get(pairKey(a, b));
  }

  /**
   * Protected-term analysis, memoized per unordered pair.
   * Surfaces the registry's not-found error for unknown prefixes.
   */
  async protectedOverlap(a: string, b: string): Promise<ProtectedOverlap> {
    const [first, second] = a <= b ? [a, b] : [b, a];
    const sorted = await this.overlaps.getOrLoad(pairKey(a, b), async () => {
      const [payloadFirst, payloadSecond] = await Promise.all([
        this.registry.contextPayload(first),
        this.registry.contextPayload(second),
      ]);
      const termsFirst = protectedTerms(payloadFirst);
      const termsSecond = protectedTerms(payloadSecond);
      return {
        aHasProtected: termsFirst.size > 0,
        bHasProtected: termsSecond.size > 0,
        overlap: [...termsFirst].some((term) => termsSecond.has(term)),
      };
    });

    return first === a
      ? sorted
      : { aHasProtected: sorted.bHasProtected, bHasProtected: sorted.aHasProtected, overlap: sorted.overlap };
  }

  clearCache(): void {
    this.overlaps.clear();
  }

  cacheStats() {
    return this.overlaps.stats();
  }
}
