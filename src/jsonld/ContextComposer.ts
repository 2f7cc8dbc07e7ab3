/**
 * ContextComposer — Build one embeddable `@context` from several vocabularies.
 *
 * Prefixes are ordered by priority; the first is the primary vocabulary and
 * every further one is placed according to the resolver's plan for
 * (primary, further).
 */

import type { Logger } from '../logging.js';
import type { CollisionResolver } from '../vocab/CollisionResolver.js';
import { InvalidConfigurationError } from '../vocab/errors.js';
import type { Plan } from '../vocab/types.js';
import type { VocabRegistry } from '../vocab/VocabRegistry.js';
import type { ContextDocument, JsonObject, JsonValue } from './types.js';
import { isJsonObject } from './types.js';

export interface ComposeOptions {
  /** When false, mark the first context `"@propagate": false` */
  propagate?: boolean;
}

/**
 * Composition result: the document plus the plan used for each further prefix.
 */
export interface ComposedContext {
  document: ContextDocument;
  plans: Array<{ prefix: string; plan: Plan }>;
}

/**
 * Extract the context value from a payload (`{"@context": ...}` or a bare mapping).
 * Mappings are copied so callers may extend them.
 */
export function extractContext(payload: JsonObject): JsonValue {
  const context = '@context' in payload ? payload['@context'] : payload;
  return isJsonObject(context) ? { ...context } : (context ?? null);
}

export class ContextComposer {
  private readonly logger: Logger;

  constructor(
    private readonly registry: VocabRegistry,
    private readonly resolver: CollisionResolver,
    logger?: Logger
  ) {
    this.logger = logger ?? console;
  }

  async compose(prefixes: readonly string[], options: ComposeOptions = {}): Promise<ComposedContext> {
    const [primary, ...rest] = prefixes;
    if (primary === undefined) {
      throw new InvalidConfigurationError('at least one prefix is required', 'prefixes');
    }

    // Nested plans may reorder `contexts`; scoped terms always attach to the primary
    const primaryContext = extractContext(await this.registry.contextPayload(primary));
    const contexts: JsonValue[] = [primaryContext];
    const plans: ComposedContext['plans'] = [];

    for (const prefix of rest) {
      const next = extractContext(await this.registry.contextPayload(prefix));
      const plan = await this.resolver.choose(primary, prefix);
      plans.push({ prefix, plan });
      this.logger.debug(`[compose] merge ${prefix} under ${plan.strategy}`);

      switch (plan.strategy) {
        case 'property_scoped': {
          const property = plan.details.property;
          if (isJsonObject(primaryContext)) {
            primaryContext[typeof property === 'string' ? property : prefix] = { '@context': next };
          } else {
            contexts.push(next);
          }
          break;
        }

        case 'nested_contexts':
          // Outer (defining) context goes first
          if (plan.details.outer === prefix) {
            contexts.unshift(next);
          } else {
            contexts.push(next);
          }
          break;

        case 'graph_partition':
        case 'context_versioning':
        case 'separate_graphs':
          contexts.push(next);
          break;
      }
    }

    if (options.propagate === false) {
      const first = contexts.find(isJsonObject);
      if (first !== undefined) {
        first['@propagate'] = false;
      }
    }

    const document: ContextDocument = {
      '@context': contexts.length === 1 ? (contexts[0] ?? null) : contexts,
    };
    return { document, plans };
  }
}
