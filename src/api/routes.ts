/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers over the registry and resolver.
 */

import type { FastifyInstance } from 'fastify';
import type { VocabHandlers } from './handlers/VocabHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  vocabHandlers: VocabHandlers;
  vocabularyCount: () => number;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { vocabHandlers, vocabularyCount } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      components: {
        vocabularies: { loaded: vocabularyCount() },
      },
    };
  });

  // ============================================================================
  // Vocabulary Routes
  // ============================================================================

  // List vocabularies
  fastify.get('/vocab', vocabHandlers.listVocabularies);

  // Resolve prefix or alias URI (registered before /vocab/:prefix)
  fastify.get('/vocab/resolve', vocabHandlers.resolveVocab);

  // Get single vocabulary
  fastify.get('/vocab/:prefix', vocabHandlers.getVocab);

  // Get context payload with content hash
  fastify.get('/vocab/:prefix/context', vocabHandlers.getContext);

  // ============================================================================
  // Collision Routes
  // ============================================================================

  // Plan for a pair
  fastify.get('/collision', vocabHandlers.getCollision);

  // Compose one context from several vocabularies
  fastify.post('/compose', vocabHandlers.compose);
}
