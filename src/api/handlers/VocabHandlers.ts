/**
 * VocabHandlers — HTTP handlers for the vocabulary registry and collision resolver.
 *
 * Handlers are thin: they validate request shape, delegate to the registry,
 * resolver or composer, and map vocabulary errors to their HTTP status.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../../server.js';
import { isVocabError } from '../../vocab/errors.js';
import {
  toVocabSummary,
  type ApiError,
  type CollisionResponse,
  type ComposeRequest,
  type ComposeResponse,
  type ListVocabResponse,
  type VocabContextResponse,
  type VocabSummary,
} from '../types.js';

const ComposeRequestSchema: z.ZodType<ComposeRequest> = z.object({
  prefixes: z.array(z.string().min(1)).min(1),
  propagate: z.boolean().optional(),
});

/**
 * Map a thrown error to an API error body, setting the reply status.
 */
export function toApiError(err: unknown, reply: FastifyReply): ApiError {
  if (isVocabError(err)) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

function badRequest(reply: FastifyReply, message: string): ApiError {
  reply.status(400);
  return { error: 'BAD_REQUEST', message };
}

/**
 * Create vocabulary handlers bound to an AppContext.
 */
export function createVocabHandlers(ctx: AppContext) {
  const { registry, resolver, composer } = ctx;

  return {
    /**
     * GET /vocab
     */
    async listVocabularies(
      _request: FastifyRequest,
      _reply: FastifyReply
    ): Promise<ListVocabResponse> {
      const vocabularies = registry.list().map(toVocabSummary);
      return { vocabularies, total: vocabularies.length };
    },

    /**
     * GET /vocab/resolve?id=...
     * Accepts a prefix or any alias URI.
     */
    async resolveVocab(
      request: FastifyRequest<{ Querystring: { id?: string } }>,
      reply: FastifyReply
    ): Promise<VocabSummary | ApiError> {
      const id = (request.query.id ?? '').trim();
      if (!id) {
        return badRequest(reply, 'Query parameter "id" is required.');
      }
      try {
        return toVocabSummary(registry.resolve(id));
      } catch (err) {
        return toApiError(err, reply);
      }
    },

    /**
     * GET /vocab/:prefix
     */
    async getVocab(
      request: FastifyRequest<{ Params: { prefix: string } }>,
      reply: FastifyReply
    ): Promise<VocabSummary | ApiError> {
      try {
        return toVocabSummary(registry.get(request.params.prefix));
      } catch (err) {
        return toApiError(err, reply);
      }
    },

    /**
     * GET /vocab/:prefix/context
     * Loads (or reuses) the context payload and reports its content hash.
     */
    async getContext(
      request: FastifyRequest<{ Params: { prefix: string } }>,
      reply: FastifyReply
    ): Promise<VocabContextResponse | ApiError> {
      const { prefix } = request.params;
      try {
        const payload = await registry.contextPayload(prefix);
        return {
          prefix,
          version: registry.get(prefix).versions.current,
          sha256: registry.contentHash(prefix),
          payload,
        };
      } catch (err) {
        return toApiError(err, reply);
      }
    },

    /**
     * GET /collision?a=...&b=...
     */
    async getCollision(
      request: FastifyRequest<{ Querystring: { a?: string; b?: string } }>,
      reply: FastifyReply
    ): Promise<CollisionResponse | ApiError> {
      const a = (request.query.a ?? '').trim();
      const b = (request.query.b ?? '').trim();
      if (!a || !b) {
        return badRequest(reply, 'Query parameters "a" and "b" are required.');
      }
      try {
        const { rule, plan } = await resolver.decide(a, b);
        return { a, b, rule, plan };
      } catch (err) {
        return toApiError(err, reply);
      }
    },

    /**
     * POST /compose
     * Body: { prefixes: string[], propagate?: boolean }
     */
    async compose(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<ComposeResponse | ApiError> {
      const parsed = ComposeRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return badRequest(reply, 'Body must be { prefixes: string[] (non-empty), propagate?: boolean }.');
      }
      const { prefixes, propagate } = parsed.data;
      try {
        return await composer.compose(prefixes, propagate === undefined ? {} : { propagate });
      } catch (err) {
        return toApiError(err, reply);
      }
    },
  };
}

export type VocabHandlers = ReturnType<typeof createVocabHandlers>;
