/**
 * MCP tools for vocabulary lookup, context retrieval and collision planning.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { toVocabSummary } from '../../api/types.js';
import { jsonResult, toolErrorResult } from '../helpers.js';

export function registerVocabTools(server: McpServer, ctx: AppContext): void {
  // vocab_list — List registered vocabularies
  server.tool(
    'vocab_list',
    'List all registered vocabularies with their URIs, context source, features and tags.',
    {
      tag: z.string().optional().describe('Only vocabularies carrying this tag'),
    },
    async (args) => {
      try {
        const entries = ctx.registry.list().filter((entry) => !args.tag || entry.tags.has(args.tag));
        const vocabularies = entries.map(toVocabSummary);
        return jsonResult({ vocabularies, total: vocabularies.length });
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // vocab_resolve — Prefix or alias URI to entry
  server.tool(
    'vocab_resolve',
    'Resolve a vocabulary prefix or any of its URIs (e.g. "http://schema.org/") to the registry entry.',
    { identifier: z.string().describe('Prefix or alias URI') },
    async (args) => {
      try {
        return jsonResult(toVocabSummary(ctx.registry.resolve(args.identifier)));
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // vocab_context — JSON-LD context payload
  server.tool(
    'vocab_context',
    'Get the JSON-LD @context payload for a vocabulary, with its SHA-256 content hash.',
    { prefix: z.string().describe('Vocabulary prefix') },
    async (args) => {
      try {
        const payload = await ctx.registry.contextPayload(args.prefix);
        return jsonResult({
          prefix: args.prefix,
          version: ctx.registry.get(args.prefix).versions.current,
          sha256: ctx.registry.contentHash(args.prefix),
          payload,
        });
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // vocab_choose — Collision plan for a pair
  server.tool(
    'vocab_choose',
    'Choose how two vocabularies should coexist in one JSON-LD document. Returns the strategy, details and the rule that fired.',
    {
      a: z.string().describe('First vocabulary prefix'),
      b: z.string().describe('Second vocabulary prefix'),
    },
    async (args) => {
      try {
        const { rule, plan } = await ctx.resolver.decide(args.a, args.b);
        return jsonResult({ a: args.a, b: args.b, rule, plan });
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );

  // vocab_compose — Combined @context
  server.tool(
    'vocab_compose',
    'Compose one embeddable @context from several vocabularies, ordered by priority (first is primary).',
    {
      prefixes: z.array(z.string()).min(1).describe('Vocabulary prefixes, primary first'),
      propagate: z.boolean().optional().describe('Set false to stop the primary context propagating into nested nodes'),
    },
    async (args) => {
      try {
        const result = await ctx.composer.compose(
          args.prefixes,
          args.propagate === undefined ? {} : { propagate: args.propagate }
        );
        return jsonResult(result);
      } catch (err) {
        return toolErrorResult(err);
      }
    }
  );
}
