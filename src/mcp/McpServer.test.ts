/**
 * Integration tests for MCP server layer.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import Fastify from 'fastify';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';

import { silentLogger } from '../logging.js';
import { createAppContext, type AppContext } from '../server.js';
import { builtinVocabularies } from '../vocab/builtins.js';
import { CollisionResolver } from '../vocab/CollisionResolver.js';
import { defineVocabEntry } from '../vocab/types.js';
import { VocabRegistry } from '../vocab/VocabRegistry.js';
import { createMcpServer } from './McpServerFactory.js';
import { mcpPlugin } from './fastifyPlugin.js';
import { jsonResult, errorResult, toolErrorResult } from './helpers.js';
import { RetrievalFailureError } from '../vocab/errors.js';

const PROTECTED = defineVocabEntry({
  prefix: 'guarded',
  context: { inline: { '@context': { '@protected': true, code: 'https://g.test/code' } } },
  tags: ['test'],
});

describe('MCP Server', () => {
  let ctx: AppContext;
  let server: McpServer;
  let client: Client;

  beforeAll(async () => {
    const registry = new VocabRegistry([...builtinVocabularies(), PROTECTED], { logger: silentLogger });
    const resolver = new CollisionResolver(registry, { logger: silentLogger });
    ctx = createAppContext(registry, resolver, undefined, silentLogger);
    server = createMcpServer(ctx);

    client = new Client({ name: 'vocab-test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterAll(async () => {
    await client.close();
    await server.close();
  });

  async function call(name: string, args: Record<string, unknown>) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    if (first?.type !== 'text') {
      throw new Error(`expected text content from ${name}`);
    }
    return { isError: result.isError ?? false, text: first.text };
  }

  describe('createMcpServer', () => {
    it('creates an McpServer instance', () => {
      expect(server).toBeInstanceOf(McpServer);
    });

    it('registers the vocabulary tools', async () => {
      const { tools } = await client.listTools();
      expect(tools.map((t) => t.name).sort()).toEqual([
        'vocab_choose',
        'vocab_compose',
        'vocab_context',
        'vocab_list',
        'vocab_resolve',
      ]);
    });
  });

  describe('mcpPlugin', () => {
    function initialize(id: number) {
      return {
        jsonrpc: '2.0',
        id,
        method: 'initialize',
        params: {
          protocolVersion: '2025-03-26',
          capabilities: {},
          clientInfo: { name: 'vocab-test-client', version: '0.0.0' },
        },
      };
    }

    function sseMessageId(payload: string): unknown {
      const line = payload.split('\n').find((l) => l.startsWith('data: '));
      if (line === undefined) {
        throw new Error(`no SSE data line in ${payload}`);
      }
      return JSON.parse(line.slice('data: '.length)).id;
    }

    it('serves concurrent requests from separate servers', async () => {
      const serverFactory = vi.fn(() => createMcpServer(ctx));
      const app = Fastify({ logger: false });
      await app.register(mcpPlugin, { prefix: '/mcp', serverFactory });
      await app.ready();

      try {
        const post = (id: number) =>
          app.inject({
            method: 'POST',
            url: '/mcp',
            headers: { 'content-type': 'application/json', accept: 'application/json, text/event-stream' },
            payload: initialize(id),
          });
        const responses = await Promise.all([post(1), post(2)]);

        expect(responses.map((r) => r.statusCode)).toEqual([200, 200]);
        expect(responses.map((r) => sseMessageId(r.payload))).toEqual([1, 2]);
        expect(serverFactory).toHaveBeenCalledTimes(2);
      } finally {
        await app.close();
      }
    });
  });

  describe('helpers', () => {
    it('jsonResult creates JSON text content', () => {
      const result = jsonResult({ foo: 1 });
      expect(result.content).toEqual([{ type: 'text', text: '{\n  "foo": 1\n}' }]);
    });

    it('errorResult creates error content', () => {
      const result = errorResult('bad');
      expect(result.content).toEqual([{ type: 'text', text: 'bad' }]);
      expect(result.isError).toBe(true);
    });

    it('toolErrorResult tags vocabulary errors with their code', () => {
      expect(toolErrorResult(new RetrievalFailureError('https://vocab.test/x', 'HTTP 500')).content).toEqual([
        { type: 'text', text: 'Tool error (RETRIEVAL_FAILURE): Failed to retrieve https://vocab.test/x: HTTP 500' },
      ]);
      expect(toolErrorResult(new Error('boom')).content).toEqual([{ type: 'text', text: 'Tool error: boom' }]);
    });
  });

  describe('vocabulary tools', () => {
    it('vocab_list filters by tag', async () => {
      const { text } = await call('vocab_list', { tag: 'test' });
      const body = JSON.parse(text);
      expect(body.total).toBe(1);
      expect(body.vocabularies[0].prefix).toBe('guarded');
    });

    it('vocab_resolve accepts an alias URI', async () => {
      const { text } = await call('vocab_resolve', { identifier: 'https://bioschemas.org' });
      expect(JSON.parse(text).prefix).toBe('bioschemas');
    });

    it('vocab_resolve reports unknown identifiers as tool errors', async () => {
      expect(await call('vocab_resolve', { identifier: 'nope' })).toEqual({
        isError: true,
        text: "Tool error (NOT_FOUND): 'nope' not found in registry",
      });
    });

    it('vocab_context returns the payload and hash', async () => {
      const { text } = await call('vocab_context', { prefix: 'guarded' });
      const body = JSON.parse(text);
      expect(body.payload).toEqual({ '@context': { '@protected': true, code: 'https://g.test/code' } });
      expect(body.sha256).toBe(ctx.registry.contentHash('guarded'));
    });

    it('vocab_choose reports the rule and plan', async () => {
      const { text } = await call('vocab_choose', { a: 'schema', b: 'guarded' });
      expect(JSON.parse(text)).toEqual({
        a: 'schema',
        b: 'guarded',
        rule: 'protected-one-way',
        plan: { strategy: 'nested_contexts', details: { outer: 'guarded', inner: 'schema' } },
      });
    });

    it('vocab_compose builds a combined context', async () => {
      const { text } = await call('vocab_compose', { prefixes: ['schema', 'bioschemas'], propagate: false });
      const body = JSON.parse(text);
      expect(body.document['@context']).toHaveLength(2);
      expect(body.document['@context'][0]['@propagate']).toBe(false);
    });
  });
});
