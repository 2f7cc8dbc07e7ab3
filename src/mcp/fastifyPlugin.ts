/**
 * Fastify plugin that mounts the MCP server on a route prefix.
 *
 * Registers POST / for JSON-RPC requests (stateless Streamable HTTP).
 * Every request gets its own server and transport, closed with the response.
 * Returns 405 for GET / and DELETE / (no SSE stream or session teardown in stateless mode).
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export interface McpPluginOptions extends FastifyPluginOptions {
  /** Builds a fresh server for one request */
  serverFactory: () => McpServer;
}

export async function mcpPlugin(
  fastify: FastifyInstance,
  opts: McpPluginOptions
): Promise<void> {
  const { serverFactory } = opts;

  // The transport takes the parsed body; keep Fastify's other parsers out of this scope
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, JSON.parse(String(body)));
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });

  // POST / — handle MCP JSON-RPC requests
  fastify.post('/', async (request, reply) => {
    const mcpServer = serverFactory();
    // Stateless mode: no session ID generator
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    reply.raw.on('close', () => {
      mcpServer.close().catch((err: unknown) => {
        request.log.warn({ err }, 'Failed to close MCP server');
      });
    });

    // Fastify must not send a second response
    reply.hijack();

    await mcpServer.connect(transport);
    await transport.handleRequest(request.raw, reply.raw, request.body);
  });

  // GET / and DELETE / — not supported in stateless mode
  fastify.get('/', async (_request, reply) => {
    reply.code(405).send({ error: 'Method Not Allowed — stateless mode, no SSE' });
  });

  fastify.delete('/', async (_request, reply) => {
    reply.code(405).send({ error: 'Method Not Allowed — stateless mode, no session teardown' });
  });
}
