/**
 * Server entry point for the vocab-bridge API.
 *
 * This module:
 * - Initializes all components (config, vocabulary registry, resolver, composer)
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { isAbsolute, resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import { DEFAULT_CONFIG, type AppConfig, type ServerConfig } from './config/types.js';
import { ContextComposer } from './jsonld/ContextComposer.js';
import type { Logger } from './logging.js';
import { createVocabHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';
import { createHttpByteFetcher, type ByteFetcher } from './vocab/ByteFetcher.js';
import type { CollisionResolver } from './vocab/CollisionResolver.js';
import { loadVocabRegistry } from './vocab/RegistryDataLoader.js';
import { createN3TurtleParser, type TurtleParser } from './vocab/TurtleParser.js';
import type { VocabRegistry } from './vocab/VocabRegistry.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  registry: VocabRegistry;
  resolver: CollisionResolver;
  composer: ContextComposer;
}

/**
 * Capabilities and overrides for initialization (tests substitute stubs here).
 */
export interface InitializeOptions {
  config?: AppConfig;
  fetcher?: ByteFetcher;
  turtleParser?: TurtleParser;
  logger?: Logger;
}

/**
 * Assemble an application context around an existing registry and resolver.
 */
export function createAppContext(
  registry: VocabRegistry,
  resolver: CollisionResolver,
  config: AppConfig = DEFAULT_CONFIG,
  logger?: Logger
): AppContext {
  return {
    config,
    registry,
    resolver,
    composer: new ContextComposer(registry, resolver, logger),
  };
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  options: InitializeOptions = {}
): Promise<AppContext> {
  const logger = options.logger ?? console;
  logger.info(`Initializing app with base path: ${basePath}`);

  const config = options.config
    ?? await loadConfig({ configPath: process.env.CONFIG_PATH || resolve(basePath, 'config.yaml') });

  const vocab = config.vocab;
  const dataPath = isAbsolute(vocab.dataPath) ? vocab.dataPath : resolve(basePath, vocab.dataPath);
  logger.info(`Loading vocabulary data from: ${dataPath}`);

  const turtleParser = options.turtleParser ?? (vocab.turtle ? createN3TurtleParser() : undefined);

  const { registry, resolver } = await loadVocabRegistry({
    dataPath,
    fetcher: options.fetcher ?? createHttpByteFetcher({ timeoutMs: vocab.fetchTimeoutMs, logger }),
    ...(turtleParser ? { turtleParser } : {}),
    aliasCollisions: vocab.aliasCollisions,
    cacheSize: { http: vocab.cache.http, context: vocab.cache.context },
    overlapCacheSize: vocab.cache.overlap,
    logger,
  });

  logger.info(`Loaded ${registry.size} vocabularies`);

  return createAppContext(registry, resolver, config, logger);
}

/**
 * Create and configure the Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  config: Partial<ServerConfig> = {}
): Promise<ReturnType<typeof Fastify>> {
  const opts = { ...ctx.config.server, ...config };

  const fastify = Fastify({
    logger: {
      level: opts.logLevel,
    },
  });

  if (opts.cors) {
    await fastify.register(cors, {
      origin: true,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  const vocabHandlers = createVocabHandlers(ctx);

  // MCP over Streamable HTTP on /mcp
  await fastify.register(mcpPlugin, { prefix: '/mcp', serverFactory: () => createMcpServer(ctx) });

  registerRoutes(fastify, {
    vocabHandlers,
    vocabularyCount: () => ctx.registry.size,
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(basePath: string, config: Partial<ServerConfig> = {}): Promise<void> {
  try {
    const ctx = await initializeApp(basePath);
    const opts = { ...ctx.config.server, ...config };
    const fastify = await createServer(ctx, config);

    await fastify.listen({
      port: opts.port,
      host: opts.host,
    });

    console.log(`Server listening on http://${opts.host}:${opts.port}`);
    console.log(`Vocabularies loaded: ${ctx.registry.size}`);

    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env.APP_BASE_PATH || process.cwd();
  const config: Partial<ServerConfig> = {};
  if (process.env.PORT) config.port = parseInt(process.env.PORT, 10);
  if (process.env.HOST) config.host = process.env.HOST;

  await startServer(basePath, config);
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
