/**
 * Server entry point for the ontology catalog API.
 *
 * This module:
 * - Loads configuration and the catalog
 * - Creates Fastify server with routes and the MCP endpoint
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { Octokit } from '@octokit/rest';

import { Catalog } from './catalog/Catalog.js';
import { RemoteCatalogIndex } from './catalog/RemoteCatalogIndex.js';
import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createLogger, type Logger } from './logging/logger.js';
import {
  createCatalogHandlers,
  createModelHandlers,
  createRemoteHandlers,
} from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  catalog: Catalog;
  logger: Logger;
  remoteIndex?: RemoteCatalogIndex | undefined;
}

export interface InitializeOptions {
  logger?: Logger;
  /** GitHub client for the remote index (default: one built from the config token) */
  octokit?: Octokit;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  config: AppConfig,
  options: InitializeOptions = {}
): Promise<AppContext> {
  const logger = options.logger ?? createLogger({ level: config.server.logLevel });

  logger.info({ path: config.catalog.path, modelsDir: config.catalog.modelsDir }, 'Loading catalog');

  const catalog = await Catalog.load(config.catalog.path, {
    modelsDir: config.catalog.modelsDir,
    limit: config.catalog.limit,
    onModelError: config.catalog.onModelError,
    resultsDir: config.results.dir,
    iriFormat: config.results.iriFormat,
    logger,
  });

  const remoteIndex = config.github !== undefined
    ? new RemoteCatalogIndex(config.github, options.octokit)
    : undefined;

  logger.info(
    { models: catalog.models.length, skipped: catalog.loadFailures.length, remote: remoteIndex?.repository },
    'App initialized'
  );

  return { config, catalog, logger, remoteIndex };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(ctx: AppContext): Promise<ReturnType<typeof Fastify>> {
  const { server } = ctx.config;

  const fastify = Fastify({
    logger: {
      level: server.logLevel,
    },
  });

  if (server.cors.enabled) {
    await fastify.register(cors, {
      origin: server.cors.origins.includes('*') ? true : server.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  const modelHandlers = createModelHandlers(ctx.catalog);
  const catalogHandlers = createCatalogHandlers(ctx.catalog);

  registerRoutes(fastify, {
    modelHandlers,
    catalogHandlers,
    ...(ctx.remoteIndex !== undefined ? { remoteHandlers: createRemoteHandlers(ctx.remoteIndex) } : {}),
    modelCount: () => ctx.catalog.models.length,
    graphStale: () => ctx.catalog.isGraphStale,
  });

  await fastify.register(mcpPlugin, { prefix: '/mcp', createServer: () => createMcpServer(ctx) });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(configPath?: string): Promise<void> {
  const bootLogger = createLogger();

  try {
    const config = await loadConfig(configPath !== undefined ? { configPath, logger: bootLogger } : { logger: bootLogger });
    const ctx = await initializeApp(config);
    const fastify = await createServer(ctx);

    await fastify.listen({
      port: config.server.port,
      host: config.server.host,
    });

    // Handle shutdown
    const shutdown = () => {
      ctx.logger.info('Shutting down');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          ctx.logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (err) {
    bootLogger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * CLI entry point: `server [config.yaml]`.
 */
async function main() {
  await startServer(process.argv[2]);
}

// Run if executed directly
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch((err: unknown) => {
    process.stderr.write(`Fatal: ${String(err)}\n`);
    process.exit(1);
  });
}
