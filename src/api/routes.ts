/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers over the catalog.
 */

import type { FastifyInstance } from 'fastify';
import type { CatalogHandlers } from './handlers/CatalogHandlers.js';
import type { ModelHandlers } from './handlers/ModelHandlers.js';
import type { RemoteHandlers } from './handlers/RemoteHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  modelHandlers: ModelHandlers;
  catalogHandlers: CatalogHandlers;
  /** Present when a GitHub catalog is configured */
  remoteHandlers?: RemoteHandlers;
  modelCount: () => number;
  graphStale: () => boolean;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { modelHandlers, catalogHandlers, modelCount, graphStale } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    models: modelCount(),
    graphStale: graphStale(),
  }));

  // ============================================================================
  // Model Routes
  // ============================================================================

  fastify.get('/models', modelHandlers.listModels);
  fastify.get('/models/:id', modelHandlers.getModel);
  fastify.delete('/models/:id', modelHandlers.deleteModel);
  fastify.post('/models/:id/query', modelHandlers.queryModel);

  // ============================================================================
  // Catalog Routes
  // ============================================================================

  fastify.post('/catalog/query', catalogHandlers.queryCatalog);
  fastify.post('/catalog/models/query', catalogHandlers.queryAllModels);
  fastify.post('/catalog/refresh', catalogHandlers.refreshGraph);

  // ============================================================================
  // Remote Catalog Routes (optional - requires remoteHandlers)
  // ============================================================================

  const { remoteHandlers } = options;

  if (remoteHandlers) {
    fastify.get('/remote/models', remoteHandlers.listRemoteModels);
    fastify.get('/remote/models/:id/metadata', remoteHandlers.getRemoteMetadata);
  }
}
