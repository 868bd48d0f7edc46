/**
 * CatalogHandlers — HTTP handlers for the merged catalog graph and for
 * fanning a query out to every model.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Catalog, FanOutResult } from '../../catalog/Catalog.js';
import { Query } from '../../query/Query.js';
import { badRequest, sendError } from '../errorResponse.js';
import {
  QueryRequestSchema,
  type ApiError,
  type QueryRequest,
  type QueryResponse,
  type RefreshResponse,
} from '../types.js';

function parseQueryRequest(body: unknown): { query: Query; save?: boolean } | { issues: unknown } {
  const parsed = QueryRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { issues: parsed.error.issues };
  }
  const { name, sparql, save }: QueryRequest = parsed.data;
  return {
    query: Query.fromText(name, sparql),
    ...(save !== undefined ? { save } : {}),
  };
}

/**
 * Create catalog handlers.
 */
export function createCatalogHandlers(catalog: Catalog) {
  return {
    /**
     * POST /catalog/query — run on the merged graph.
     */
    async queryCatalog(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<QueryResponse | ApiError> {
      const parsed = parseQueryRequest(request.body);
      if ('issues' in parsed) {
        return badRequest(reply, 'Invalid query request', parsed.issues);
      }

      try {
        const outcome = await catalog.executeQuery(
          parsed.query,
          parsed.save !== undefined ? { save: parsed.save } : {}
        );
        return { ...outcome, element: catalog.id };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * POST /catalog/models/query — run on every model and compile the results.
     */
    async queryAllModels(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<FanOutResult | ApiError> {
      const parsed = parseQueryRequest(request.body);
      if ('issues' in parsed) {
        return badRequest(reply, 'Invalid query request', parsed.issues);
      }

      try {
        return await catalog.executeQueryOnModels(
          parsed.query,
          parsed.save !== undefined ? { save: parsed.save } : {}
        );
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * POST /catalog/refresh — rebuild the merged graph.
     */
    async refreshGraph(
      _request: FastifyRequest,
      reply: FastifyReply
    ): Promise<RefreshResponse | ApiError> {
      try {
        catalog.refreshGraph();
        return {
          models: catalog.models.length,
          triples: catalog.graph.size,
          graphHash: catalog.graphHash(),
        };
      } catch (err) {
        return sendError(reply, err);
      }
    },
  };
}

export type CatalogHandlers = ReturnType<typeof createCatalogHandlers>;
