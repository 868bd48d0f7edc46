/**
 * ModelHandlers — HTTP handlers for listing, inspecting, removing and
 * querying the models of the loaded catalog.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Catalog } from '../../catalog/Catalog.js';
import type { FilterValues } from '../../catalog/ModelFilter.js';
import type { Model } from '../../model/Model.js';
import { Query } from '../../query/Query.js';
import { badRequest, sendError } from '../errorResponse.js';
import {
  QueryRequestSchema,
  type ApiError,
  type ListModelsQuery,
  type ListModelsResponse,
  type ModelDetail,
  type ModelSummary,
  type QueryResponse,
} from '../types.js';

export function toSummary(model: Model): ModelSummary {
  return { id: model.id, metadata: model.metadata };
}

export function toDetail(model: Model): ModelDetail {
  return {
    ...toSummary(model),
    triples: model.tripleCount,
    graphHash: model.graphHash(),
    hasMetadataGraph: model.metadataGraph !== undefined,
    ...(model.metadataGraphHash !== undefined ? { metadataGraphHash: model.metadataGraphHash } : {}),
  };
}

/**
 * Create model handlers over one catalog.
 */
export function createModelHandlers(catalog: Catalog) {
  return {
    /**
     * GET /models?operand=and&language=en&keyword=a&keyword=b
     */
    async listModels(
      request: FastifyRequest<{ Querystring: ListModelsQuery }>,
      reply: FastifyReply
    ): Promise<ListModelsResponse | ApiError> {
      const { operand = 'and', ...fields } = request.query;
      if (typeof operand !== 'string') {
        return badRequest(reply, 'Query parameter "operand" must be given once.');
      }

      const filters: Record<string, string | string[]> = {};
      for (const [field, value] of Object.entries(fields)) {
        if (value !== undefined) {
          filters[field] = value;
        }
      }

      try {
        const models = catalog.getModels(operand, filters satisfies FilterValues).map(toSummary);
        return { models, total: models.length };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /models/:id
     */
    async getModel(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply
    ): Promise<ModelDetail | ApiError> {
      try {
        return toDetail(catalog.getModel(request.params.id));
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * DELETE /models/:id
     */
    async deleteModel(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply
    ): Promise<ApiError | FastifyReply> {
      try {
        catalog.removeModelById(request.params.id);
      } catch (err) {
        return sendError(reply, err);
      }
      return reply.status(204).send();
    },

    /**
     * POST /models/:id/query
     */
    async queryModel(
      request: FastifyRequest<{ Params: { id: string }; Body: unknown }>,
      reply: FastifyReply
    ): Promise<QueryResponse | ApiError> {
      const parsed = QueryRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return badRequest(reply, 'Invalid query request', parsed.error.issues);
      }

      const { name, sparql, save } = parsed.data;
      try {
        const outcome = await catalog.executeQueryOnModel(
          Query.fromText(name, sparql),
          request.params.id,
          save !== undefined ? { save } : {}
        );
        return { ...outcome, element: request.params.id };
      } catch (err) {
        return sendError(reply, err);
      }
    },
  };
}

export type ModelHandlers = ReturnType<typeof createModelHandlers>;
